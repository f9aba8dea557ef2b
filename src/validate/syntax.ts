import { run, type Runner } from '../shared/exec.js';
import type { ShellSyntaxChecker, SyntaxCheckResult } from './types.js';

const SYNTAX_CHECK_TIMEOUT_MS = 10_000;

/** Parses each command with `bash -n`, reading the script from stdin so nothing touches disk. */
export class BashSyntaxChecker implements ShellSyntaxChecker {
  constructor(
    private readonly runner: Runner = run,
    private readonly shell = 'bash'
  ) {}

  async check(commandText: string): Promise<SyntaxCheckResult> {
    const script = `#!/bin/bash\n${commandText}\n`;
    const result = await this.runner(this.shell, ['-n'], { input: script, timeoutMs: SYNTAX_CHECK_TIMEOUT_MS });
    if (result.exitCode === 0) return { ok: true };
    const message = result.stderr.trim().split('\n')[0] || `${this.shell} -n exited with ${result.exitCode}`;
    return { ok: false, message };
  }
}

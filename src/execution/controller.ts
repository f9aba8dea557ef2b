// Execution controller: materializes the script, runs it in a fresh sandbox instance and
// settles artifacts in one place (finalize). Passing and interrupted runs are cleaned up;
// every other outcome leaves the instance, the script and a captured log for inspection.
import fs from 'fs/promises';
import path from 'path';
import type { AssembledScript } from '../assemble/assembler.js';
import { GuideCheckError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ExecutionResult, ExecutionStatus, SandboxRuntime } from './types.js';

export const ARTIFACT_PREFIX = 'install-guide-check';

export interface ControllerOptions {
  artifactsDir: string;
  timeoutMs: number;
  output?: NodeJS.WritableStream;
}

interface RunOutcome {
  status: ExecutionStatus;
  exitCode: number | null;
  output: string;
  cause?: string;
}

/** Unique per process and moment, so a preserved instance never blocks the next run. */
export function createRunId(pid: number = process.pid, now: number = Date.now()): string {
  return `${pid}-${now}`;
}

export function artifactNames(runId: string, artifactsDir: string): { instanceName: string; scriptPath: string } {
  const instanceName = `${ARTIFACT_PREFIX}-${runId}`;
  return { instanceName, scriptPath: path.join(artifactsDir, `${instanceName}.sh`) };
}

export class ExecutionController {
  constructor(
    private readonly runtime: SandboxRuntime,
    private readonly options: ControllerOptions
  ) {}

  async run(script: AssembledScript, image: string, signal?: AbortSignal): Promise<ExecutionResult> {
    const { instanceName, scriptPath } = artifactNames(script.runId, this.options.artifactsDir);
    await fs.mkdir(this.options.artifactsDir, { recursive: true });
    await fs.writeFile(scriptPath, script.text, { encoding: 'utf-8', mode: 0o755 });
    logger.debug({ scriptPath, instanceId: instanceName }, 'Script materialized');

    let outcome: RunOutcome;
    try {
      const launched = await this.runtime.launch({
        image,
        scriptPath,
        instanceName,
        timeoutMs: this.options.timeoutMs,
        signal,
        output: this.options.output,
      });
      outcome = {
        status: launched.interrupted
          ? 'interrupted'
          : launched.timedOut
            ? 'timed-out'
            : launched.exitCode === 0
              ? 'passed'
              : 'failed',
        exitCode: launched.exitCode,
        output: launched.output,
      };
    } catch (err) {
      const detail = err instanceof GuideCheckError ? err.context?.['cause'] : undefined;
      outcome = {
        status: 'launch-failed',
        exitCode: null,
        output: '',
        cause: [err instanceof Error ? err.message : String(err), typeof detail === 'string' ? detail : '']
          .filter(Boolean)
          .join(': '),
      };
    }

    return this.finalize(outcome, instanceName, scriptPath);
  }

  private async finalize(outcome: RunOutcome, instanceId: string, scriptPath: string): Promise<ExecutionResult> {
    const base = { status: outcome.status, exitCode: outcome.exitCode, instanceId, scriptPath, cause: outcome.cause };

    if (outcome.status === 'passed' || outcome.status === 'interrupted') {
      try {
        await this.runtime.destroy(instanceId);
      } finally {
        await fs.rm(scriptPath, { force: true });
      }
      logger.info({ instanceId, status: outcome.status }, 'Sandbox cleaned up');
      return { ...base, logPath: null, preserved: false };
    }

    const logPath = `${scriptPath}.log`;
    await fs.writeFile(logPath, outcome.output, 'utf-8');
    logger.warn({ instanceId, scriptPath, logPath, status: outcome.status }, 'Run failed; artifacts preserved');
    return { ...base, logPath, preserved: true };
  }
}

import type { CommandSet } from './extract/types.js';
import type { ValidationFinding } from './validate/types.js';
import { summarizeFindings } from './validate/validator.js';
import type { ExecutionResult } from './execution/types.js';
import { GuideCheckError } from './shared/errors.js';

/** Plain-text run report for stdout. Structured diagnostics go through the logger instead. */
export class Reporter {
  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  line(text = ''): void {
    this.out.write(`${text}\n`);
  }

  header(htmlPath: string, image: string): void {
    this.line('Installation guide check');
    this.line(`  guide: ${htmlPath}`);
    this.line(`  image: ${image}`);
    this.line();
  }

  commands(commands: CommandSet): void {
    this.line(`Extracted ${commands.length} unique command${commands.length === 1 ? '' : 's'}:`);
    for (const cmd of commands) {
      const [first = '', ...rest] = cmd.text.split('\n');
      const label = `  ${cmd.index + 1}. `;
      this.line(`${label}${first}`);
      for (const continuation of rest) this.line(`${' '.repeat(label.length)}${continuation}`);
    }
    this.line();
  }

  validation(findings: readonly ValidationFinding[]): void {
    this.line('Validation:');
    for (const summary of summarizeFindings(findings)) {
      const counts = [
        summary.errors ? `${summary.errors} error${summary.errors === 1 ? '' : 's'}` : '',
        summary.warnings ? `${summary.warnings} warning${summary.warnings === 1 ? '' : 's'}` : '',
      ].filter(Boolean);
      this.line(`  [${summary.passed ? 'PASS' : 'FAIL'}] ${summary.category}${counts.length ? ` (${counts.join(', ')})` : ''}`);
    }
    for (const f of findings) {
      const where = f.commandIndex === undefined ? '' : ` (command ${f.commandIndex + 1})`;
      this.line(`  ${f.severity.toUpperCase()} ${f.ruleId}${where}: ${f.message}`);
    }
    this.line();
  }

  note(text: string): void {
    this.line(text);
  }

  execution(result: ExecutionResult): void {
    this.line();
    this.line(`Sandbox run: ${result.status}${result.exitCode === null ? '' : ` (exit ${result.exitCode})`}`);
    if (result.cause) this.line(`  cause: ${result.cause}`);
    if (result.preserved) {
      this.line(`  instance preserved: ${result.instanceId}`);
      this.line(`  script preserved:   ${result.scriptPath}`);
      if (result.logPath) this.line(`  log:                ${result.logPath}`);
    }
  }

  verdict(err?: unknown): void {
    this.line();
    if (err === undefined) {
      this.line('PASSED');
      return;
    }
    if (err instanceof GuideCheckError) {
      this.line(`FAILED ${err.stage ? `[${err.stage}] ` : ''}${err.code}: ${err.message}`);
      return;
    }
    this.line(`FAILED ${err instanceof Error ? err.message : String(err)}`);
  }
}

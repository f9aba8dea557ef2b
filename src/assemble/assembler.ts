// Script assembler: prologue, one instrumented segment per command, epilogue.
// Output depends only on the command set, the options and the run id (header line only).
// The prologue's `set -e` is the whole error-handling story inside the script: the first
// failing step aborts the run, and nothing is retried.
import type { CommandSet } from '../extract/types.js';
import {
  classifyCommand,
  escapeDoubleQuoted,
  isKeyVerificationCommand,
  keyVerificationGap,
  renderPlan,
  type SegmentPlan,
  type SubstitutionOptions,
} from './substitutions.js';
import { GuideCheckError, GuideCheckErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const SUCCESS_MARKER = 'Installation completed successfully!';

export interface AssemblerOptions extends SubstitutionOptions {
  productName: string;
  executable: string;
  versionFlag: string | null;
  source?: string;
}

export interface ScriptSegment {
  commandIndex: number;
  plan: SegmentPlan['kind'];
  lines: string[];
}

export interface AssembledScript {
  runId: string;
  text: string;
  commandCount: number;
  segments: ScriptSegment[];
}

export function flattenForAnnouncement(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ');
}

function shellQuote(text: string): string {
  return `'${text.replace(/'/g, `'\\''`)}'`;
}

function renderPrologue(options: AssemblerOptions, runId: string): string[] {
  const header = ['#!/bin/bash', `# Generated by install-guide-check (run ${runId})`];
  if (options.source) header.push(`# Source: ${flattenForAnnouncement(options.source)}`);
  return [
    ...header,
    'set -eo pipefail',
    'export DEBIAN_FRONTEND=noninteractive',
    '',
    `echo "==> Installing prerequisites: ${options.prerequisites.join(' ')}"`,
    'apt-get update',
    `apt-get install -y --no-install-recommends ${options.prerequisites.join(' ')}`,
  ];
}

function renderEpilogue(options: AssemblerOptions): string[] {
  const exe = options.executable;
  const product = shellQuote(options.productName);
  const lines = [
    '# Post-install verification',
    'echo "==> Verifying installation"',
    `if command -v ${exe} >/dev/null 2>&1; then`,
    `  echo "${exe} found at $(command -v ${exe})"`,
  ];
  if (options.versionFlag) {
    lines.push(`  ${exe} ${shellQuote(options.versionFlag)} || true`);
  }
  lines.push(
    'else',
    `  echo "${exe} not found on PATH (informational)"`,
    'fi',
    `dpkg -l | grep -i -- ${product} || echo "No installed packages matching ${escapeDoubleQuoted(options.productName)} (informational)"`,
    `echo "${SUCCESS_MARKER}"`
  );
  return lines;
}

export function assembleScript(commands: CommandSet, options: AssemblerOptions, runId: string): AssembledScript {
  const total = commands.length;
  const segments: ScriptSegment[] = commands.map((command, position) => {
    if (command.index !== position) {
      throw new GuideCheckError(GuideCheckErrorCode.ASSEMBLY_FAILED, 'Command set is out of order', {
        stage: 'assemble',
        commandIndex: command.index,
        position,
      });
    }
    const plan = classifyCommand(command, options);
    if (plan.kind === 'verbatim' && isKeyVerificationCommand(command.text)) {
      logger.warn(
        { commandIndex: command.index, reason: keyVerificationGap(command.text, options.keyVerification) },
        'Key verification command left as written'
      );
    }
    const step = `${position + 1}/${total}`;
    return {
      commandIndex: command.index,
      plan: plan.kind,
      lines: [
        '',
        `# Step ${step}${plan.kind === 'verbatim' ? '' : ` (${plan.kind})`}`,
        `echo "==> [${step}] ${escapeDoubleQuoted(flattenForAnnouncement(command.text))}"`,
        ...renderPlan(plan, command),
      ],
    };
  });

  const text = [
    ...renderPrologue(options, runId),
    ...segments.flatMap(s => s.lines),
    '',
    ...renderEpilogue(options),
    '',
  ].join('\n');

  logger.debug({ runId, commands: total, bytes: text.length }, 'Assembled installation script');
  return { runId, text, commandCount: total, segments };
}

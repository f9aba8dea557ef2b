// One guide, one image, one pass: extract → normalize → validate → assemble → execute.
// Every fatal condition surfaces as a GuideCheckError carrying the stage; the CLI maps
// its code to the process exit status.
import fs from 'fs/promises';
import path from 'path';
import type { GuideCheckConfig } from './config/schema.js';
import { compileRules } from './config/rules.js';
import { extractBlocks, splitLines } from './extract/extractor.js';
import { normalizeBlocks } from './extract/normalizer.js';
import type { BlockMarkers, CommandSet } from './extract/types.js';
import { blockingFindings, validateCommands } from './validate/validator.js';
import type { ShellSyntaxChecker, ValidationFinding } from './validate/types.js';
import { assembleScript, type AssembledScript, type AssemblerOptions } from './assemble/assembler.js';
import type { KeyVerificationOptions } from './assemble/substitutions.js';
import { ExecutionController, createRunId } from './execution/controller.js';
import type { ExecutionResult, ExecutionStatus, SandboxRuntime } from './execution/types.js';
import { GuideCheckError, GuideCheckErrorCode } from './shared/errors.js';
import { logger } from './shared/logger.js';
import type { Reporter } from './report.js';

export interface PipelineOptions {
  htmlPath: string;
  config: GuideCheckConfig;
  // Also write the assembled script here, independent of execution
  emitScriptPath?: string;
  runId?: string;
  signal?: AbortSignal;
}

export interface PipelineDeps {
  syntaxChecker: ShellSyntaxChecker;
  runtime: SandboxRuntime;
  reporter: Reporter;
  // Live container output; defaults to no streaming
  executionOutput?: NodeJS.WritableStream;
}

export interface PipelineReport {
  commands: CommandSet;
  findings: ValidationFinding[];
  script: AssembledScript | null;
  execution: ExecutionResult | null;
}

const FAILURE_CODES: Record<Exclude<ExecutionStatus, 'passed'>, GuideCheckErrorCode> = {
  failed: GuideCheckErrorCode.EXECUTION_FAILED,
  'launch-failed': GuideCheckErrorCode.EXECUTION_LAUNCH_FAILED,
  'timed-out': GuideCheckErrorCode.EXECUTION_TIMEOUT,
  interrupted: GuideCheckErrorCode.EXECUTION_INTERRUPTED,
};

export function markersFromConfig(config: GuideCheckConfig): BlockMarkers {
  return {
    containerTag: config.markers.container_tag,
    blockClass: config.markers.block_class,
    controlTag: config.markers.control_tag,
    controlClass: config.markers.control_class,
  };
}

function keyVerificationFromConfig(config: GuideCheckConfig): KeyVerificationOptions {
  return {
    expectedFingerprint: config.key_verification.expected_fingerprint,
    keyFile: config.key_verification.key_file,
  };
}

export function assemblerOptionsFromConfig(config: GuideCheckConfig, source?: string): AssemblerOptions {
  return {
    prerequisites: config.prerequisites,
    keyVerification: keyVerificationFromConfig(config),
    productName: config.product.name,
    executable: config.product.executable,
    versionFlag: config.product.version_flag,
    source,
  };
}

async function readGuide(htmlPath: string): Promise<string> {
  try {
    return await fs.readFile(htmlPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new GuideCheckError(GuideCheckErrorCode.INPUT_NOT_FOUND, `HTML file not found: ${htmlPath}`, {
        stage: 'extract',
      });
    }
    throw err;
  }
}

export function extractCommands(html: string, config: GuideCheckConfig): CommandSet {
  const blocks = extractBlocks(splitLines(html), markersFromConfig(config));
  return normalizeBlocks(blocks, compileRules(config.informational_commands));
}

export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineReport> {
  const { config } = options;
  const { reporter } = deps;
  reporter.header(options.htmlPath, config.image);

  const commands = extractCommands(await readGuide(options.htmlPath), config);
  logger.info({ stage: 'extract', commands: commands.length }, 'Commands extracted');
  if (commands.length === 0) {
    throw new GuideCheckError(GuideCheckErrorCode.EXTRACTION_EMPTY, `No commands extracted from ${options.htmlPath}`, {
      stage: 'extract',
    });
  }
  reporter.commands(commands);

  const findings = await validateCommands(
    commands,
    {
      required: compileRules(config.required_patterns),
      danger: compileRules(config.danger_patterns),
      keyVerification: keyVerificationFromConfig(config),
    },
    deps.syntaxChecker
  );
  reporter.validation(findings);
  const blocking = blockingFindings(findings);
  const [first] = blocking;
  if (first) {
    throw new GuideCheckError(
      GuideCheckErrorCode.VALIDATION_FAILED,
      `${blocking.length} blocking validation finding${blocking.length === 1 ? '' : 's'}; first: ${first.message}`,
      { stage: 'validate', ruleId: first.ruleId, commandIndex: first.commandIndex }
    );
  }

  const report: PipelineReport = { commands, findings, script: null, execution: null };
  if (config.mode === 'validate') {
    reporter.note('Validation-only mode: skipping script assembly and execution');
    return report;
  }

  const runId = options.runId ?? createRunId();
  report.script = assembleScript(commands, assemblerOptionsFromConfig(config, path.basename(options.htmlPath)), runId);

  if (options.emitScriptPath) {
    await fs.writeFile(options.emitScriptPath, report.script.text, { encoding: 'utf-8', mode: 0o755 });
    reporter.note(`Script written to ${options.emitScriptPath}`);
  }

  if (!config.execute) {
    reporter.note('Sandbox execution disabled: skipping container run (use --docker to enable)');
    return report;
  }

  if (options.signal?.aborted) {
    throw new GuideCheckError(GuideCheckErrorCode.EXECUTION_INTERRUPTED, 'Interrupted before the sandbox run started', {
      stage: 'execute',
    });
  }
  const controller = new ExecutionController(deps.runtime, {
    artifactsDir: config.artifacts_dir,
    timeoutMs: config.timeout_seconds * 1000,
    output: deps.executionOutput,
  });
  const result = await controller.run(report.script, config.image, options.signal);
  report.execution = result;
  reporter.execution(result);

  if (result.status !== 'passed') {
    throw new GuideCheckError(FAILURE_CODES[result.status], `Sandbox run ${result.status} in ${config.image}`, {
      stage: 'execute',
      exitCode: result.exitCode,
      instanceId: result.instanceId,
      scriptPath: result.preserved ? result.scriptPath : undefined,
      cause: result.cause,
    });
  }
  return report;
}

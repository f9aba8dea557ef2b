#!/usr/bin/env node
import { parseArgs } from 'util';
import { loadConfig } from './config/loader.js';
import { GuideCheckConfigSchema, type GuideCheckConfig } from './config/schema.js';
import { runPipeline } from './pipeline.js';
import { Reporter } from './report.js';
import { BashSyntaxChecker } from './validate/syntax.js';
import { DockerRuntime } from './execution/docker.js';
import { GuideCheckError, GuideCheckErrorCode, exitCodeFor } from './shared/errors.js';
import { logger } from './shared/logger.js';

export const USAGE = `Usage: install-guide-check --html <file> [options]

Options:
  --html <file>            HTML installation guide to check (required)
  --image <image>          Container image to install into (default: ubuntu:focal)
  --distribution <image>   Alias of --image
  --codename <name>        Pick the image by distribution codename (e.g. focal, jammy, bullseye)
  --validate-only          Stop after extraction and validation
  --docker                 Run the assembled script in a container
  --emit-script <path>     Write the assembled script to <path>
  --timeout <seconds>      Abort the container run after this many seconds
  --artifacts-dir <dir>    Where scripts and logs of failed runs are kept
  --config <file>          YAML configuration file
  -h, --help               Show this help`;

export interface CliOptions {
  html?: string;
  image?: string;
  codename?: string;
  validateOnly: boolean;
  docker: boolean;
  emitScript?: string;
  timeout?: string;
  artifactsDir?: string;
  config?: string;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      options: {
        html: { type: 'string' },
        image: { type: 'string' },
        distribution: { type: 'string' },
        codename: { type: 'string' },
        'validate-only': { type: 'boolean', default: false },
        docker: { type: 'boolean', default: false },
        'emit-script': { type: 'string' },
        timeout: { type: 'string' },
        'artifacts-dir': { type: 'string' },
        config: { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    });
  } catch (err) {
    throw new GuideCheckError(GuideCheckErrorCode.CONFIG_INVALID, err instanceof Error ? err.message : String(err));
  }
  const { values } = parsed;
  return {
    html: values.html,
    image: values.image ?? values.distribution,
    codename: values.codename,
    validateOnly: values['validate-only'] ?? false,
    docker: values.docker ?? false,
    emitScript: values['emit-script'],
    timeout: values.timeout,
    artifactsDir: values['artifacts-dir'],
    config: values.config,
    help: values.help ?? false,
  };
}

/** Layers CLI flags over the loaded configuration and re-validates the result. */
export function applyCliOptions(config: GuideCheckConfig, options: CliOptions): GuideCheckConfig {
  if (options.image && options.codename) {
    throw new GuideCheckError(GuideCheckErrorCode.CONFIG_INVALID, '--image and --codename are mutually exclusive');
  }

  let image = options.image ?? config.image;
  if (options.codename) {
    const mapped = config.codename_images[options.codename];
    if (!mapped) {
      const known = Object.keys(config.codename_images).join(', ');
      throw new GuideCheckError(GuideCheckErrorCode.CONFIG_INVALID, `Unknown codename '${options.codename}' (known: ${known})`);
    }
    image = mapped;
  }

  const merged = {
    ...config,
    image,
    mode: options.validateOnly ? 'validate' : config.mode,
    execute: options.docker || config.execute,
    timeout_seconds: options.timeout === undefined ? config.timeout_seconds : Number(options.timeout),
    artifacts_dir: options.artifactsDir ?? config.artifacts_dir,
  };
  const result = GuideCheckConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new GuideCheckError(GuideCheckErrorCode.CONFIG_INVALID, `Invalid option: ${issues}`);
  }
  return result.data;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const reporter = new Reporter(process.stdout);
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    reporter.line(err instanceof Error ? err.message : String(err));
    reporter.line(USAGE);
    return exitCodeFor(err);
  }
  if (options.help) {
    reporter.line(USAGE);
    return 0;
  }
  if (!options.html) {
    reporter.line('HTML file is required');
    reporter.line(USAGE);
    return 1;
  }

  const abort = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn({ signal }, 'Interrupted; stopping the sandbox run');
    abort.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const { config: loaded, configPath } = loadConfig({ explicitPath: options.config });
    const config = applyCliOptions(loaded, options);
    logger.debug({ configPath, image: config.image, mode: config.mode, execute: config.execute }, 'Configuration ready');

    await runPipeline(
      { htmlPath: options.html, config, emitScriptPath: options.emitScript, signal: abort.signal },
      {
        syntaxChecker: new BashSyntaxChecker(),
        runtime: new DockerRuntime(),
        reporter,
        executionOutput: process.stdout,
      }
    );
    reporter.verdict();
    return 0;
  } catch (err) {
    if (!(err instanceof GuideCheckError)) {
      logger.error({ error: err }, 'Unexpected failure');
    }
    reporter.verdict(err);
    return exitCodeFor(err);
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code;
    },
    err => {
      logger.fatal({ error: err }, 'Fatal error');
      process.exitCode = 1;
    }
  );
}

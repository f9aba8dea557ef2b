// Docker-backed sandbox runtime. The container is started without --rm: a failed
// instance must survive for `docker start -ai` / `docker cp` inspection, and removal
// is the controller's call through destroy().
import { run, type ExecResult, type Runner } from '../shared/exec.js';
import { GuideCheckError, GuideCheckErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { LaunchOutcome, LaunchRequest, SandboxRuntime } from './types.js';

export const SCRIPT_MOUNT_PATH = '/opt/install-guide-check/install.sh';

// `docker run` reserves 125 for errors of the daemon or the client itself
const DOCKER_RUN_ERROR = 125;

const CONTROL_TIMEOUT_MS = 60_000;

export class DockerRuntime implements SandboxRuntime {
  constructor(
    private readonly runner: Runner = run,
    private readonly binary = 'docker'
  ) {}

  runArgs(request: LaunchRequest): string[] {
    return [
      'run',
      '--name',
      request.instanceName,
      '--volume',
      `${request.scriptPath}:${SCRIPT_MOUNT_PATH}:ro`,
      request.image,
      '/bin/bash',
      SCRIPT_MOUNT_PATH,
    ];
  }

  async launch(request: LaunchRequest): Promise<LaunchOutcome> {
    logger.info({ image: request.image, instanceId: request.instanceName }, 'Starting container');

    let result: ExecResult;
    try {
      result = await this.runner(this.binary, this.runArgs(request), {
        timeoutMs: request.timeoutMs,
        signal: request.signal,
        output: request.output,
      });
    } catch (err) {
      throw new GuideCheckError(GuideCheckErrorCode.EXECUTION_LAUNCH_FAILED, `Could not run ${this.binary}`, {
        stage: 'execute',
        instanceId: request.instanceName,
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    const timedOut = result.timedOut;
    const interrupted = result.canceled;
    if (timedOut || interrupted) {
      // Killing the client leaves the container running
      await this.kill(request.instanceName);
    } else if (result.exitCode === DOCKER_RUN_ERROR) {
      throw new GuideCheckError(GuideCheckErrorCode.EXECUTION_LAUNCH_FAILED, 'Container could not be started', {
        stage: 'execute',
        instanceId: request.instanceName,
        cause: result.stderr.trim(),
      });
    }

    return {
      exitCode: result.exitCode,
      instanceId: request.instanceName,
      output: result.all,
      timedOut,
      interrupted,
    };
  }

  async destroy(instanceId: string): Promise<void> {
    await this.control(['rm', '--force', instanceId], instanceId, 'Failed to remove container');
  }

  private async kill(instanceId: string): Promise<void> {
    await this.control(['kill', instanceId], instanceId, 'Failed to stop container');
  }

  // Cleanup commands only warn: the run's own outcome is what gets reported
  private async control(args: string[], instanceId: string, failure: string): Promise<void> {
    let result: ExecResult;
    try {
      result = await this.runner(this.binary, args, { timeoutMs: CONTROL_TIMEOUT_MS });
    } catch (err) {
      logger.warn({ instanceId, err }, failure);
      return;
    }
    if (result.exitCode !== 0) {
      logger.warn({ instanceId, stderr: result.stderr.trim() }, failure);
    }
  }
}

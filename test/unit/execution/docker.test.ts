import { DockerRuntime, SCRIPT_MOUNT_PATH } from '../../../src/execution/docker.js';
import type { ExecResult, RunOptions, Runner } from '../../../src/shared/exec.js';
import { GuideCheckError, GuideCheckErrorCode } from '../../../src/shared/errors.js';
import type { LaunchRequest } from '../../../src/execution/types.js';

interface Call {
  command: string;
  args: string[];
  options?: RunOptions;
}

function result(overrides: Partial<ExecResult> = {}): ExecResult {
  return { stdout: '', stderr: '', all: '', exitCode: 0, timedOut: false, canceled: false, ...overrides };
}

/** Answers each call with the next queued result, or a plain success when the queue is empty. */
function stubRunner(queue: Array<ExecResult | Error>): { runner: Runner; calls: Call[] } {
  const calls: Call[] = [];
  const runner: Runner = async (command, args, options) => {
    calls.push({ command, args, options });
    const next = queue.shift() ?? result();
    if (next instanceof Error) throw next;
    return next;
  };
  return { runner, calls };
}

const REQUEST: LaunchRequest = {
  image: 'ubuntu:22.04',
  scriptPath: '/tmp/install-guide-check-1-2.sh',
  instanceName: 'install-guide-check-1-2',
  timeoutMs: 60_000,
};

describe('DockerRuntime', () => {
  it('runs the mounted script in a named container without --rm', async () => {
    const { runner, calls } = stubRunner([result({ all: '==> [1/1] echo hi\nhi\n' })]);
    const outcome = await new DockerRuntime(runner).launch(REQUEST);

    expect(calls).toEqual([
      {
        command: 'docker',
        args: [
          'run',
          '--name',
          'install-guide-check-1-2',
          '--volume',
          `/tmp/install-guide-check-1-2.sh:${SCRIPT_MOUNT_PATH}:ro`,
          'ubuntu:22.04',
          '/bin/bash',
          SCRIPT_MOUNT_PATH,
        ],
        options: { timeoutMs: 60_000, signal: undefined, output: undefined },
      },
    ]);
    expect(outcome).toEqual({
      exitCode: 0,
      instanceId: 'install-guide-check-1-2',
      output: '==> [1/1] echo hi\nhi\n',
      timedOut: false,
      interrupted: false,
    });
  });

  it('passes the script exit status through', async () => {
    const { runner } = stubRunner([result({ exitCode: 100 })]);
    const outcome = await new DockerRuntime(runner).launch(REQUEST);
    expect(outcome.exitCode).toBe(100);
  });

  it('treats exit 125 as a launch failure', async () => {
    const { runner } = stubRunner([
      result({ exitCode: 125, stderr: 'docker: Error response from daemon: pull access denied.\n' }),
    ]);
    await expect(new DockerRuntime(runner).launch(REQUEST)).rejects.toMatchObject({
      code: GuideCheckErrorCode.EXECUTION_LAUNCH_FAILED,
      message: 'Container could not be started',
      context: { cause: 'docker: Error response from daemon: pull access denied.' },
    });
  });

  it('treats a missing docker binary as a launch failure', async () => {
    const { runner } = stubRunner([
      new GuideCheckError(GuideCheckErrorCode.SPAWN_FAILED, 'Command failed to spawn: docker', { cause: 'ENOENT' }),
    ]);
    await expect(new DockerRuntime(runner).launch(REQUEST)).rejects.toMatchObject({
      code: GuideCheckErrorCode.EXECUTION_LAUNCH_FAILED,
      message: 'Could not run docker',
      context: { cause: 'Command failed to spawn: docker' },
    });
  });

  it('kills the container when the run times out', async () => {
    const { runner, calls } = stubRunner([result({ exitCode: 143, timedOut: true })]);
    const outcome = await new DockerRuntime(runner).launch(REQUEST);

    expect(outcome).toMatchObject({ timedOut: true, interrupted: false });
    expect(calls.map(c => c.args)).toEqual([expect.arrayContaining(['run']), ['kill', 'install-guide-check-1-2']]);
  });

  it('kills the container when the run is interrupted', async () => {
    const abort = new AbortController();
    const { runner, calls } = stubRunner([result({ exitCode: 143, canceled: true })]);
    const outcome = await new DockerRuntime(runner).launch({ ...REQUEST, signal: abort.signal });

    expect(calls[0]?.options?.signal).toBe(abort.signal);
    expect(outcome).toMatchObject({ timedOut: false, interrupted: true });
    expect(calls[1]?.args).toEqual(['kill', 'install-guide-check-1-2']);
  });

  it('force-removes the container on destroy', async () => {
    const { runner, calls } = stubRunner([]);
    await new DockerRuntime(runner).destroy('install-guide-check-1-2');
    expect(calls.map(c => [c.command, ...c.args])).toEqual([['docker', 'rm', '--force', 'install-guide-check-1-2']]);
  });

  it('does not throw when removal fails', async () => {
    const { runner } = stubRunner([result({ exitCode: 1, stderr: 'No such container' })]);
    await expect(new DockerRuntime(runner).destroy('gone')).resolves.toBeUndefined();
  });

  it('does not throw when the removal command cannot be spawned', async () => {
    const { runner, calls } = stubRunner([
      new GuideCheckError(GuideCheckErrorCode.SPAWN_FAILED, 'Command failed to spawn: docker', { cause: 'ENOENT' }),
    ]);
    await expect(new DockerRuntime(runner).destroy('install-guide-check-1-2')).resolves.toBeUndefined();
    expect(calls.map(c => c.args)).toEqual([['rm', '--force', 'install-guide-check-1-2']]);
  });

  it('still reports the timeout when the kill command cannot be spawned', async () => {
    const { runner } = stubRunner([
      result({ exitCode: 143, timedOut: true }),
      new GuideCheckError(GuideCheckErrorCode.SPAWN_FAILED, 'Command failed to spawn: docker', { cause: 'ENOENT' }),
    ]);
    const outcome = await new DockerRuntime(runner).launch(REQUEST);
    expect(outcome).toMatchObject({ exitCode: 143, timedOut: true, interrupted: false });
  });

  it('uses the configured binary', async () => {
    const { runner, calls } = stubRunner([]);
    await new DockerRuntime(runner, 'podman').destroy('x');
    expect(calls[0]?.command).toBe('podman');
  });
});

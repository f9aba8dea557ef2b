import execa from 'execa';
import { GuideCheckError, GuideCheckErrorCode } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  // stdout and stderr interleaved in arrival order
  all: string;
  exitCode: number;
  signal?: string;
  timedOut: boolean;
  canceled: boolean;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  input?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  output?: NodeJS.WritableStream;
}

export type Runner = (command: string, args: string[], options?: RunOptions) => Promise<ExecResult>;

export const run: Runner = async (command, args, options) => {
  const subprocess = execa(command, args, {
    cwd: options?.cwd,
    env: options?.env,
    input: options?.input,
    timeout: options?.timeoutMs,
    all: true,
    reject: false,
  });

  if (options?.output) {
    subprocess.all?.pipe(options.output, { end: false });
  }

  const onAbort = (): void => {
    subprocess.cancel();
  };
  if (options?.signal) {
    if (options.signal.aborted) onAbort();
    else options.signal.addEventListener('abort', onAbort, { once: true });
  }

  let result: execa.ExecaReturnValue;
  try {
    result = await subprocess;
  } finally {
    options?.signal?.removeEventListener('abort', onAbort);
  }

  // execa leaves exitCode unset when the process never started (ENOENT, EACCES)
  const exited = typeof result.exitCode === 'number';
  if (!exited && result.signal === undefined && !result.timedOut && !result.isCanceled) {
    throw new GuideCheckError(GuideCheckErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command}`, {
      cause: 'shortMessage' in result && typeof result.shortMessage === 'string' ? result.shortMessage : result.stderr,
    });
  }

  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    all: result.all ?? '',
    exitCode: exited ? result.exitCode : 128,
    signal: result.signal ?? undefined,
    timedOut: result.timedOut,
    canceled: result.isCanceled,
  };
};

export interface LaunchRequest {
  image: string;
  scriptPath: string;
  instanceName: string;
  timeoutMs: number;
  signal?: AbortSignal;
  // Live copy of the instance's combined output
  output?: NodeJS.WritableStream;
}

export interface LaunchOutcome {
  exitCode: number;
  instanceId: string;
  output: string;
  timedOut: boolean;
  interrupted: boolean;
}

/**
 * Isolated environment runtime. `launch` blocks until the entry process ends and throws
 * GuideCheckError(EXECUTION_LAUNCH_FAILED) when the instance could not be started at all.
 */
export interface SandboxRuntime {
  launch(request: LaunchRequest): Promise<LaunchOutcome>;
  destroy(instanceId: string): Promise<void>;
}

export type ExecutionStatus = 'passed' | 'failed' | 'launch-failed' | 'timed-out' | 'interrupted';

export interface ExecutionResult {
  status: ExecutionStatus;
  exitCode: number | null;
  instanceId: string;
  scriptPath: string;
  // Captured output, kept only with preserved artifacts
  logPath: string | null;
  preserved: boolean;
  cause?: string;
}

export enum GuideCheckErrorCode {
  INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
  CONFIG_INVALID = 'CONFIG_INVALID',
  EXTRACTION_EMPTY = 'EXTRACTION_EMPTY',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  ASSEMBLY_FAILED = 'ASSEMBLY_FAILED',
  EXECUTION_LAUNCH_FAILED = 'EXECUTION_LAUNCH_FAILED',
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  EXECUTION_TIMEOUT = 'EXECUTION_TIMEOUT',
  EXECUTION_INTERRUPTED = 'EXECUTION_INTERRUPTED',
  SPAWN_FAILED = 'SPAWN_FAILED',
}

export type PipelineStage = 'extract' | 'validate' | 'assemble' | 'execute';

export interface GuideCheckErrorContext {
  stage?: PipelineStage;
  [key: string]: unknown;
}

export class GuideCheckError extends Error {
  readonly code: GuideCheckErrorCode;
  readonly context?: GuideCheckErrorContext;

  constructor(code: GuideCheckErrorCode, message: string, context?: GuideCheckErrorContext) {
    super(message);
    this.name = 'GuideCheckError';
    this.code = code;
    this.context = context;
  }

  /** Pipeline stage that raised the error; absent for usage and configuration errors. */
  get stage(): PipelineStage | undefined {
    return this.context?.stage;
  }
}

// Process exit status per error code; 0 is reserved for a passing run.
export const EXIT_CODES: Record<GuideCheckErrorCode, number> = {
  [GuideCheckErrorCode.INPUT_NOT_FOUND]: 1,
  [GuideCheckErrorCode.CONFIG_INVALID]: 1,
  [GuideCheckErrorCode.SPAWN_FAILED]: 1,
  [GuideCheckErrorCode.EXTRACTION_EMPTY]: 2,
  [GuideCheckErrorCode.VALIDATION_FAILED]: 3,
  [GuideCheckErrorCode.EXECUTION_LAUNCH_FAILED]: 4,
  [GuideCheckErrorCode.EXECUTION_FAILED]: 5,
  [GuideCheckErrorCode.EXECUTION_TIMEOUT]: 6,
  [GuideCheckErrorCode.EXECUTION_INTERRUPTED]: 7,
  [GuideCheckErrorCode.ASSEMBLY_FAILED]: 70,
};

export function exitCodeFor(err: unknown): number {
  return err instanceof GuideCheckError ? EXIT_CODES[err.code] : 1;
}

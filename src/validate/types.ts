import type { CommandRule } from '../extract/types.js';
import type { KeyVerificationOptions } from '../assemble/substitutions.js';

export type Severity = 'warning' | 'error';

export type FindingCategory = 'required-pattern' | 'danger' | 'key-verification' | 'syntax';

export interface ValidationFinding {
  severity: Severity;
  ruleId: string;
  category: FindingCategory;
  message: string;
  // 0-based index into the command set, absent for set-wide findings
  commandIndex?: number;
}

export interface ValidationRules {
  required: readonly CommandRule[];
  danger: readonly CommandRule[];
  keyVerification: KeyVerificationOptions;
}

export interface SyntaxCheckResult {
  ok: boolean;
  message?: string;
}

export interface ShellSyntaxChecker {
  check(commandText: string): Promise<SyntaxCheckResult>;
}

export interface CategorySummary {
  category: FindingCategory;
  passed: boolean;
  errors: number;
  warnings: number;
}

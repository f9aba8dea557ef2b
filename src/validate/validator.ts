// Command validator: reports findings, never rejects. Whether an error aborts the run
// is the caller's decision (the pipeline aborts on any error-severity finding).
import type { CommandSet } from '../extract/types.js';
import type {
  CategorySummary,
  FindingCategory,
  ShellSyntaxChecker,
  ValidationFinding,
  ValidationRules,
} from './types.js';
import { isKeyVerificationCommand, keyVerificationGap } from '../assemble/substitutions.js';
import { logger } from '../shared/logger.js';

export const FINDING_CATEGORIES: readonly FindingCategory[] = [
  'required-pattern',
  'danger',
  'key-verification',
  'syntax',
];

export function checkRequiredPatterns(commands: CommandSet, rules: ValidationRules): ValidationFinding[] {
  return rules.required
    .filter(rule => !commands.some(cmd => rule.matcher.test(cmd.text)))
    .map(rule => ({
      severity: 'warning' as const,
      ruleId: rule.id,
      category: 'required-pattern' as const,
      message: rule.message,
    }));
}

export function checkDangerPatterns(commands: CommandSet, rules: ValidationRules): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  for (const cmd of commands) {
    for (const rule of rules.danger) {
      if (rule.matcher.test(cmd.text)) {
        findings.push({
          severity: 'error',
          ruleId: rule.id,
          category: 'danger',
          message: `${rule.message}: ${cmd.text}`,
          commandIndex: cmd.index,
        });
      }
    }
  }
  return findings;
}

/** Warns about fingerprint displays the assembler has to leave unenforced. */
export function checkKeyVerification(commands: CommandSet, rules: ValidationRules): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  for (const cmd of commands) {
    if (!isKeyVerificationCommand(cmd.text)) continue;
    const gap = keyVerificationGap(cmd.text, rules.keyVerification);
    if (gap) {
      findings.push({
        severity: 'warning',
        ruleId: 'key-verification-unconfigured',
        category: 'key-verification',
        message: `Key fingerprint is displayed but not checked (${gap}): ${cmd.text}`,
        commandIndex: cmd.index,
      });
    }
  }
  return findings;
}

export async function checkSyntax(commands: CommandSet, checker: ShellSyntaxChecker): Promise<ValidationFinding[]> {
  const findings: ValidationFinding[] = [];
  // Sequential on purpose: one bash process at a time
  for (const cmd of commands) {
    const result = await checker.check(cmd.text);
    if (!result.ok) {
      findings.push({
        severity: 'error',
        ruleId: 'shell-syntax',
        category: 'syntax',
        message: `Syntax error in command ${cmd.index + 1}: ${result.message ?? 'unknown parse error'}`,
        commandIndex: cmd.index,
      });
    }
  }
  return findings;
}

export async function validateCommands(
  commands: CommandSet,
  rules: ValidationRules,
  checker: ShellSyntaxChecker
): Promise<ValidationFinding[]> {
  const findings = [
    ...checkRequiredPatterns(commands, rules),
    ...checkDangerPatterns(commands, rules),
    ...checkKeyVerification(commands, rules),
    ...(await checkSyntax(commands, checker)),
  ];
  logger.debug(
    { commands: commands.length, errors: blockingFindings(findings).length, findings: findings.length },
    'Validation finished'
  );
  return findings;
}

export function blockingFindings(findings: readonly ValidationFinding[]): ValidationFinding[] {
  return findings.filter(f => f.severity === 'error');
}

/** One pass/fail line per category; a category passes when it has no error findings. */
export function summarizeFindings(findings: readonly ValidationFinding[]): CategorySummary[] {
  return FINDING_CATEGORIES.map(category => {
    const inCategory = findings.filter(f => f.category === category);
    const errors = inCategory.filter(f => f.severity === 'error').length;
    return { category, passed: errors === 0, errors, warnings: inCategory.length - errors };
  });
}

// Segment plans: how a single command is rendered into the installation script.
// classifyCommand() picks the first matching strategy; RENDERERS turns the plan into lines.
// Adding a substitution means adding a plan variant, a classifier entry and a renderer.
import type { Command } from '../extract/types.js';

export interface KeyVerificationOptions {
  expectedFingerprint: string | null;
  keyFile: string | null;
}

export interface SubstitutionOptions {
  prerequisites: readonly string[];
  keyVerification: KeyVerificationOptions;
}

export type SegmentPlan =
  | { kind: 'prerequisite-noop'; packages: string[] }
  // keepCommand: the command also writes a keyring, so it runs after the check
  | { kind: 'key-verification'; keyFile: string; expectedFingerprint: string; keepCommand: boolean }
  | { kind: 'verbatim' };

type Classifier = (command: Command, options: SubstitutionOptions) => SegmentPlan | null;

const APT_INSTALL = /^(?:sudo\s+)?apt(?:-get)?\s+((?:-\S+\s+)*)install\s+(.+)$/;

function classifyPrerequisiteInstall(command: Command, options: SubstitutionOptions): SegmentPlan | null {
  // Only a bare install line qualifies; anything chained may have side effects
  if (/[\n;&|`$()<>]/.test(command.text)) return null;
  const m = APT_INSTALL.exec(command.text);
  if (!m) return null;
  const packages = (m[2] ?? '').split(/\s+/).filter(word => word !== '' && !word.startsWith('-'));
  if (packages.length === 0) return null;
  const available = new Set(options.prerequisites);
  return packages.every(pkg => available.has(pkg)) ? { kind: 'prerequisite-noop', packages } : null;
}

const KEY_IMPORT = /\bgpg2?\b[^|;&\n]*--(?:import|show-keys?)\b/;
const TEXT_EXTRACTION = /\|\s*(?:grep|awk|sed|cut|head|tail|tr)\b/;
const KEY_FILE_NAME = /\.(?:asc|gpg|key|pub)$/;

// gpg options whose argument is written to, never read as the key
const GPG_DESTINATION_OPTIONS = new Set(['--keyring', '--primary-keyring', '--output', '-o']);
const GPG_KEY_OPERAND_OPTIONS = new Set(['--import', '--show-keys', '--show-key']);

export function isKeyVerificationCommand(text: string): boolean {
  return KEY_IMPORT.test(text) && TEXT_EXTRACTION.test(text);
}

/** Words of each pipeline stage, quotes stripped. Good enough for option scanning, not a shell parser. */
function stageWords(text: string): string[][] {
  return text
    .split(/[|;&\n]+/)
    .map(stage =>
      stage
        .trim()
        .split(/\s+/)
        .filter(word => word !== '')
        .map(word => word.replace(/^['"]|['"]$/g, ''))
    );
}

function isGpgStage(words: readonly string[]): boolean {
  return words.some(word => /^gpg2?$/.test(word));
}

function isDestinationWord(word: string, previous: string | undefined): boolean {
  if (previous !== undefined && GPG_DESTINATION_OPTIONS.has(previous)) return true;
  const eq = word.indexOf('=');
  return eq > 0 && GPG_DESTINATION_OPTIONS.has(word.slice(0, eq));
}

/**
 * The local key file a command reads. Within a gpg invocation the operand of
 * `--import`/`--show-keys` wins and keyring or output destinations are skipped;
 * otherwise the first key-looking path of the command is used. URLs never count.
 */
export function findKeyFile(text: string): string | null {
  let fallback: string | null = null;
  for (const words of stageWords(text)) {
    const gpg = isGpgStage(words);
    let afterKeyOperandOption = false;
    for (const [i, word] of words.entries()) {
      if (gpg) {
        if (isDestinationWord(word, words[i - 1])) continue;
        if (GPG_KEY_OPERAND_OPTIONS.has(word)) afterKeyOperandOption = true;
      }
      if (!KEY_FILE_NAME.test(word) || word.includes('://') || word.startsWith('-')) continue;
      if (gpg && afterKeyOperandOption) return word;
      fallback ??= word;
    }
  }
  return fallback;
}

/** True when a gpg invocation in the command writes a keyring or an output file. */
export function writesKeyMaterial(text: string): boolean {
  return stageWords(text).some(
    words => isGpgStage(words) && words.some((word, i) => isDestinationWord(word, words[i - 1]))
  );
}

/**
 * Why a detected key verification command cannot be replaced by an enforced check,
 * or null when it can.
 */
export function keyVerificationGap(text: string, options: KeyVerificationOptions): string | null {
  if (!options.expectedFingerprint) return 'no expected fingerprint configured';
  if (!(findKeyFile(text) ?? options.keyFile)) return 'no key file named by the command or configured';
  return null;
}

function classifyKeyVerification(command: Command, options: SubstitutionOptions): SegmentPlan | null {
  if (!isKeyVerificationCommand(command.text)) return null;
  const expectedFingerprint = options.keyVerification.expectedFingerprint;
  const keyFile = findKeyFile(command.text) ?? options.keyVerification.keyFile;
  // Without both values the command stays as written; the validator reports the gap
  if (!expectedFingerprint || !keyFile) return null;
  return {
    kind: 'key-verification',
    keyFile,
    expectedFingerprint,
    keepCommand: writesKeyMaterial(command.text),
  };
}

const CLASSIFIERS: readonly Classifier[] = [classifyPrerequisiteInstall, classifyKeyVerification];

export function classifyCommand(command: Command, options: SubstitutionOptions): SegmentPlan {
  for (const classify of CLASSIFIERS) {
    const plan = classify(command, options);
    if (plan) return plan;
  }
  return { kind: 'verbatim' };
}

/** Escapes text for embedding inside a double-quoted shell string. */
export function escapeDoubleQuoted(text: string): string {
  return text.replace(/[\\"$`]/g, '\\$&');
}

type Renderer<K extends SegmentPlan['kind']> = (plan: Extract<SegmentPlan, { kind: K }>, command: Command) => string[];

export const RENDERERS: { [K in SegmentPlan['kind']]: Renderer<K> } = {
  'prerequisite-noop': plan => [`# skipped: ${plan.packages.join(' ')} already installed by the prologue`, ':'],

  'key-verification': (plan, command) => [
    `KEY_FILE="${escapeDoubleQuoted(plan.keyFile)}"`,
    `EXPECTED_FINGERPRINT="${plan.expectedFingerprint}"`,
    'gpg --batch --import "$KEY_FILE"',
    `ACTUAL_FINGERPRINT="$(gpg --batch --with-colons --import-options show-only --import "$KEY_FILE" | awk -F: '$1 == "fpr" && !found { print $10; found = 1 }')"`,
    'if [ "$ACTUAL_FINGERPRINT" != "$EXPECTED_FINGERPRINT" ]; then',
    '  echo "Key fingerprint mismatch for $KEY_FILE" >&2',
    '  echo "  expected: $EXPECTED_FINGERPRINT" >&2',
    '  echo "  actual:   $ACTUAL_FINGERPRINT" >&2',
    '  exit 1',
    'fi',
    'echo "Key fingerprint verified: $ACTUAL_FINGERPRINT"',
    ...(plan.keepCommand ? [command.text] : []),
  ],

  verbatim: (_plan, command) => [command.text],
};

export function renderPlan(plan: SegmentPlan, command: Command): string[] {
  switch (plan.kind) {
    case 'prerequisite-noop':
      return RENDERERS['prerequisite-noop'](plan, command);
    case 'key-verification':
      return RENDERERS['key-verification'](plan, command);
    case 'verbatim':
      return RENDERERS.verbatim(plan, command);
  }
}

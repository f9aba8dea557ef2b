import type { Command, CommandRule, CommandSet, RawBlock } from './types.js';
import { logger } from '../shared/logger.js';

export type RejectReason = 'markup' | 'empty' | 'comment' | 'invalid-start' | 'informational';

export type NormalizeOutcome =
  | { kind: 'command'; text: string }
  | { kind: 'rejected'; reason: RejectReason; ruleId?: string };

// Anything that survived as a literal tag means the scanner cut the block in the wrong place
const MARKUP_TAG = /<\/?[a-zA-Z][\w:-]*(?:\s[^<>]*)?\/?>/;

// Letters, digits and the punctuation a shell command line can legitimately begin with:
// paths, variable expansions, subshells, groups, tests, negation, input redirection, quoting.
const COMMAND_START = /^[A-Za-z0-9_./~$({[!<'"\\]/;

/** Decodes the four entities a code block escapes. `&amp;` goes last so `&amp;lt;` stays `&lt;`. */
export function decodeEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, '&');
}

export function cleanBlockText(text: string): string {
  return text
    .split('\n')
    .map(line => line.replace(/\s+$/, ''))
    .join('\n')
    .trim();
}

export function normalizeBlock(raw: string, informational: readonly CommandRule[]): NormalizeOutcome {
  if (MARKUP_TAG.test(raw)) return { kind: 'rejected', reason: 'markup' };

  const text = cleanBlockText(decodeEntities(raw));
  if (text === '') return { kind: 'rejected', reason: 'empty' };
  if (text.startsWith('#')) return { kind: 'rejected', reason: 'comment' };
  if (!COMMAND_START.test(text)) return { kind: 'rejected', reason: 'invalid-start' };

  const rule = informational.find(r => r.matcher.test(text));
  if (rule) return { kind: 'rejected', reason: 'informational', ruleId: rule.id };

  return { kind: 'command', text };
}

/**
 * Turns raw blocks into the ordered, de-duplicated command set.
 * Rejected blocks are dropped silently (logged at debug); the first occurrence of a text wins.
 */
export function normalizeBlocks(blocks: Iterable<RawBlock>, informational: readonly CommandRule[] = []): CommandSet {
  const seen = new Set<string>();
  const commands: Command[] = [];

  for (const block of blocks) {
    const outcome = normalizeBlock(block.text, informational);
    if (outcome.kind === 'rejected') {
      logger.debug({ startLine: block.startLine, reason: outcome.reason, ruleId: outcome.ruleId }, 'Dropped code block');
      continue;
    }
    if (seen.has(outcome.text)) {
      logger.debug({ startLine: block.startLine }, 'Dropped duplicate command');
      continue;
    }
    seen.add(outcome.text);
    commands.push(
      Object.freeze({
        index: commands.length,
        text: outcome.text,
        origin: Object.freeze({ startLine: block.startLine, endLine: block.endLine }),
      })
    );
  }

  return Object.freeze(commands);
}

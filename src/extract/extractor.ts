// Block extractor: a line-oriented two-state scanner over HTML text.
// A block opens on a container tag carrying the block class and ends at either the
// UI control tag (e.g. a copy button) or the container's closing tag. No DOM is built;
// markup inside a block is left for the normalizer to reject.
import type { BlockMarkers, RawBlock } from './types.js';
import { logger } from '../shared/logger.js';

type ScanState = 'outside' | 'inside';

interface TagMatch {
  start: number;
  end: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const CLASS_ATTR = /(?:^|\s)class\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/i;

function hasClass(attributes: string, className: string): boolean {
  const m = CLASS_ATTR.exec(attributes);
  if (!m) return false;
  const value = m[1] ?? m[2] ?? m[3] ?? '';
  return value.split(/\s+/).includes(className);
}

/** Finds the first opening `<tag ...>` whose class list contains `className`. */
export function findClassedTag(line: string, tag: string, className: string): TagMatch | null {
  const re = new RegExp(`<${escapeRegExp(tag)}\\b([^>]*)>`, 'gi');
  let m: RegExpExecArray | null;
  while ((m = re.exec(line)) !== null) {
    if (hasClass(m[1] ?? '', className)) {
      return { start: m.index, end: m.index + m[0].length };
    }
  }
  return null;
}

function findClosingTag(line: string, tag: string): TagMatch | null {
  const m = new RegExp(`</${escapeRegExp(tag)}\\s*>`, 'i').exec(line);
  return m ? { start: m.index, end: m.index + m[0].length } : null;
}

export class BlockScanner {
  private state: ScanState = 'outside';
  private parts: string[] = [];
  private startLine = 0;

  constructor(private readonly markers: BlockMarkers) {}

  /** Consumes one line and returns the blocks it completed (usually zero or one). */
  feed(line: string, lineNumber: number): RawBlock[] {
    const emitted: RawBlock[] = [];
    let rest = line;

    while (true) {
      if (this.state === 'outside') {
        const open = findClassedTag(rest, this.markers.containerTag, this.markers.blockClass);
        if (!open) return emitted;
        this.state = 'inside';
        this.parts = [];
        this.startLine = lineNumber;
        rest = rest.slice(open.end);
        continue;
      }

      const control = findClassedTag(rest, this.markers.controlTag, this.markers.controlClass);
      const close = findClosingTag(rest, this.markers.containerTag);

      if (control && (!close || control.start < close.start)) {
        this.parts.push(rest.slice(0, control.start));
        this.emit(lineNumber, emitted);
        // Whatever follows the control on this line belongs to the widget, not the command
        return emitted;
      }
      if (close) {
        this.parts.push(rest.slice(0, close.start));
        this.emit(lineNumber, emitted);
        rest = rest.slice(close.end);
        continue;
      }
      this.parts.push(rest);
      return emitted;
    }
  }

  /** Ends the stream; an unterminated block is dropped. */
  finish(): void {
    if (this.state === 'inside') {
      logger.debug({ startLine: this.startLine }, 'Dropping unterminated code block');
    }
    this.state = 'outside';
    this.parts = [];
  }

  private emit(endLine: number, into: RawBlock[]): void {
    const text = this.parts.join('\n');
    this.state = 'outside';
    this.parts = [];
    if (text.trim() === '') return;
    into.push({ text, startLine: this.startLine, endLine });
  }
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/** Lazily yields the code blocks of `lines` in document order. Single pass. */
export function* extractBlocks(lines: Iterable<string>, markers: BlockMarkers): Generator<RawBlock, void, undefined> {
  const scanner = new BlockScanner(markers);
  let lineNumber = 0;
  for (const line of lines) {
    lineNumber += 1;
    yield* scanner.feed(line, lineNumber);
  }
  scanner.finish();
}

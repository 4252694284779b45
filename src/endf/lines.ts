import { UnexpectedEndOfStreamError } from './errors.js';
import { DATA_WIDTH, decodeInteger } from './fields.js';

export const LINE_WIDTH = 80;

/** One card image with its MAT/MF/MT/NS tail already decoded. */
export interface EndfLine {
  /** 1-based physical line number in the stream. */
  lineNumber: number;
  /** Columns 1-66. */
  data: string;
  mat: number;
  mf: number;
  mt: number;
  ns: number;
}

export function preprocessLine(raw: string): string {
  return raw.length >= LINE_WIDTH ? raw.slice(0, LINE_WIDTH) : raw.padEnd(LINE_WIDTH, ' ');
}

export function decodeLine(raw: string, lineNumber: number): EndfLine {
  const line = preprocessLine(raw);
  return {
    lineNumber,
    data: line.slice(0, DATA_WIDTH),
    mat: decodeInteger(line.slice(66, 70), lineNumber),
    mf: decodeInteger(line.slice(70, 72), lineNumber),
    mt: decodeInteger(line.slice(72, 75), lineNumber),
    ns: decodeInteger(line.slice(75, 80), lineNumber),
  };
}

export function splitTapeLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  while (lines.length > 0 && (lines.at(-1) ?? '').trim().length === 0) {
    lines.pop();
  }
  return lines;
}

/**
 * Forward-only cursor over the physical lines of one tape. Lines are decoded
 * lazily, so a malformed tail is only reported once the cursor reaches it.
 */
export class LineSource {
  private readonly lines: string[];
  private index = 0;

  constructor(content: string | string[]) {
    this.lines = typeof content === 'string' ? splitTapeLines(content) : content;
  }

  get position(): number {
    return this.index;
  }

  atEnd(): boolean {
    return this.index >= this.lines.length;
  }

  peek(): EndfLine | null {
    const raw = this.lines[this.index];
    return raw === undefined ? null : decodeLine(raw, this.index + 1);
  }

  next(expected: string): EndfLine {
    const raw = this.lines[this.index];
    if (raw === undefined) {
      throw new UnexpectedEndOfStreamError(expected, this.index);
    }
    this.index += 1;
    return decodeLine(raw, this.index);
  }
}

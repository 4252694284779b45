import { MalformedFieldError, UnexpectedEndOfStreamError, UnexpectedRecordError } from './errors.js';
import { decodeFloat, decodeInteger, SLOTS_PER_LINE, splitSlots } from './fields.js';
import { LineSource, type EndfLine } from './lines.js';
import { readTab1 } from './tab1.js';
import type {
  BareControlRecord,
  ControlRecord,
  HeadRecord,
  ListRecord,
  Tab1Record,
  TextRecord,
} from './types.js';

/** A raw data slot together with the line it came from, for error reporting. */
export interface LocatedSlot {
  slot: string;
  line: number;
}

/**
 * Decodes the five ENDF record shapes from a {@link LineSource}. Each read
 * consumes exactly the lines its shape occupies and nothing else.
 */
export class RecordReader {
  readonly source: LineSource;

  constructor(source: LineSource | string) {
    this.source = typeof source === 'string' ? new LineSource(source) : source;
  }

  peek(): EndfLine | null {
    return this.source.peek();
  }

  nextLine(expected: string): EndfLine {
    return this.source.next(expected);
  }

  readText(): TextRecord {
    const line = this.nextLine('TEXT record');
    return { text: line.data, mat: line.mat, mf: line.mf, mt: line.mt, ns: line.ns };
  }

  readControl(): ControlRecord;
  readControl(skipC1C2: true): BareControlRecord;
  readControl(skipC1C2: boolean): ControlRecord | BareControlRecord;
  readControl(skipC1C2 = false): ControlRecord | BareControlRecord {
    const line = this.nextLine('CONT record');
    const [s1 = '', s2 = '', s3 = '', s4 = '', s5 = '', s6 = ''] = splitSlots(line.data);
    const n = line.lineNumber;
    const rest = {
      l1: decodeInteger(s3, n),
      l2: decodeInteger(s4, n),
      n1: decodeInteger(s5, n),
      n2: decodeInteger(s6, n),
      mat: line.mat,
      mf: line.mf,
      mt: line.mt,
      ns: line.ns,
    };
    if (skipC1C2) {
      return { c1: null, c2: null, ...rest };
    }
    return { c1: decodeFloat(s1, n), c2: decodeFloat(s2, n), ...rest };
  }

  readHead(): HeadRecord {
    const control = this.readControl();
    return { ...control, za: Math.round(control.c1), awr: control.c2 };
  }

  /**
   * Reads `count` slots packed six per line. The last line may be partly
   * filled; its unused slots are ignored.
   */
  readSlots(count: number, expected: string): LocatedSlot[] {
    const out: LocatedSlot[] = [];
    while (out.length < count) {
      const line = this.nextLine(expected);
      const toRead = Math.min(SLOTS_PER_LINE, count - out.length);
      for (const slot of splitSlots(line.data, toRead)) {
        out.push({ slot, line: line.lineNumber });
      }
    }
    return out;
  }

  /** Rejects a negative record count taken from the control line just read. */
  requireCount(count: number, name: string): number {
    if (count < 0) {
      throw new MalformedFieldError(String(count), this.source.position, `non-negative ${name}`);
    }
    return count;
  }

  readList(): ListRecord {
    const control = this.readControl();
    const npl = this.requireCount(control.n1, 'NPL');
    const values = this.readSlots(npl, `LIST body (NPL=${npl})`)
      .map(({ slot, line }) => decodeFloat(slot, line));
    return { control, values };
  }

  readTab1(): Tab1Record {
    return readTab1(this);
  }

  /** Advances to the first line belonging to file `mf`. */
  seekFile(mf: number): void {
    for (;;) {
      const line = this.peek();
      if (line === null) {
        throw new UnexpectedEndOfStreamError(`first record of MF=${mf}`, this.source.position);
      }
      if (line.mf === mf) return;
      this.source.next(`first record of MF=${mf}`);
    }
  }

  /** Consumes the rest of section (mf, mt) up to, not including, its SEND line. */
  skipSection(mf: number, mt: number): number {
    let skipped = 0;
    for (let line = this.peek(); line !== null && line.mf === mf && line.mt === mt; line = this.peek()) {
      this.source.next(`MF=${mf} MT=${mt} body`);
      skipped += 1;
    }
    return skipped;
  }

  readSectionEnd(mf: number): void {
    const expected = `SEND record (MF=${mf} MT=0)`;
    const line = this.nextLine(expected);
    if (line.mf !== mf || line.mt !== 0) {
      throw new UnexpectedRecordError(line, line.lineNumber, expected);
    }
  }

  /** Consumes FEND/MEND/TEND lines (MT=0) sitting between sections. */
  skipSeparators(): void {
    for (let line = this.peek(); line !== null && line.mt === 0; line = this.peek()) {
      this.source.next('section separator');
    }
  }
}

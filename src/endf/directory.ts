import { UnterminatedDirectoryError } from './errors.js';
import type { RecordReader } from './reader.js';
import type { DirectoryEntry } from './types.js';

/**
 * Reads directory lines (C1/C2 blank, then MF, MT, NC, MOD) until the line
 * whose MT field is 0. That line is the SEND of MF=1/MT=451 and is consumed.
 */
export function readDirectory(reader: RecordReader): DirectoryEntry[] {
  const entries: DirectoryEntry[] = [];
  for (;;) {
    const line = reader.peek();
    if (line === null) {
      throw new UnterminatedDirectoryError(entries.length, reader.source.position);
    }
    if (line.mt === 0) {
      reader.nextLine('directory SEND record');
      return entries;
    }
    const record = reader.readControl(true);
    entries.push({ mf: record.l1, mt: record.l2, nc: record.n1, mod: record.n2 });
  }
}

export function sectionKey(mf: number, mt: number): string {
  return `${mf}/${mt}`;
}

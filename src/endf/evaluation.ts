import { logInfo } from '../utils/logging.js';
import { readDirectory } from './directory.js';
import { UnexpectedEndOfStreamError, UnexpectedRecordError } from './errors.js';
import { decodeInteger } from './fields.js';
import { readHeaderSection } from './header.js';
import { LineSource, preprocessLine, splitTapeLines } from './lines.js';
import { RecordReader } from './reader.js';
import { getSectionParser } from './sections.js';
import type { DirectoryEntry, EndfFile, Evaluation, Reaction } from './types.js';

export interface ParseOptions {
  /** Log one line per dispatched section. */
  verbose?: boolean;
  /** Checked between sections; a section in progress always completes. */
  signal?: AbortSignal;
}

interface FileBuilder {
  mf: number;
  reactions: Reaction[];
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
}

function positionOnSection(reader: RecordReader, entry: DirectoryEntry): void {
  const expected = `HEAD record of MF=${entry.mf} MT=${entry.mt}`;
  reader.skipSeparators();
  const line = reader.peek();
  if (line === null) {
    throw new UnexpectedEndOfStreamError(expected, reader.source.position);
  }
  if (line.mf !== entry.mf || line.mt !== entry.mt) {
    throw new UnexpectedRecordError(line, line.lineNumber, expected);
  }
}

/**
 * Decodes one material: the MF=1/MT=451 header and directory, then every
 * section the directory lists, in order. Sections without a parser are
 * stepped over. Nothing is returned unless the whole pass succeeds.
 */
export function parseEvaluation(content: string | LineSource, options: ParseOptions = {}): Evaluation {
  const reader = new RecordReader(content);
  const { verbose = false, signal } = options;

  reader.seekFile(1);
  const header = readHeaderSection(reader);
  const directory = readDirectory(reader);
  if (verbose) logInfo(`MAT=${header.mat} ZA=${header.ZA}: ${directory.length} directory entries`);

  const files: FileBuilder[] = [];
  // The first entry is MF=1/MT=451, consumed above.
  for (const entry of directory.slice(1)) {
    signal?.throwIfAborted();
    positionOnSection(reader, entry);

    const parser = getSectionParser(entry.mf, entry.mt);
    if (parser) {
      const data = parser(reader, entry);
      let file = files.find((f) => f.mf === entry.mf);
      if (!file) {
        file = { mf: entry.mf, reactions: [] };
        files.push(file);
      }
      file.reactions.push({ mf: entry.mf, mt: entry.mt, data });
    }

    const leftover = reader.skipSection(entry.mf, entry.mt);
    reader.readSectionEnd(entry.mf);
    if (verbose) {
      logInfo(parser
        ? `MF=${entry.mf} MT=${entry.mt} parsed${leftover > 0 ? ` (${leftover} lines not decoded)` : ''}`
        : `MF=${entry.mf} MT=${entry.mt} skipped (${leftover} lines)`);
    }
  }

  const evaluation: Evaluation = { mat: header.mat, header, directory, files };
  deepFreeze(evaluation);
  return evaluation;
}

export function findFile(evaluation: Evaluation, mf: number): EndfFile | undefined {
  return evaluation.files.find((f) => f.mf === mf);
}

export function findReaction(evaluation: Evaluation, mt: number, mf?: number): Reaction | undefined {
  for (const file of evaluation.files) {
    if (mf !== undefined && file.mf !== mf) continue;
    const reaction = file.reactions.find((r) => r.mt === mt);
    if (reaction) return reaction;
  }
  return undefined;
}

export function listReactions(evaluation: Evaluation): Reaction[] {
  return evaluation.files.flatMap((f) => [...f.reactions]);
}

/** File numbers present on a tape (MF=0 separators excluded), ascending. */
export function scanFileNumbers(content: string): number[] {
  const found = new Set<number>();
  splitTapeLines(content).forEach((raw, i) => {
    const mf = decodeInteger(preprocessLine(raw).slice(70, 72), i + 1);
    if (mf !== 0) found.add(mf);
  });
  return [...found].sort((a, b) => a - b);
}

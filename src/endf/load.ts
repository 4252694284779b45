import * as fs from 'fs';
import * as zlib from 'zlib';
import { parseEvaluation, type ParseOptions } from './evaluation.js';
import type { Evaluation } from './types.js';

export function decodeTapeBuffer(buffer: Buffer, sourceName: string): string {
  const decoded = sourceName.toLowerCase().endsWith('.gz') ? zlib.gunzipSync(buffer) : buffer;
  return decoded.toString('utf-8');
}

export function readTapeText(filePath: string): string {
  return decodeTapeBuffer(fs.readFileSync(filePath), filePath);
}

export function loadEvaluation(filePath: string, options: ParseOptions = {}): Evaluation {
  return parseEvaluation(readTapeText(filePath), options);
}

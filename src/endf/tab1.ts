import { MalformedFieldError } from './errors.js';
import { decodeFloat, decodeInteger } from './fields.js';
import type { RecordReader } from './reader.js';
import type { Tab1Record } from './types.js';

export interface InterpolationRegion {
  /** Index of the last point in the region (1-based). */
  nbt: number;
  law: number;
}

export interface Tab1Point {
  x: number;
  y: number;
}

/**
 * Reads a TAB1 record: one CONT carrying NR (N1) and NP (N2), then NR
 * (NBT, INT) pairs and NP (x, y) pairs, each packed three pairs per line.
 */
export function readTab1(reader: RecordReader): Tab1Record {
  const control = reader.readControl();
  const nr = reader.requireCount(control.n1, 'NR');
  const np = reader.requireCount(control.n2, 'NP');

  const regionSlots = reader.readSlots(nr * 2, `TAB1 interpolation regions (NR=${nr})`);
  const nbt: number[] = [];
  const interpolation: number[] = [];
  for (let i = 0; i + 1 < regionSlots.length; i += 2) {
    const [b, law] = [regionSlots[i]!, regionSlots[i + 1]!];
    nbt.push(decodeInteger(b.slot, b.line));
    interpolation.push(decodeInteger(law.slot, law.line));
  }

  const pointSlots = reader.readSlots(np * 2, `TAB1 points (NP=${np})`);
  const x: number[] = [];
  const y: number[] = [];
  for (let i = 0; i + 1 < pointSlots.length; i += 2) {
    const [xs, ys] = [pointSlots[i]!, pointSlots[i + 1]!];
    x.push(decodeFloat(xs.slot, xs.line));
    y.push(decodeFloat(ys.slot, ys.line));
  }

  validateBreakpoints(nbt, np, regionSlots.at(-1)?.line ?? null);
  return { control, nbt, interpolation, x, y };
}

function validateBreakpoints(nbt: number[], np: number, line: number | null): void {
  for (let i = 1; i < nbt.length; i += 1) {
    if (nbt[i]! <= nbt[i - 1]!) {
      throw new MalformedFieldError(String(nbt[i]), line, `NBT greater than ${nbt[i - 1]}`);
    }
  }
  const last = nbt.at(-1);
  if (last !== undefined && last !== np) {
    throw new MalformedFieldError(String(last), line, `last NBT equal to NP=${np}`);
  }
}

export function interpolationRegions(record: Tab1Record): InterpolationRegion[] {
  return record.nbt.map((nbt, i) => ({ nbt, law: record.interpolation[i] ?? 0 }));
}

export function tab1Points(record: Tab1Record): Tab1Point[] {
  return record.x.map((x, i) => ({ x, y: record.y[i] ?? 0 }));
}

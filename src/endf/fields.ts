import { MalformedFieldError } from './errors.js';

export const SLOT_WIDTH = 11;
export const SLOTS_PER_LINE = 6;
export const DATA_WIDTH = SLOT_WIDTH * SLOTS_PER_LINE;

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?$/;
// ENDF drops the exponent marker: "1.23456+5" is 1.23456e+5.
const SUFFIX_EXPONENT_RE = /^([+-]?(?:\d+\.\d*|\.\d+|\d+))([+-]\d{1,3})$/;

export function decodeInteger(slot: string, line: number | null = null): number {
  const raw = slot.trim();
  if (raw.length === 0) return 0;
  if (!INTEGER_RE.test(raw)) {
    throw new MalformedFieldError(slot, line, 'integer');
  }
  return Number(raw);
}

export function decodeFloat(slot: string, line: number | null = null): number {
  return decodeOptionalFloat(slot, line) ?? 0;
}

/** Same shapes as {@link decodeFloat}, but a blank slot decodes to `null`. */
export function decodeOptionalFloat(slot: string, line: number | null = null): number | null {
  const raw = slot.trim();
  if (raw.length === 0) return null;
  if (DECIMAL_RE.test(raw)) return Number(raw);
  const m = raw.match(SUFFIX_EXPONENT_RE);
  if (m) return Number(`${m[1]}e${m[2]}`);
  throw new MalformedFieldError(slot, line, 'float');
}

/** Cuts the 66-column data area into `count` consecutive 11-character slots. */
export function splitSlots(data: string, count: number = SLOTS_PER_LINE): string[] {
  const slots: string[] = [];
  for (let i = 0; i < count; i += 1) {
    slots.push(data.slice(i * SLOT_WIDTH, (i + 1) * SLOT_WIDTH));
  }
  return slots;
}

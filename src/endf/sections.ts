import { sectionKey } from './directory.js';
import type { RecordReader } from './reader.js';
import type {
  DelayedNuData,
  DelayedPhotonData,
  DirectoryEntry,
  FissionEnergyData,
  NuRepresentation,
  PromptNuData,
  ReactionData,
  TotalNuData,
} from './types.js';

/**
 * Decodes the body of one section. The cursor starts on the section's HEAD
 * record; whatever the parser leaves unread of the section, and its SEND
 * line, are consumed by the dispatcher afterwards.
 */
export type SectionParser = (reader: RecordReader, entry: DirectoryEntry) => ReactionData;

function readNu(reader: RecordReader, lnu: number): NuRepresentation | null {
  if (lnu === 1) return { lnu: 1, coefficients: reader.readList().values };
  if (lnu === 2) return { lnu: 2, table: reader.readTab1() };
  return null;
}

export function readTotalNu(reader: RecordReader): TotalNuData {
  const head = reader.readHead();
  const lnu = head.l2;
  return { kind: 'total_nu', head, lnu, nu: readNu(reader, lnu) };
}

export function readDelayedNu(reader: RecordReader): DelayedNuData {
  const head = reader.readHead();
  const ldg = head.l1;
  const lnu = head.l2;
  // LDG=1 (energy-dependent group constants) is not decoded.
  if (ldg !== 0) {
    return { kind: 'delayed_nu', head, ldg, lnu, decayConstants: null, nu: null };
  }
  const decayConstants = reader.readList().values;
  return { kind: 'delayed_nu', head, ldg, lnu, decayConstants, nu: readNu(reader, lnu) };
}

export function readPromptNu(reader: RecordReader): PromptNuData {
  const head = reader.readHead();
  const lnu = head.l2;
  return { kind: 'prompt_nu', head, lnu, nu: readNu(reader, lnu) };
}

export function readFissionEnergy(reader: RecordReader): FissionEnergyData {
  const head = reader.readHead();
  return { kind: 'fission_energy', head, lfc: head.l2, nfc: head.n2 };
}

export function readDelayedPhoton(reader: RecordReader): DelayedPhotonData {
  const head = reader.readHead();
  return { kind: 'delayed_photon', head, lo: head.l1, ng: head.n1 };
}

export const SECTION_PARSERS: ReadonlyMap<string, SectionParser> = new Map<string, SectionParser>([
  [sectionKey(1, 452), readTotalNu],
  [sectionKey(1, 455), readDelayedNu],
  [sectionKey(1, 456), readPromptNu],
  [sectionKey(1, 458), readFissionEnergy],
  [sectionKey(1, 460), readDelayedPhoton],
]);

export function getSectionParser(mf: number, mt: number): SectionParser | undefined {
  return SECTION_PARSERS.get(sectionKey(mf, mt));
}

export function isSupportedSection(mf: number, mt: number): boolean {
  return SECTION_PARSERS.has(sectionKey(mf, mt));
}

export function supportedSections(): Array<{ mf: number; mt: number }> {
  return [...SECTION_PARSERS.keys()].map((key) => {
    const [mf = 0, mt = 0] = key.split('/').map(Number);
    return { mf, mt };
  });
}

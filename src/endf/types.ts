// ── Records ────────────────────────────────────────────────────────────────

export interface RecordTail {
  mat: number;
  mf: number;
  mt: number;
  ns: number;
}

export interface TextRecord extends RecordTail {
  /** Columns 1-66, not trimmed. */
  text: string;
}

export interface ControlRecord extends RecordTail {
  c1: number;
  c2: number;
  l1: number;
  l2: number;
  n1: number;
  n2: number;
}

/** CONT read with C1/C2 left undecoded (directory lines). */
export interface BareControlRecord extends Omit<ControlRecord, 'c1' | 'c2'> {
  c1: null;
  c2: null;
}

/** A CONT whose C1/C2 are ZA (rounded to an integer) and AWR. */
export interface HeadRecord extends ControlRecord {
  za: number;
  awr: number;
}

export interface ListRecord {
  control: ControlRecord;
  /** NPL values, in tape order. */
  values: number[];
}

export interface Tab1Record {
  control: ControlRecord;
  /** Breakpoint indices, 1-based into `x`/`y`. */
  nbt: number[];
  /** Interpolation law per region. */
  interpolation: number[];
  x: number[];
  y: number[];
}

// ── Directory ──────────────────────────────────────────────────────────────

export interface DirectoryEntry {
  mf: number;
  mt: number;
  /** Number of card images in the section. */
  nc: number;
  /** Modification number. */
  mod: number;
}

// ── Document ───────────────────────────────────────────────────────────────

export interface EvaluationHeader {
  mat: number;
  ZA: number;
  AWR: number;
  LRP: number;
  LFI: number;
  NLIB: number;
  NMOD: number;
  ELIS: number;
  STA: number;
  LIS: number;
  LISO: number;
  NFOR: number;
  AWI: number;
  EMAX: number;
  LREL: number;
  NSUB: number;
  NVER: number;
  TEMP: number;
  LDRV: number;
  NWD: number;
  NXC: number;
  ZSYMAM: string;
  ALAB: string;
  EDATE: string;
  AUTH: string;
  REF: string;
  DDATE: string;
  RDATE: string;
  ENDATE: string;
  HSUB: string;
  description: string[];
}

/** Nu representation selected by LNU. */
export type NuRepresentation =
  | { lnu: 1; coefficients: number[] }
  | { lnu: 2; table: Tab1Record };

export interface TotalNuData {
  kind: 'total_nu';
  head: HeadRecord;
  lnu: number;
  /** `null` when LNU is neither 1 nor 2. */
  nu: NuRepresentation | null;
}

export interface DelayedNuData {
  kind: 'delayed_nu';
  head: HeadRecord;
  ldg: number;
  lnu: number;
  /** Energy-independent decay constants (LDG=0 only). */
  decayConstants: number[] | null;
  nu: NuRepresentation | null;
}

export interface PromptNuData {
  kind: 'prompt_nu';
  head: HeadRecord;
  lnu: number;
  nu: NuRepresentation | null;
}

export interface FissionEnergyData {
  kind: 'fission_energy';
  head: HeadRecord;
  lfc: number;
  nfc: number;
}

export interface DelayedPhotonData {
  kind: 'delayed_photon';
  head: HeadRecord;
  lo: number;
  ng: number;
}

export type ReactionData =
  | TotalNuData
  | DelayedNuData
  | PromptNuData
  | FissionEnergyData
  | DelayedPhotonData;

export interface Reaction {
  readonly mf: number;
  readonly mt: number;
  readonly data: ReactionData;
}

export interface EndfFile {
  readonly mf: number;
  readonly reactions: readonly Reaction[];
}

export interface Evaluation {
  readonly mat: number;
  readonly header: EvaluationHeader;
  readonly directory: readonly DirectoryEntry[];
  readonly files: readonly EndfFile[];
}

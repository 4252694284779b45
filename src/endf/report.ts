import { isSupportedSection } from './sections.js';
import { fileName, libraryName, sectionName } from './names.js';
import type { Evaluation, NuRepresentation, Reaction, Tab1Record } from './types.js';

export interface ReactionSummary {
  mt: number;
  name: string;
  kind: string;
  representation: string | null;
}

export interface EvaluationSummary {
  label: string;
  mat: number;
  ZA: number;
  AWR: number;
  library: string | null;
  NLIB: number;
  NVER: number;
  NSUB: number;
  TEMP: number;
  ZSYMAM: string;
  ALAB: string;
  EDATE: string;
  AUTH: string;
  directory_entries: number;
  files: Array<{ mf: number; name: string; reactions: ReactionSummary[] }>;
  skipped: Array<{ mf: number; mt: number; name: string }>;
}

export function evaluationLabel(evaluation: Evaluation): string {
  const name = libraryName(evaluation.header.NLIB) ?? 'Undetermined';
  return `<${name} Evaluation: ${evaluation.header.ZA}>`;
}

function describeNu(nu: NuRepresentation | null): string | null {
  if (nu === null) return null;
  return nu.lnu === 1
    ? `polynomial (${nu.coefficients.length} coefficients)`
    : `tabulated (${nu.table.x.length} points)`;
}

function representationOf(reaction: Reaction): string | null {
  const { data } = reaction;
  switch (data.kind) {
    case 'total_nu':
    case 'prompt_nu':
    case 'delayed_nu':
      return describeNu(data.nu);
    case 'fission_energy':
    case 'delayed_photon':
      return null;
  }
}

/** The TAB1 function a reaction carries, if its representation is tabulated. */
export function reactionTable(reaction: Reaction): Tab1Record | null {
  const { data } = reaction;
  if (data.kind === 'fission_energy' || data.kind === 'delayed_photon') return null;
  const { nu } = data;
  return nu !== null && nu.lnu === 2 ? nu.table : null;
}

export function summarizeReaction(reaction: Reaction): ReactionSummary {
  return {
    mt: reaction.mt,
    name: sectionName(reaction.mt),
    kind: reaction.data.kind,
    representation: representationOf(reaction),
  };
}

export function summarizeEvaluation(evaluation: Evaluation): EvaluationSummary {
  const { header } = evaluation;
  return {
    label: evaluationLabel(evaluation),
    mat: evaluation.mat,
    ZA: header.ZA,
    AWR: header.AWR,
    library: libraryName(header.NLIB) ?? null,
    NLIB: header.NLIB,
    NVER: header.NVER,
    NSUB: header.NSUB,
    TEMP: header.TEMP,
    ZSYMAM: header.ZSYMAM,
    ALAB: header.ALAB,
    EDATE: header.EDATE,
    AUTH: header.AUTH,
    directory_entries: evaluation.directory.length,
    files: evaluation.files.map((file) => ({
      mf: file.mf,
      name: fileName(file.mf),
      reactions: file.reactions.map(summarizeReaction),
    })),
    skipped: evaluation.directory
      .slice(1)
      .filter((entry) => !isSupportedSection(entry.mf, entry.mt))
      .map((entry) => ({ mf: entry.mf, mt: entry.mt, name: sectionName(entry.mt) })),
  };
}

export function renderSummary(evaluation: Evaluation): string {
  const summary = summarizeEvaluation(evaluation);
  const lines = [
    summary.label,
    `  MAT=${summary.mat} ${summary.ZSYMAM} AWR=${summary.AWR}`,
    `  Lab: ${summary.ALAB}  Date: ${summary.EDATE}  Author: ${summary.AUTH}`,
  ];
  for (const file of summary.files) {
    lines.push(`  MF=${file.mf} ${file.name}`);
    for (const reaction of file.reactions) {
      const detail = reaction.representation ? `, ${reaction.representation}` : '';
      lines.push(`    MT=${reaction.mt} ${reaction.name} [${reaction.kind}${detail}]`);
    }
  }
  if (summary.skipped.length > 0) {
    lines.push(`  Not decoded: ${summary.skipped.map((s) => `MF=${s.mf}/MT=${s.mt}`).join(', ')}`);
  }
  return lines.join('\n');
}

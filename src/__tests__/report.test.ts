import { describe, it, expect } from 'vitest';
import { parseEvaluation } from '../endf/evaluation.js';
import { evaluationLabel, reactionTable, renderSummary, summarizeEvaluation } from '../endf/report.js';
import { libraryName, sectionName } from '../endf/names.js';
import { buildTape, opaqueSection, promptNuTabulated, totalNuPolynomial } from './tapeBuilder.js';

const POINTS: Array<[string, string]> = [['1.000000-5', '2.400000+0'], ['2.000000+7', '4.800000+0']];

describe('names', () => {
  it('maps library identifiers', () => {
    expect(libraryName(0)).toBe('ENDF/B');
    expect(libraryName(6)).toBe('JENDL');
    expect(libraryName(99)).toBeUndefined();
  });

  it('falls back to the bare MT for unnamed sections', () => {
    expect(sectionName(452)).toBe('Total Neutrons per Fission');
    expect(sectionName(999)).toBe('MT=999');
  });
});

describe('evaluationLabel', () => {
  it('names the library and nuclide', () => {
    const evaluation = parseEvaluation(buildTape([totalNuPolynomial(['2.436700+0'])]));
    expect(evaluationLabel(evaluation)).toBe('<ENDF/B Evaluation: 92235>');
  });

  it('reports an unknown library as undetermined', () => {
    const evaluation = parseEvaluation(buildTape([totalNuPolynomial(['2.436700+0'])], { nlib: 99 }));
    expect(evaluationLabel(evaluation)).toBe('<Undetermined Evaluation: 92235>');
  });
});

describe('summarizeEvaluation', () => {
  const evaluation = parseEvaluation(buildTape([
    totalNuPolynomial(['2.436700+0', '1.000000-7']),
    promptNuTabulated(POINTS),
    opaqueSection(3, 1),
  ]));

  it('lists decoded reactions per file and the sections left undecoded', () => {
    const summary = summarizeEvaluation(evaluation);
    expect(summary.library).toBe('ENDF/B');
    expect(summary.directory_entries).toBe(4);
    expect(summary.files).toEqual([
      {
        mf: 1,
        name: 'General information',
        reactions: [
          { mt: 452, name: 'Total Neutrons per Fission', kind: 'total_nu', representation: 'polynomial (2 coefficients)' },
          { mt: 456, name: 'Prompt Neutrons per Fission', kind: 'prompt_nu', representation: 'tabulated (2 points)' },
        ],
      },
    ]);
    expect(summary.skipped).toEqual([{ mf: 3, mt: 1, name: 'Total Cross Section' }]);
  });

  it('renders a plain-text summary', () => {
    expect(renderSummary(evaluation).split('\n')).toEqual([
      '<ENDF/B Evaluation: 92235>',
      '  MAT=9228 92-U-235 AWR=233.0248',
      '  Lab: TESTLAB  Date: EVAL-OCT26  Author: A. Tester',
      '  MF=1 General information',
      '    MT=452 Total Neutrons per Fission [total_nu, polynomial (2 coefficients)]',
      '    MT=456 Prompt Neutrons per Fission [prompt_nu, tabulated (2 points)]',
      '  Not decoded: MF=3/MT=1',
    ]);
  });

  it('finds the TAB1 of tabulated reactions only', () => {
    const [total, prompt] = evaluation.files[0]?.reactions ?? [];
    expect(total && reactionTable(total)).toBeNull();
    expect(prompt && reactionTable(prompt)?.x).toEqual([1e-5, 2e7]);
  });
});

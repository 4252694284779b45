import { z } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import { describeDataDir, getToolMode, isVerbose, resolveTapePath, type ToolExposureMode } from '../config.js';
import { findReaction, listReactions, scanFileNumbers } from '../endf/evaluation.js';
import { loadEvaluation, readTapeText } from '../endf/load.js';
import { fileName, libraryName, sectionName } from '../endf/names.js';
import { evaluationLabel, reactionTable, summarizeReaction } from '../endf/report.js';
import { isSupportedSection, supportedSections } from '../endf/sections.js';
import { interpolationRegions, tab1Points } from '../endf/tab1.js';
import type { Evaluation } from '../endf/types.js';
import { invalidParams, notFound } from '../shared/index.js';
import {
  ENDF_INFO,
  ENDF_READ_HEADER,
  ENDF_LIST_DIRECTORY,
  ENDF_GET_REACTION,
  ENDF_GET_TABULATED,
  ENDF_SCAN_FILES,
  SERVER_NAME,
  SERVER_VERSION,
  type EndfToolName,
} from '../constants.js';

export type { ToolExposureMode } from '../config.js';
export type ToolExposure = 'standard' | 'full';

export interface ToolHandlerContext {}

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: EndfToolName;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler(params: z.output<TSchema>, ctx: ToolHandlerContext): Promise<unknown>;
}

function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec {
  return spec;
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

function openEvaluation(tapePath: string): Evaluation {
  return loadEvaluation(resolveTapePath(tapePath), { verbose: isVerbose() });
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const TapePath = z.string().min(1).describe('ENDF-6 tape path (absolute, or relative to ENDF_DATA_DIR); .gz accepted');

const EndfInfoSchema = z.object({});

const EndfTapeSchema = z.object({
  path: TapePath,
});

const EndfGetReactionSchema = z.object({
  path: TapePath,
  mt: z.number().int().min(1).max(999).describe('Reaction type (e.g. 452 total nu, 456 prompt nu)'),
  mf: z.number().int().min(1).max(99).optional().default(1).describe('File number (default 1)'),
});

const EndfGetTabulatedSchema = EndfGetReactionSchema.extend({
  limit: z.number().int().min(1).max(5000).optional().default(500).describe('Maximum points returned'),
  offset: z.number().int().min(0).optional().default(0).describe('Points to skip'),
});

function requireReaction(evaluation: Evaluation, mf: number, mt: number) {
  const reaction = findReaction(evaluation, mt, mf);
  if (!reaction) {
    throw notFound(`No decoded section MF=${mf} MT=${mt}`, {
      mf,
      mt,
      available_mts: listReactions(evaluation).filter((r) => r.mf === mf).map((r) => r.mt),
    });
  }
  return reaction;
}

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: ENDF_INFO,
    description: 'Return server version, configuration status (ENDF_DATA_DIR, tool mode) and the list of decoded ENDF sections.',
    exposure: 'standard',
    zodSchema: EndfInfoSchema,
    handler: async () => ({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      tool_mode: getToolMode(),
      verbose: isVerbose(),
      data_dir: describeDataDir(),
      supported_sections: supportedSections().map((s) => ({ ...s, name: sectionName(s.mt) })),
    }),
  }),
  defineTool({
    name: ENDF_READ_HEADER,
    description: 'Read the MF=1/MT=451 descriptive header of an ENDF-6 tape: ZA, AWR, library, version, temperature, author, dates, description text.',
    exposure: 'standard',
    zodSchema: EndfTapeSchema,
    handler: async (params) => {
      const evaluation = openEvaluation(params.path);
      return {
        label: evaluationLabel(evaluation),
        library: libraryName(evaluation.header.NLIB) ?? null,
        ...evaluation.header,
      };
    },
  }),
  defineTool({
    name: ENDF_LIST_DIRECTORY,
    description: 'List the section directory (MF, MT, record count, modification) of an ENDF-6 tape, marking which sections are decoded.',
    exposure: 'standard',
    zodSchema: EndfTapeSchema,
    handler: async (params) => {
      const evaluation = openEvaluation(params.path);
      return {
        label: evaluationLabel(evaluation),
        entries: evaluation.directory.map((entry) => ({
          ...entry,
          file: fileName(entry.mf),
          name: sectionName(entry.mt),
          supported: isSupportedSection(entry.mf, entry.mt),
        })),
      };
    },
  }),
  defineTool({
    name: ENDF_GET_REACTION,
    description: 'Get the decoded payload of one section (e.g. MF=1 MT=452 total nu: polynomial coefficients or TAB1 function).',
    exposure: 'standard',
    zodSchema: EndfGetReactionSchema,
    handler: async (params) => {
      const evaluation = openEvaluation(params.path);
      const reaction = requireReaction(evaluation, params.mf, params.mt);
      return { ...summarizeReaction(reaction), mf: reaction.mf, data: reaction.data };
    },
  }),
  defineTool({
    name: ENDF_GET_TABULATED,
    description: 'Get the (x, y) points and interpolation regions of a section\'s TAB1 function, paginated by offset/limit.',
    exposure: 'standard',
    zodSchema: EndfGetTabulatedSchema,
    handler: async (params) => {
      const evaluation = openEvaluation(params.path);
      const reaction = requireReaction(evaluation, params.mf, params.mt);
      const table = reactionTable(reaction);
      if (!table) {
        throw invalidParams(`Section MF=${params.mf} MT=${params.mt} has no tabulated function`, {
          mf: params.mf,
          mt: params.mt,
          kind: reaction.data.kind,
        });
      }
      const points = tab1Points(table)
        .slice(params.offset, params.offset + params.limit)
        .map((p, i) => ({ point_index: params.offset + i + 1, ...p }));
      return {
        mf: reaction.mf,
        mt: reaction.mt,
        name: sectionName(reaction.mt),
        nr: table.nbt.length,
        np: table.x.length,
        regions: interpolationRegions(table),
        offset: params.offset,
        limit: params.limit,
        truncated: params.offset + points.length < table.x.length,
        points,
      };
    },
  }),
  defineTool({
    name: ENDF_SCAN_FILES,
    description: 'List the MF file numbers present on a tape without decoding any records.',
    exposure: 'full',
    zodSchema: EndfTapeSchema,
    handler: async (params) => {
      const files = scanFileNumbers(readTapeText(resolveTapePath(params.path)));
      return { files: files.map((mf) => ({ mf, name: fileName(mf) })) };
    },
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}

import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as zlib from 'zlib';
import { handleToolCall } from '../src/tools/dispatcher.js';
import {
  buildTape,
  opaqueSection,
  promptNuTabulated,
  totalNuPolynomial,
} from '../src/__tests__/tapeBuilder.js';

const POINTS: Array<[string, string]> = [
  ['1.000000-5', '2.400000+0'],
  ['1.000000+3', '2.410000+0'],
  ['1.000000+6', '2.500000+0'],
  ['1.000000+7', '3.600000+0'],
  ['2.000000+7', '4.800000+0'],
];

describe('ENDF tools', () => {
  const envBackup = {
    ENDF_DATA_DIR: process.env.ENDF_DATA_DIR,
    ENDF_TOOL_MODE: process.env.ENDF_TOOL_MODE,
    ENDF_VERBOSE: process.env.ENDF_VERBOSE,
  };
  const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'endf-tools-'));
  const tapePath = path.join(tmpRoot, 'u235.endf');
  const gzPath = path.join(tmpRoot, 'u235.endf.gz');
  const brokenPath = path.join(tmpRoot, 'broken.endf');
  const truncatedPath = path.join(tmpRoot, 'truncated.endf');

  beforeAll(() => {
    const tape = buildTape([
      totalNuPolynomial(['2.436700+0', '1.000000-7']),
      promptNuTabulated(POINTS),
      opaqueSection(3, 1),
    ]);
    fs.writeFileSync(tapePath, tape);
    fs.writeFileSync(gzPath, zlib.gzipSync(Buffer.from(tape, 'utf-8')));
    fs.writeFileSync(brokenPath, buildTape([promptNuTabulated([['1.000000-5', 'bad value']])]));
    fs.writeFileSync(truncatedPath, tape.split('\n').slice(0, 6).join('\n'));
    process.env.ENDF_DATA_DIR = tmpRoot;
    delete process.env.ENDF_TOOL_MODE;
    delete process.env.ENDF_VERBOSE;
  });

  afterAll(() => {
    for (const [key, value] of Object.entries(envBackup)) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  });

  it('endf_info reports configuration and decoded sections', async () => {
    const result = await handleToolCall('endf_info', {});
    expect(result.isError).toBeUndefined();
    const info = JSON.parse(result.content[0]!.text);
    expect(info.name).toBe('endf-mcp');
    expect(info.tool_mode).toBe('standard');
    expect(info.data_dir).toMatchObject({ status: 'ok', path: tmpRoot });
    expect(info.supported_sections).toContainEqual({ mf: 1, mt: 452, name: 'Total Neutrons per Fission' });
  });

  it('endf_read_header returns the descriptive header', async () => {
    const result = await handleToolCall('endf_read_header', { path: tapePath });
    const header = JSON.parse(result.content[0]!.text);
    expect(header).toMatchObject({
      label: '<ENDF/B Evaluation: 92235>',
      library: 'ENDF/B',
      ZA: 92235,
      AWR: 233.0248,
      NLIB: 0,
      NVER: 8,
      ZSYMAM: '92-U-235',
      ALAB: 'TESTLAB',
      AUTH: 'A. Tester',
    });
  });

  it('endf_list_directory marks decoded sections', async () => {
    const result = await handleToolCall('endf_list_directory', { path: tapePath });
    const listing = JSON.parse(result.content[0]!.text);
    expect(listing.entries).toEqual([
      { mf: 1, mt: 451, nc: 11, mod: 0, file: 'General information', name: 'Descriptive Data', supported: false },
      { mf: 1, mt: 452, nc: 3, mod: 0, file: 'General information', name: 'Total Neutrons per Fission', supported: true },
      { mf: 1, mt: 456, nc: 5, mod: 0, file: 'General information', name: 'Prompt Neutrons per Fission', supported: true },
      { mf: 3, mt: 1, nc: 2, mod: 0, file: 'Reaction cross sections', name: 'Total Cross Section', supported: false },
    ]);
  });

  it('endf_get_reaction returns the decoded payload', async () => {
    const result = await handleToolCall('endf_get_reaction', { path: tapePath, mt: 452 });
    const reaction = JSON.parse(result.content[0]!.text);
    expect(reaction).toMatchObject({
      mf: 1,
      mt: 452,
      kind: 'total_nu',
      representation: 'polynomial (2 coefficients)',
      data: { kind: 'total_nu', lnu: 1, nu: { lnu: 1, coefficients: [2.4367, 1e-7] } },
    });
  });

  it('reads gzip-compressed tapes', async () => {
    const result = await handleToolCall('endf_get_reaction', { path: gzPath, mt: 456 });
    const reaction = JSON.parse(result.content[0]!.text);
    expect(reaction.representation).toBe('tabulated (5 points)');
  });

  it('accepts paths relative to ENDF_DATA_DIR', async () => {
    const result = await handleToolCall('endf_read_header', { path: 'u235.endf' });
    expect(result.isError).toBeUndefined();
    expect(JSON.parse(result.content[0]!.text).ZA).toBe(92235);
  });

  it('rejects relative paths that leave ENDF_DATA_DIR', async () => {
    const result = await handleToolCall('endf_read_header', { path: '../u235.endf' });
    expect(result.isError).toBe(true);
    const payload = JSON.parse(result.content[0]!.text);
    expect(payload.error.code).toBe('INVALID_PARAMS');
    expect(payload.error.message).toBe('Tape path escapes ENDF_DATA_DIR');
  });

  it('accepts file names inside ENDF_DATA_DIR that start with two dots', async () => {
    fs.copyFileSync(tapePath, path.join(tmpRoot, '..u235.endf'));
    const result = await handleToolCall('endf_read_header', { path: '..u235.endf' });
    expect(result.isError).toBeUndefined();
    expect(JSON.parse(result.content[0]!.text).ZA).toBe(92235);
  });

  it('rejects relative paths when ENDF_DATA_DIR is unset', async () => {
    delete process.env.ENDF_DATA_DIR;
    try {
      const result = await handleToolCall('endf_read_header', { path: 'u235.endf' });
      const payload = JSON.parse(result.content[0]!.text);
      expect(payload.error.code).toBe('INVALID_PARAMS');
      expect(payload.error.message).toBe('Relative tape path requires ENDF_DATA_DIR');
    } finally {
      process.env.ENDF_DATA_DIR = tmpRoot;
    }
  });

  it('reports missing sections with the decoded alternatives', async () => {
    const result = await handleToolCall('endf_get_reaction', { path: tapePath, mt: 455 });
    expect(result.isError).toBe(true);
    const payload = JSON.parse(result.content[0]!.text);
    expect(payload.error.code).toBe('NOT_FOUND');
    expect(payload.error.data).toEqual({ mf: 1, mt: 455, available_mts: [452, 456] });
  });

  it('validates tool arguments', async () => {
    const result = await handleToolCall('endf_get_reaction', { path: tapePath, mt: 0 });
    const payload = JSON.parse(result.content[0]!.text);
    expect(payload.error.code).toBe('INVALID_PARAMS');
    expect(payload.error.message).toBe('Invalid parameters for endf_get_reaction');
  });

  it('surfaces decoding failures as PARSE_ERROR with the line number', async () => {
    const result = await handleToolCall('endf_read_header', { path: brokenPath });
    expect(result.isError).toBe(true);
    const payload = JSON.parse(result.content[0]!.text);
    expect(payload.error.code).toBe('PARSE_ERROR');
    expect(payload.error.data).toEqual({ kind: 'MALFORMED_FIELD', line: 15, expected: 'float' });
  });

  it('reports truncated tapes as PARSE_ERROR at the last line read', async () => {
    const result = await handleToolCall('endf_list_directory', { path: truncatedPath });
    const payload = JSON.parse(result.content[0]!.text);
    expect(payload.error.code).toBe('PARSE_ERROR');
    expect(payload.error.data).toEqual({ kind: 'UNEXPECTED_END_OF_STREAM', line: 6, expected: 'TEXT record' });
  });

  it('endf_get_tabulated pages through TAB1 points', async () => {
    const result = await handleToolCall('endf_get_tabulated', { path: tapePath, mt: 456, offset: 1, limit: 2 });
    const table = JSON.parse(result.content[0]!.text);
    expect(table).toMatchObject({ mf: 1, mt: 456, nr: 1, np: 5, offset: 1, limit: 2, truncated: true });
    expect(table.regions).toEqual([{ nbt: 5, law: 2 }]);
    expect(table.points).toEqual([
      { point_index: 2, x: 1e3, y: 2.41 },
      { point_index: 3, x: 1e6, y: 2.5 },
    ]);
  });

  it('endf_get_tabulated rejects sections without a TAB1 function', async () => {
    const result = await handleToolCall('endf_get_tabulated', { path: tapePath, mt: 452 });
    const payload = JSON.parse(result.content[0]!.text);
    expect(payload.error.code).toBe('INVALID_PARAMS');
    expect(payload.error.data).toEqual({ mf: 1, mt: 452, kind: 'total_nu' });
  });

  it('endf_scan_files is only exposed in full mode', async () => {
    const hidden = await handleToolCall('endf_scan_files', { path: tapePath }, 'standard');
    expect(JSON.parse(hidden.content[0]!.text).error.message).toBe('Tool not exposed in standard mode: endf_scan_files');

    const result = await handleToolCall('endf_scan_files', { path: tapePath }, 'full');
    expect(JSON.parse(result.content[0]!.text).files).toEqual([
      { mf: 1, name: 'General information' },
      { mf: 3, name: 'Reaction cross sections' },
    ]);
  });

  it('rejects unknown tools', async () => {
    const result = await handleToolCall('endf_nope', {});
    expect(JSON.parse(result.content[0]!.text).error.message).toBe('Unknown tool: endf_nope');
  });
});

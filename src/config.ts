import * as fs from 'fs';
import * as path from 'path';
import { invalidParams } from './shared/index.js';

export const ENDF_DATA_DIR_ENV = 'ENDF_DATA_DIR';
export const ENDF_TOOL_MODE_ENV = 'ENDF_TOOL_MODE';
export const ENDF_VERBOSE_ENV = 'ENDF_VERBOSE';

export type ToolExposureMode = 'standard' | 'full';

export interface DataDirStatus {
  status: 'ok' | 'not_configured';
  path?: string;
  how_to: string;
}

const DATA_DIR_HOW_TO = `Set ${ENDF_DATA_DIR_ENV}=/abs/path/to/tapes to pass tape paths relative to it; otherwise pass absolute paths.`;

export function getToolMode(): ToolExposureMode {
  return process.env[ENDF_TOOL_MODE_ENV] === 'full' ? 'full' : 'standard';
}

export function isVerbose(): boolean {
  const raw = process.env[ENDF_VERBOSE_ENV]?.trim().toLowerCase();
  return raw === '1' || raw === 'true';
}

export function resolveDataDir(): string | undefined {
  const raw = process.env[ENDF_DATA_DIR_ENV];
  if (!raw || raw.trim().length === 0) return undefined;
  const value = raw.trim();
  if (!path.isAbsolute(value)) {
    throw invalidParams(`${ENDF_DATA_DIR_ENV} must be an absolute path`, { env: ENDF_DATA_DIR_ENV, value });
  }
  const resolved = path.resolve(value);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    throw invalidParams(`${ENDF_DATA_DIR_ENV} must point to an existing directory`, { env: ENDF_DATA_DIR_ENV, value: resolved });
  }
  return resolved;
}

function validateTapeFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw invalidParams('Tape file does not exist', { path: filePath });
  }
  if (!fs.statSync(filePath).isFile()) {
    throw invalidParams('Tape path must point to a file', { path: filePath });
  }
  return filePath;
}

/**
 * Absolute paths are taken as given. Relative paths are resolved against
 * ENDF_DATA_DIR and may not climb out of it.
 */
export function resolveTapePath(input: string): string {
  if (path.isAbsolute(input)) {
    return validateTapeFile(path.resolve(input));
  }
  const dataDir = resolveDataDir();
  if (!dataDir) {
    throw invalidParams(`Relative tape path requires ${ENDF_DATA_DIR_ENV}`, { path: input, how_to: DATA_DIR_HOW_TO });
  }
  const resolved = path.resolve(dataDir, input);
  const relative = path.relative(dataDir, resolved);
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw invalidParams(`Tape path escapes ${ENDF_DATA_DIR_ENV}`, { path: input });
  }
  return validateTapeFile(resolved);
}

export function describeDataDir(): DataDirStatus {
  const dataDir = resolveDataDir();
  if (!dataDir) {
    return { status: 'not_configured', how_to: DATA_DIR_HOW_TO };
  }
  return { status: 'ok', path: dataDir, how_to: DATA_DIR_HOW_TO };
}

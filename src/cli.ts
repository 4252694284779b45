import * as path from 'path';
import { loadEvaluation } from './endf/load.js';
import { renderSummary, summarizeEvaluation } from './endf/report.js';
import { isVerbose } from './config.js';

interface InspectArgs {
  json: boolean;
  verbose: boolean;
  source?: string;
}

function parseArgs(argv: string[]): InspectArgs {
  const out: InspectArgs = {
    json: false,
    verbose: isVerbose(),
  };
  for (const arg of argv) {
    if (arg === '--json') out.json = true;
    else if (arg === '--verbose') out.verbose = true;
    else if (arg === '--help' || arg === '-h') throw new Error('help');
    else if (arg.startsWith('-')) throw new Error(`Unknown arg: ${arg}`);
    else if (out.source === undefined) out.source = arg;
    else throw new Error(`Unexpected extra argument: ${arg}`);
  }
  return out;
}

export function usage(): string {
  return [
    'Usage:',
    '  endf-mcp                                  start the MCP stdio server',
    '  endf-mcp inspect <tape.endf[.gz]> [--json] [--verbose]',
  ].join('\n');
}

/** Writes the summary of one tape to `write` (stdout by default). */
export function runInspectCli(argv: string[], write: (text: string) => void = (text) => process.stdout.write(text)): void {
  let args: InspectArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message === 'help') {
      console.error(usage());
      return;
    }
    throw new Error(`${message}\n${usage()}`);
  }

  if (!args.source) {
    throw new Error(`Missing tape path.\n${usage()}`);
  }

  const evaluation = loadEvaluation(path.resolve(args.source), { verbose: args.verbose });
  const text = args.json
    ? JSON.stringify(summarizeEvaluation(evaluation), null, 2)
    : renderSummary(evaluation);
  write(`${text}\n`);
}

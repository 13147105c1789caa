/**
 * harmony-scan command line
 *
 * Usage:
 *   harmony-scan scan <file-or-folder> -p "ii-7 V7 I*" [-p ...] [options]
 *   harmony-scan chart <file-or-folder> [--key "C minor"]
 *
 * Scan options:
 *   -p, --pattern <text>    Pattern such as 'ii-7 V7 I*' (repeatable)
 *   -v, --verbose           Print hit counts and hits per file
 *   -o, --output <file>     Write hits as CSV
 *   --show-literals         Add chord literals to the output
 *   --key <key>             Read every piece in this key ('Eb', 'C minor')
 *   --six-nine <69|6/9>     Spelling of major 6/9 chords
 *   --concurrency <n>       Pieces read at the same time
 *   --config <file>         JSON file with any of the options above
 */

import { writeFile } from 'fs/promises';
import { basename } from 'path';
import { parseArgs } from 'util';
import { parseKeyArg } from './analysis';
import { ConfigError, loadConfigFile, resolveConfig } from './config';
import type { ConfigFile, ScanConfig } from './config';
import { listScorePaths, readPiece, scanCorpus } from './corpus';
import { toCsv } from './exporters/csv';
import { formatChart, formatDiagnostic, formatFailure, formatPieceReport } from './exporters/console';
import { compilePattern, PatternSyntaxError } from './pattern';
import type { CompiledPattern, KeyDescriptor } from './types';

export const EXIT_OK = 0;
export const EXIT_NO_FILES = 1;
export const EXIT_USAGE = 2;

function printUsage(): void {
  console.log('Harmonic-function pattern scanner for MusicXML');
  console.log('');
  console.log('Usage:');
  console.log('  harmony-scan scan <file-or-folder> -p "ii-7 V7 I*" [-p ...] [-v] [-o hits.csv] [--show-literals]');
  console.log('                    [--key "C minor"] [--six-nine 69|6/9] [--concurrency 4] [--config file.json]');
  console.log('  harmony-scan chart <file-or-folder> [--key "C minor"] [--six-nine 69|6/9]');
}

function parseConcurrency(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`Invalid concurrency: ${value}`);
  }
  return n;
}

function parseSixNine(value: string | undefined): '69' | '6/9' | undefined {
  if (value === undefined) return undefined;
  if (value !== '69' && value !== '6/9') {
    throw new ConfigError(`Invalid 6/9 style: ${value} (expected 69 or 6/9)`);
  }
  return value;
}

function declaredKey(text: string | undefined): KeyDescriptor | undefined {
  if (text === undefined) return undefined;
  try {
    return parseKeyArg(text);
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

async function runScan(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      pattern: { type: 'string', short: 'p', multiple: true },
      verbose: { type: 'boolean', short: 'v' },
      output: { type: 'string', short: 'o' },
      'show-literals': { type: 'boolean' },
      key: { type: 'string' },
      'six-nine': { type: 'string' },
      concurrency: { type: 'string' },
      config: { type: 'string' },
    },
  });

  const target = positionals[0];
  if (!target) {
    printUsage();
    return EXIT_USAGE;
  }

  const file: ConfigFile = values.config ? await loadConfigFile(values.config) : {};
  const config: ScanConfig = resolveConfig(file, {
    patterns: values.pattern,
    verbose: values.verbose,
    output: values.output,
    showLiterals: values['show-literals'],
    key: values.key,
    sixNineStyle: parseSixNine(values['six-nine']),
    concurrency: parseConcurrency(values.concurrency),
  });

  // Every pattern is compiled before any file is touched
  const patterns: CompiledPattern[] = config.patterns.map((p) =>
    compilePattern(p, { sixNineStyle: config.sixNineStyle })
  );
  const key = declaredKey(config.key);

  const paths = await listScorePaths(target);
  if (paths.length === 0) {
    console.error('No MusicXML files found.');
    return EXIT_NO_FILES;
  }

  const corpus = await scanCorpus(paths, patterns, {
    key,
    sixNineStyle: config.sixNineStyle,
    concurrency: config.concurrency,
  });

  for (const outcome of corpus.outcomes) {
    if (!outcome.ok) {
      console.error(formatFailure(outcome.failure));
      continue;
    }
    if (config.verbose) {
      for (const line of formatPieceReport(outcome.result, config.showLiterals)) console.log(line);
      for (const diagnostic of outcome.result.diagnostics) console.log(formatDiagnostic(diagnostic));
    }
  }

  if (config.output) {
    await writeFile(config.output, toCsv(corpus.results, { showLiterals: config.showLiterals }), 'utf-8');
    console.log(`Wrote ${config.output}`);
  }

  return EXIT_OK;
}

async function runChart(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      key: { type: 'string' },
      'six-nine': { type: 'string' },
    },
  });

  const target = positionals[0];
  if (!target) {
    printUsage();
    return EXIT_USAGE;
  }

  const key = declaredKey(values.key);
  const sixNineStyle = parseSixNine(values['six-nine']);
  const paths = await listScorePaths(target);
  if (paths.length === 0) {
    console.error('No MusicXML files found.');
    return EXIT_NO_FILES;
  }

  for (const path of paths) {
    if (paths.length > 1) console.log(`\n=== ${basename(path)} ===`);
    try {
      const piece = await readPiece(path, { key, sixNineStyle });
      for (const line of formatChart(piece)) console.log(line);
    } catch (error) {
      console.error(formatFailure({ path, message: error instanceof Error ? error.message : String(error) }));
    }
  }

  return EXIT_OK;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case 'scan':
        return await runScan(rest);
      case 'chart':
        return await runChart(rest);
      default:
        printUsage();
        return EXIT_USAGE;
    }
  } catch (error) {
    if (error instanceof PatternSyntaxError || error instanceof ConfigError || isArgumentError(error)) {
      console.error(`Error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }
}

function isArgumentError(error: unknown): error is Error {
  return error instanceof Error && 'code' in error && String(error.code).startsWith('ERR_PARSE_ARGS');
}

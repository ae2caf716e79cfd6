#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { createConfiguration, DEFAULT_DELIMITER_LEFT, DEFAULT_DELIMITER_RIGHT } from './config';
import { buildReport, innerTextOf, singleLine, type Report } from './report';
import { findSearchEngine, SEARCH_ENGINES, type SearchEngine } from './search-engines';

export interface CliOptions {
  help: boolean;
  version: boolean;
  listEngines: boolean;
  inputPath: string;
  delimiterLeft: string;
  delimiterRight: string;
  json: boolean;
  engine?: string;
}

export function parseArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);
  const options: CliOptions = {
    help: false,
    version: false,
    listEngines: false,
    inputPath: '',
    delimiterLeft: DEFAULT_DELIMITER_LEFT,
    delimiterRight: DEFAULT_DELIMITER_RIGHT,
    json: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const requireValue = (flag: string): string => {
      if (i + 1 >= args.length || args[i + 1].startsWith('--')) {
        throw new Error(`${flag} requires a value`);
      }
      i++;
      return args[i];
    };

    if (arg === '--help') {
      options.help = true;
    } else if (arg === '--version') {
      options.version = true;
    } else if (arg === '--list-engines') {
      options.listEngines = true;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--left') {
      options.delimiterLeft = requireValue('--left');
    } else if (arg === '--right') {
      options.delimiterRight = requireValue('--right');
    } else if (arg === '--engine') {
      options.engine = requireValue('--engine');
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option "${arg}"`);
    } else if (!options.inputPath) {
      options.inputPath = arg;
    }
  }

  if (options.json && options.engine !== undefined) {
    throw new Error('--json and --engine cannot be combined');
  }
  if (!options.help && !options.version && !options.listEngines && !options.inputPath) {
    throw new Error('No input file specified');
  }

  return options;
}

export function resolveEngine(name: string): SearchEngine {
  const engine = findSearchEngine(name);
  if (!engine) {
    const names = SEARCH_ENGINES.map(e => e.name).join(', ');
    throw new Error(`Unknown search engine "${name}". Use one of: ${names}`);
  }
  return engine;
}

/** `file:line:offset: text` lines, one per passage */
export function formatReportLines(report: Report, displayPath: string): string[] {
  return report.entries.map(entry =>
    `${displayPath}:${entry.lineNumber}:${entry.sourceOffset}: ${singleLine(entry.rawText)}`
  );
}

export function formatReportJson(report: Report): string {
  return JSON.stringify(report.entries, null, 2);
}

/** One search URL per passage; passages with blank inner text are skipped */
export function formatSearchUrls(report: Report, engine: SearchEngine): string[] {
  const lines: string[] = [];
  for (const entry of report.entries) {
    const query = innerTextOf(entry, report.configuration);
    if (query.trim() !== '') {
      lines.push(`${entry.lineNumber}: ${engine.buildUrl(query)}`);
    }
  }
  return lines;
}

/**
 * Output lines for a document, or undefined when it has no marked passages.
 */
export function renderDocument(options: CliOptions, text: string): string[] | undefined {
  const config = createConfiguration(options.delimiterLeft, options.delimiterRight);
  const displayPath = options.inputPath;
  const report = buildReport({ id: path.resolve(displayPath), label: displayPath }, text, config);
  if (!report) {
    return undefined;
  }
  if (options.engine !== undefined) {
    return formatSearchUrls(report, resolveEngine(options.engine));
  }
  if (options.json) {
    return [formatReportJson(report)];
  }
  return formatReportLines(report, displayPath);
}

function showHelp() {
  console.log(`Usage: marked-passages <file> [options]

List the marked passages of a text file.

Options:
  --help              Show this help message
  --version           Show version number
  --left <text>       Left delimiter (default: ${DEFAULT_DELIMITER_LEFT})
  --right <text>      Right delimiter (default: ${DEFAULT_DELIMITER_RIGHT})
  --json              Print passages as JSON
  --engine <name>     Print a search URL for each passage
  --list-engines      Show the available search engines`);
}

function showVersion() {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
  const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg ? String(pkg.version) : 'unknown';
  console.log(version);
}

export async function main() {
  const options = parseArgs(process.argv);

  if (options.help) {
    showHelp();
    return;
  }

  if (options.version) {
    showVersion();
    return;
  }

  if (options.listEngines) {
    for (const engine of SEARCH_ENGINES) {
      console.log(engine.name);
    }
    return;
  }

  if (!fs.existsSync(options.inputPath)) {
    throw new Error(`File not found: ${options.inputPath}`);
  }

  const text = await fs.promises.readFile(options.inputPath, 'utf8');
  const lines = renderDocument(options, text);
  if (!lines) {
    console.error('No marked passages found');
    return;
  }
  for (const line of lines) {
    console.log(line);
  }
}

if (require.main === module) {
  main().catch(e => {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  });
}

#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { DecodeError, OptionsError, StructuralError } from './core/errors.js';
import { resolveOptions, type ViewerOptions } from './core/options.js';
import type { DicomDataSet } from './core/types.js';
import type { WalkOptions } from './core/walker.js';
import { decodeDicomJson } from './decoders/dicomJson.js';
import { decodePart10 } from './decoders/part10.js';
import { toLabelTree } from './sinks/treeSink.js';
import { createNameResolver, loadStandardDictionary } from './utils/dictionary.js';
import { formatTag } from './utils/tagUtils.js';
import { buildTree, renderLines, renderTree } from './view.js';

const VERSION = '1.0.0';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  warn: (line: string) => void;
  readFile: (filePath: string) => Uint8Array;
}

const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  warn: (line) => console.warn(line),
  readFile: (filePath) => new Uint8Array(fs.readFileSync(filePath)),
};

interface ParsedArgs {
  command?: string;
  file?: string;
  format?: 'dicom' | 'json';
  verbose: boolean;
  viewer: ViewerOptions;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const NUMBER_FLAGS: Record<string, 'maxValueLength' | 'maxDepth' | 'binaryLengthThreshold'> = {
  '--max-length': 'maxValueLength',
  '--max-depth': 'maxDepth',
  '--binary-threshold': 'binaryLengthThreshold',
};

function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { verbose: false, viewer: {} };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const numberOption = NUMBER_FLAGS[arg];

    if (numberOption) {
      const raw = args[++i];
      if (raw === undefined || raw.trim() === '' || Number.isNaN(Number(raw))) {
        throw new UsageError(`${arg} expects a number`);
      }
      parsed.viewer[numberOption] = Number(raw);
    } else if (arg === '--format') {
      const format = args[++i];
      if (format !== 'dicom' && format !== 'json') {
        throw new UsageError('--format expects "dicom" or "json"');
      }
      parsed.format = format;
    } else if (arg === '--omit-pixel-data') {
      parsed.viewer.omitPixelData = true;
    } else if (arg === '--verbose' || arg === '-v') {
      parsed.verbose = true;
    } else if (arg.startsWith('--') && arg !== '--help') {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  [parsed.command, parsed.file] = positional;
  return parsed;
}

function printHelp(io: CliIO): void {
  io.stdout(`
dcm-inspect CLI v${VERSION}

Commands:
  dump <file>                  Print every element as "(GGGG,EEEE) | Name | VR | Value".
  tree <file>                  Print the element hierarchy as a tree.
  json <file>                  Print the element hierarchy as JSON.

Options:
  --format dicom|json          Input format (default: json for *.json files, dicom otherwise).
  --max-length <n>             Cut values longer than n characters (default: 128).
  --max-depth <n>              Reject sequences nested deeper than n levels (default: 256).
  --binary-threshold <n>       Check values longer than n bytes for binary content (default: 64).
  --omit-pixel-data            Leave out pixel and waveform data rows entirely.
  --verbose, -v                Report values that could not be rendered.
    `);
}

function loadDataSet(filePath: string, format: 'dicom' | 'json' | undefined, io: CliIO): DicomDataSet {
  let bytes: Uint8Array;
  try {
    bytes = io.readFile(filePath);
  } catch (e) {
    throw new DecodeError(`Cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`, filePath);
  }

  const inputFormat = format ?? (path.extname(filePath).toLowerCase() === '.json' ? 'json' : 'dicom');
  if (inputFormat === 'json') {
    return decodeDicomJson(new TextDecoder('utf-8').decode(bytes), filePath);
  }
  return decodePart10(bytes, { source: filePath });
}

/**
 * Run the CLI and return the process exit code
 */
export async function run(args: string[], io: CliIO = defaultIO): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(args);
  } catch (e) {
    io.stderr(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  const { command, file } = parsed;

  if (!command) {
    printHelp(io);
    return 1;
  }

  switch (command) {
    case 'help':
    case '--help':
    case '-h':
      printHelp(io);
      return 0;
    case 'dump':
    case 'tree':
    case 'json':
      if (!file) {
        io.stderr(`Usage: dcm-inspect ${command} <file>`);
        return 1;
      }
      return inspectFile(command, file, parsed, io);
    default:
      io.stderr(`Unknown command: ${command}`);
      printHelp(io);
      return 1;
  }
}

function inspectFile(command: 'dump' | 'tree' | 'json', filePath: string, parsed: ParsedArgs, io: CliIO): number {
  try {
    const viewer = resolveOptions(parsed.viewer);
    const dataset = loadDataSet(filePath, parsed.format, io);
    const options: WalkOptions = {
      ...viewer,
      resolveName: createNameResolver(loadStandardDictionary()),
      onRenderError: parsed.verbose
        ? (error, element) => io.warn(`warning: ${formatTag(element.tag)}: ${error.message}`)
        : undefined,
    };

    if (command === 'dump') {
      renderLines(dataset, options).forEach((line) => io.stdout(line));
    } else if (command === 'tree') {
      renderTree(dataset, options).forEach((line) => io.stdout(line));
    } else {
      io.stdout(JSON.stringify(toLabelTree(buildTree(dataset, options)), null, 2));
    }
    return 0;
  } catch (e) {
    if (e instanceof DecodeError || e instanceof StructuralError || e instanceof OptionsError) {
      io.stderr(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

// Run if main (npm links bin scripts, so compare real paths)
function isMain(): boolean {
  if (!process.argv[1]) {
    return false;
  }
  try {
    return fs.realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMain()) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}

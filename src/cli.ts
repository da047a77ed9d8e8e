#!/usr/bin/env node

// CLI for the idl-patch generator

import { Patcher } from './patcher';
import { DefaultCodeUtils } from './project/code-utils';
import { readPatchRequest } from './project/request-loader';
import { writeOutputUnits } from './output-writer';
import { describeError } from './errors';
import { getVersion } from './version';
import { logger, LogLevel } from './logger';

export interface CliOptions {
  inputs?: string[];
  output?: string;
  module?: string;
  packagePrefix?: string;
  noFastApi?: boolean;
  copyIdl?: boolean;
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      case '-o':
      case '--output':
        if (i + 1 < args.length) {
          options.output = args[++i];
        }
        break;
      case '-m':
      case '--module':
        if (i + 1 < args.length) {
          options.module = args[++i];
        }
        break;
      case '--package-prefix':
        if (i + 1 < args.length) {
          options.packagePrefix = args[++i];
        }
        break;
      case '--no-fast-api':
        options.noFastApi = true;
        break;
      case '--copy-idl':
        options.copyIdl = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        options.inputs = options.inputs || [];
        options.inputs.push(arg);
        break;
    }
  }
  return options;
}

export function showHelp(): void {
  console.log(`
idl-patch - Go companion file generator for parsed IDL documents

Usage: idl-patch [options] <request.json>

Options:
  -h, --help               Show this help message
  -v, --version            Show version number
  -o, --output <dir>       Output directory (default: the request's outputPath)
  -m, --module <path>      Go module of the generated code; its packages are not imported by path
  --package-prefix <path>  Import path generated packages live under (default: the module)
  --no-fast-api            Do not generate the fast encode path
  --copy-idl               Copy each IDL source next to its generated code
  --verbose                Print debug output

Examples:
  idl-patch request.json
  idl-patch -o ./gen -m example.com/mod request.json
  idl-patch --copy-idl --no-fast-api request.json
`);
}

export function showVersion(): void {
  console.log(`idl-patch ${getVersion()}`);
}

export async function run(options: CliOptions): Promise<number> {
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (options.help) {
    showHelp();
    return 0;
  }

  if (options.version) {
    showVersion();
    return 0;
  }

  if (!options.inputs || options.inputs.length !== 1) {
    logger.error('Expected exactly one request file');
    console.error('Use --help for usage information');
    return 1;
  }

  try {
    const request = await readPatchRequest(options.inputs[0]);
    const packagePrefix = options.packagePrefix ?? options.module;
    const patcher = new Patcher(new DefaultCodeUtils({ packagePrefix }), {
      module: options.module,
      noFastApi: options.noFastApi === true,
      copyIdl: options.copyIdl === true
    });

    const units = await patcher.patch({ ...request, outputPath: options.output ?? request.outputPath });
    await writeOutputUnits(units);
    logger.info(`Generated ${units.length} file(s)`);
    return 0;
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  }
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    logger.error(describeError(error));
    process.exit(1);
  }
  process.exitCode = await run(options);
}

if (require.main === module) {
  main().catch(error => {
    logger.error(describeError(error));
    process.exit(1);
  });
}

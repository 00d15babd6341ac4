#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), and executeDocument() for the weft-exec binary.
 * Resolves a document under a base directory and writes its output to stdout.
 */

import * as path from 'path';
import {
  DocumentFileSource,
  DocumentService,
  ExecutionContext,
  HandlebarsAdapter,
  JavaScriptAdapter,
  LanguageRegistry,
  createStreamWriter,
} from 'weft';
import type { Executable, ObservabilityCallbacks, Writer } from 'weft';
import { formatError } from './cli-error-formatter.js';
import type { OutputFormat } from './cli-error-formatter.js';
import {
  VERSION,
  createVerboseObservability,
  detectHelpVersionFlag,
} from './cli-shared.js';
import { createDefaultConfig, loadConfig } from './config.js';
import type { WeftConfig } from './config.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'exec';
      document: string;
      base: string | undefined;
      language: string | undefined;
      config: string | undefined;
      format: OutputFormat;
      verbose: boolean;
    }
  | { mode: 'help' | 'version' };

const VALUE_FLAGS = ['--base', '--language', '--config', '--format'];
const KNOWN_FLAGS = [
  ...VALUE_FLAGS,
  '--verbose',
  '--help',
  '-h',
  '--version',
  '-v',
];

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flag = detectHelpVersionFlag(argv);
  if (flag) {
    return flag;
  }

  const values = new Map<string, string>();
  const positional: string[] = [];
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg.startsWith('-') && arg !== '-') {
      if (!KNOWN_FLAGS.includes(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      if (arg === '--verbose') {
        verbose = true;
        continue;
      }
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value after ${arg}`);
      }
      values.set(arg, value);
      i++;
      continue;
    }

    positional.push(arg);
  }

  const formatValue = values.get('--format') ?? 'human';
  if (formatValue !== 'human' && formatValue !== 'json') {
    throw new Error(
      `Invalid --format value: ${formatValue}. Must be one of: human, json`
    );
  }

  const [document, ...extra] = positional;
  if (document === undefined) {
    throw new Error('Missing document argument');
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra[0]}`);
  }

  return {
    mode: 'exec',
    document,
    base: values.get('--base'),
    language: values.get('--language'),
    config: values.get('--config'),
    format: formatValue,
    verbose,
  };
}

export interface ExecuteDocumentOptions {
  /** Directory documents are resolved in */
  readonly base: string;
  readonly config: WeftConfig;
  readonly writer: Writer;
  readonly errorWriter: Writer;
  readonly observability?: ObservabilityCallbacks | undefined;
}

/**
 * Compile a document from the base directory and run it once.
 *
 * @returns The executable that ran
 * @throws WeftError for missing documents, parsing and execution failures
 */
export async function executeDocument(
  documentName: string,
  options: ExecuteDocumentOptions
): Promise<Executable> {
  const { config, observability } = options;
  const registry = new LanguageRegistry([
    new JavaScriptAdapter(),
    new HandlebarsAdapter(),
  ]);
  const source = new DocumentFileSource(options.base, {
    defaultName: config.defaultName,
    preferredExtension: config.preferredExtension,
    minimumTimeBetweenValidityChecks: config.minimumTimeBetweenValidityChecks,
    observability,
  });
  const service = new DocumentService({
    source,
    registry,
    defaultLanguageTag: config.defaultLanguage,
    prepare: config.prepare,
    exposedName: config.exposedName,
    observability,
  });

  const executable = await service.getExecutable(documentName, true);
  const context = new ExecutionContext({
    writer: options.writer,
    errorWriter: options.errorWriter,
  });
  await executable.execute(context, service);
  return executable;
}

/**
 * Resolve configuration: weft.yaml (or --config), then flag overrides
 */
export function resolveConfig(
  parsed: Extract<ParsedArgs, { mode: 'exec' }>,
  base: string
): WeftConfig {
  const config = loadConfig(base, parsed.config) ?? createDefaultConfig();
  return parsed.language === undefined
    ? config
    : { ...config, defaultLanguage: parsed.language };
}

/**
 * Entry point for the weft-exec binary
 *
 * Parses command-line arguments, executes the document, and handles errors.
 * Writes document output to stdout and errors to stderr.
 * Sets process.exit(1) on any error.
 */
export async function main(): Promise<void> {
  let format: OutputFormat = 'human';
  let verbose = false;

  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(`Usage:
  weft-exec <document> [options]  Execute a document
  weft-exec --help                Show this help message
  weft-exec --version             Show version information

Options:
  --base <dir>          Directory documents are resolved in (default: current directory)
  --language <tag>      Default language for untagged scriptlets
  --config <file>       Configuration file (default: <base>/weft.yaml)
  --format <format>     Error output format: human, json (default: human)
  --verbose             Log compilation and execution events to stderr

Examples:
  weft-exec index
  weft-exec pages/about.html --base site
  weft-exec report --language handlebars --format json`);
        return;

      case 'version':
        console.log(VERSION);
        return;

      case 'exec': {
        format = parsed.format;
        verbose = parsed.verbose;

        const base = path.resolve(parsed.base ?? process.cwd());
        await executeDocument(parsed.document, {
          base,
          config: resolveConfig(parsed, base),
          writer: createStreamWriter(process.stdout),
          errorWriter: createStreamWriter(process.stderr),
          observability: verbose
            ? createVerboseObservability((line) => console.error(line))
            : undefined,
        });
        return;
      }
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(formatError(error, { format, verbose }));
    process.exit(1);
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}

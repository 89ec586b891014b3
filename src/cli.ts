/**
 * sectconf command-line interface: check, query, list and reformat
 * configuration files.
 */

import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import type { ConfValue } from './ast.js';
import { loadConfig } from './config.js';
import type { ConfDocument } from './document.js';
import { ConfError, ConfParseError, ConfQueryError } from './errors.js';
import { isIntegerWidth, type IntegerWidth } from './integers.js';
import { DEFAULT_MAX_SIZE } from './loader.js';
import {
  DEFAULT_LOG_LEVEL,
  isLogLevel,
  Logger,
  type LogFormat,
  type LogLevel,
  type WritableOutput,
} from './logger.js';
import { getBool, getInt, getList, getProperties, getSections, getStr, resolve } from './query.js';
import { stringify } from './stringify.js';

export const VERSION = '0.1.0';

export interface CliIO {
  stdout: WritableOutput;
  stderr: WritableOutput;
  env: Record<string, string | undefined>;
}

type GlobalOptions = {
  baseDir?: string;
  maxSize: number;
  env?: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
};

type ValueKind = 'auto' | 'int' | 'bool' | 'str' | 'list';

interface GetOptions {
  as: ValueKind;
  width: IntegerWidth;
}

export function defaultIO(): CliIO {
  return {
    stdout: { write: (s) => process.stdout.write(s) },
    stderr: { write: (s) => process.stderr.write(s) },
    env: process.env,
  };
}

function parseSize(value: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function parseWidth(value: string): IntegerWidth {
  if (!isIntegerWidth(value)) throw new InvalidArgumentError(`Unknown integer width "${value}".`);
  return value;
}

function parseLevel(value: string): LogLevel {
  if (!isLogLevel(value)) throw new InvalidArgumentError(`Unknown log level "${value}".`);
  return value;
}

function formatScalar(value: ConfValue): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

/** JSON-style list text; integers are written without the bigint suffix. */
function formatList(values: readonly ConfValue[]): string {
  return `[${values.map(formatScalar).join(',')}]`;
}

function formatValue(doc: ConfDocument, path: string, options: GetOptions): string {
  switch (options.as) {
    case 'int':
      return String(getInt(doc, path, options.width));
    case 'bool':
      return String(getBool(doc, path));
    case 'str':
      return getStr(doc, path);
    case 'list':
      return formatList(getList(doc, path));
    case 'auto': {
      const resolved = resolve(doc, path);
      if (resolved?.kind !== 'item') {
        throw new ConfQueryError('InvalidQuery', `No property at "${path}"`);
      }
      const { item } = resolved;
      return item.kind === 'list' ? formatList(item.values) : String(item.value);
    }
  }
}

function listKeys(doc: ConfDocument, path: string): string[] {
  const sections = getSections(doc, path);
  if (sections) return sections.map((s) => s.name);
  const items = getProperties(doc, path);
  if (items) return items.map((i) => i.name);
  throw new ConfQueryError('InvalidQuery', `No section at "${path}"`);
}

export function createProgram(io: CliIO = defaultIO()): Command {
  const program = new Command();
  const print = (line: string): void => io.stdout.write(line + '\n');

  const envLevel = io.env['SECTCONF_LOG_LEVEL'];
  const defaultLevel = envLevel !== undefined && isLogLevel(envLevel) ? envLevel : DEFAULT_LOG_LEVEL;

  program
    .name('sectconf')
    .description('Parse and query sectioned configuration files')
    .version(VERSION)
    .option('-C, --base-dir <dir>', 'Resolve relative file paths against this directory')
    .option('--max-size <bytes>', 'Maximum configuration file size', parseSize, DEFAULT_MAX_SIZE)
    .option('--env <tag>', 'Environment tag stored on the document')
    .option('--log-level <level>', 'trace, debug, info, warn or error', parseLevel, defaultLevel)
    .addOption(
      new Option('--log-format <format>', 'Log line format').choices(['text', 'json']).default('text')
    )
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.stdout.write(s),
      writeErr: (s) => io.stderr.write(s),
    });

  async function open(file: string, command: Command): Promise<ConfDocument> {
    const opts = command.optsWithGlobals<GlobalOptions>();
    const logger = new Logger({
      level: opts.logLevel,
      format: opts.logFormat,
      output: io.stderr,
    }).child(command.name());
    return loadConfig(file, {
      baseDir: opts.baseDir,
      maxSize: opts.maxSize,
      environment: opts.env,
      logger,
    });
  }

  program
    .command('check <file>')
    .description('Parse a configuration file and report errors')
    .action(async (file: string, _options: object, command: Command) => {
      const doc = await open(file, command);
      const env = doc.environment === undefined ? '' : `, env ${doc.environment}`;
      print(chalk.green(`ok (${doc.sections.length} sections${env})`));
    });

  program
    .command('get <file> <path>')
    .description('Print the value at a dotted path')
    .addOption(
      new Option('--as <kind>', 'Expected value type')
        .choices(['auto', 'int', 'bool', 'str', 'list'])
        .default('auto')
    )
    .option('--width <width>', 'Integer width for --as int', parseWidth, 'isize')
    .action(async (file: string, path: string, options: GetOptions, command: Command) => {
      const doc = await open(file, command);
      print(formatValue(doc, path, options));
    });

  program
    .command('keys <file> [path]')
    .description('List the sections or properties under a dotted path')
    .action(async (file: string, path: string | undefined, _options: object, command: Command) => {
      const doc = await open(file, command);
      for (const key of listKeys(doc, path ?? '')) print(key);
    });

  program
    .command('format <file>')
    .description('Print a configuration file in canonical form')
    .action(async (file: string, _options: object, command: Command) => {
      const doc = await open(file, command);
      io.stdout.write(stringify(doc));
    });

  return program;
}

/** Runs the CLI and returns the process exit code. */
export async function run(argv: readonly string[], io: CliIO = defaultIO()): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof ConfParseError) {
      // Already logged with its location by loadConfig.
      if (err.excerpt) io.stderr.write(chalk.dim(err.excerpt) + chalk.red(' <<< HERE') + '\n');
      return 1;
    }
    if (err instanceof ConfError) {
      io.stderr.write(chalk.red(`error: ${err.toString()}`) + '\n');
      return 1;
    }
    throw err;
  }
}

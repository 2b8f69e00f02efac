// src/config.ts

import { parseArgs } from 'node:util';
import { DEFAULT_DEBOUNCE_SECONDS, SERIAL_DEFAULTS } from './constants/constants.js';
import { ConfigError } from './errors.js';
import type { CliCommand, LogLevel, RecorderConfig } from './types/ut803-types.js';

export const LOG_LEVEL_ENV = 'UT803_LOG_LEVEL';
const DEFAULT_LOG_LEVEL: LogLevel = 'warn';
const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export const USAGE = `Usage: ut803 [options] <port> <output>

Record and monitor readings from a UT803 multimeter over its serial link.
Connect the meter through its RS-232 port or the USB adapter, which shows up
as a virtual serial port.

Arguments:
  port                  Serial port of the meter, e.g. /dev/ttyUSB0 or COM3
  output                Output file, or - for standard output

Options:
  -d, --delay <s>       Wait this many seconds after each recorded sample
  -m, --monitor         Show a live line with the current value and flags
      --debounce <s>    Drop repeated samples closer than this (default ${DEFAULT_DEBOUNCE_SECONDS})
      --timeout <ms>    Read timeout per line (default ${SERIAL_DEFAULTS.READ_TIMEOUT_MS})
      --log-level <l>   trace, debug, info, warn or error (default $${LOG_LEVEL_ENV} or ${DEFAULT_LOG_LEVEL})
  -l, --list            List serial ports and exit
  -h, --help            Show this help
`;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function parseLogLevel(value: string | undefined, source: string): LogLevel | undefined {
  if (value === undefined || value === '') return undefined;
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`Invalid ${source}: ${value}. Expected one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

function parseNonNegative(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(`Invalid ${name}: ${value}. Expected a non-negative number`);
  }
  return parsed;
}

/**
 * Parses command line arguments (without node and script path) and the
 * environment into a command.
 * @throws ConfigError for unknown options, missing arguments or bad values
 */
export function loadConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): CliCommand {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (err: unknown) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
  const { values, positionals } = parsed;

  if (values.help) return { command: 'help' };

  const logLevel =
    parseLogLevel(values['log-level'], '--log-level') ??
    parseLogLevel(env[LOG_LEVEL_ENV], LOG_LEVEL_ENV) ??
    DEFAULT_LOG_LEVEL;

  if (values.list) return { command: 'list', logLevel };

  const [port, output, ...extra] = positionals;
  if (port === undefined || output === undefined) {
    throw new ConfigError('Both <port> and <output> are required');
  }
  if (extra.length > 0) {
    throw new ConfigError(`Unexpected argument: ${extra[0]}`);
  }
  if (port.trim() === '') throw new ConfigError('Serial port must not be empty');
  if (output.trim() === '') throw new ConfigError('Output must not be empty');

  const readTimeout = parseNonNegative(
    values.timeout,
    '--timeout',
    SERIAL_DEFAULTS.READ_TIMEOUT_MS
  );
  if (readTimeout === 0) throw new ConfigError('Invalid --timeout: must be greater than 0');

  const config: RecorderConfig = {
    port,
    output,
    delaySeconds: parseNonNegative(values.delay, '--delay', 0),
    debounceSeconds: parseNonNegative(values.debounce, '--debounce', DEFAULT_DEBOUNCE_SECONDS),
    readTimeout,
    monitor: values.monitor ?? false,
    logLevel,
  };
  return { command: 'record', config };
}

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      delay: { type: 'string', short: 'd' },
      monitor: { type: 'boolean', short: 'm' },
      debounce: { type: 'string' },
      timeout: { type: 'string' },
      'log-level': { type: 'string' },
      list: { type: 'boolean', short: 'l' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/** True when the output argument selects standard output */
export function isStdout(output: string): boolean {
  return output === '-';
}

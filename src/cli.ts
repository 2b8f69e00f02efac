#!/usr/bin/env node
// src/cli.ts

import type { Writable } from 'node:stream';
import { rootLogger } from './logger.js';
import { USAGE, isStdout, loadConfig } from './config.js';
import { ConfigError } from './errors.js';
import Recorder from './recorder.js';
import { TsvWriter, openFileOutput } from './session/tsv-writer.js';
import SerialLineTransport from './transport/node-transports/node-serialport.js';
import type { CliCommand, RecorderConfig } from './types/ut803-types.js';

const logger = rootLogger.createLogger('CLI');

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

async function listPorts(): Promise<number> {
  const ports = await SerialLineTransport.listPorts();
  if (ports.length === 0) {
    process.stdout.write('No serial ports found\n');
    return EXIT_OK;
  }
  for (const port of ports) {
    const details = [port.manufacturer, port.serialNumber].filter(Boolean).join(', ');
    process.stdout.write(details ? `${port.path}\t${details}\n` : `${port.path}\n`);
  }
  return EXIT_OK;
}

async function record(config: RecorderConfig): Promise<number> {
  const toStdout = isStdout(config.output);
  const transport = new SerialLineTransport(config.port, { readTimeout: config.readTimeout });
  await transport.open();

  let output: Writable;
  try {
    output = toStdout ? process.stdout : await openFileOutput(config.output);
  } catch (err: unknown) {
    await transport.close();
    throw err;
  }
  const writer = new TsvWriter(output, !toStdout);
  const monitorStream = toStdout ? process.stderr : process.stdout;
  const recorder = new Recorder(transport, writer, monitorStream, {
    delaySeconds: config.delaySeconds,
    debounceSeconds: config.debounceSeconds,
    readTimeout: config.readTimeout,
    monitor: config.monitor,
  });

  // stays registered until the port and output are released
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, stopping`);
    recorder.stop();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    await recorder.run();
    return EXIT_OK;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    recorder.diagnostics.printStats();
  }
}

/**
 * Runs the command line tool and returns the process exit code.
 */
async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let command: CliCommand;
  try {
    command = loadConfig(argv);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      process.stderr.write(`${err.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (command.command === 'help') {
    process.stdout.write(USAGE);
    return EXIT_OK;
  }

  rootLogger.setLevel(command.command === 'list' ? command.logLevel : command.config.logLevel);
  if (!process.stderr.isTTY) rootLogger.disableColors();

  try {
    return command.command === 'list' ? await listPorts() : await record(command.config);
  } catch (err: unknown) {
    logger.error(err instanceof Error ? err.message : String(err));
    return EXIT_FAILURE;
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exitCode = EXIT_FAILURE;
  }
);

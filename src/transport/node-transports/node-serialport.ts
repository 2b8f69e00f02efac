// src/transport/node-transports/node-serialport.ts

import { SerialPort, ReadlineParser } from 'serialport';
import type { Duplex } from 'node:stream';
import { Mutex } from 'async-mutex';
import { rootLogger } from '../../logger.js';
import { SERIAL_DEFAULTS } from '../../constants/constants.js';
import {
  ConfigError,
  SerialConnectionError,
  SerialReadError,
  SerialTransportError,
} from '../../errors.js';
import type {
  LineSource,
  SerialPortSummary,
  SerialTransportOptions,
} from '../../types/ut803-types.js';

// ========== CONSTANTS ==========
const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 115200,
} as const;

// ========== LOGGER ==========
const logger = rootLogger.createLogger('SerialTransport');

type ErrorCallback = (err: Error | null) => void;

/** The parts of a serialport stream the transport relies on */
export type SerialPortHandle = Duplex & {
  readonly isOpen: boolean;
  open(callback?: ErrorCallback): void;
  close(callback?: ErrorCallback): void;
  set(options: { dtr?: boolean; rts?: boolean }, callback?: ErrorCallback): void;
};

export interface PortOpenOptions {
  path: string;
  baudRate: number;
  dataBits: 5 | 6 | 7 | 8;
  stopBits: 1 | 1.5 | 2;
  parity: 'none' | 'even' | 'mark' | 'odd' | 'space';
  xon: boolean;
  xoff: boolean;
  rtscts: boolean;
  autoOpen: false;
}

export type PortFactory = (options: PortOpenOptions) => SerialPortHandle;

const defaultPortFactory: PortFactory = options => new SerialPort(options);

interface PendingRead {
  resolve(line: string | null): void;
  reject(err: Error): void;
}

/**
 * Line-oriented serial transport for the meter. Opens the port with the
 * meter's line discipline, splits the stream on LF (keeping the delimiter,
 * so a complete record is 11 characters) and queues records for readLine().
 */
class SerialLineTransport implements LineSource {
  private path: string;
  private options: Required<SerialTransportOptions>;
  private portFactory: PortFactory;
  private port: SerialPortHandle | null = null;
  private parser: ReadlineParser | null = null;
  private lines: string[] = [];
  private pending: PendingRead | null = null;
  private failure: Error | null = null;
  private _isOpen: boolean = false;
  private _isClosing: boolean = false;
  private _droppedLines: number = 0;
  private readonly _readMutex: Mutex = new Mutex();

  constructor(
    path: string,
    options: SerialTransportOptions = {},
    portFactory: PortFactory = defaultPortFactory
  ) {
    this.path = path;
    this.portFactory = portFactory;
    this.options = {
      baudRate: SERIAL_DEFAULTS.BAUD_RATE,
      dataBits: SERIAL_DEFAULTS.DATA_BITS,
      stopBits: SERIAL_DEFAULTS.STOP_BITS,
      parity: SERIAL_DEFAULTS.PARITY,
      xon: SERIAL_DEFAULTS.XON,
      xoff: SERIAL_DEFAULTS.XOFF,
      rtscts: SERIAL_DEFAULTS.RTSCTS,
      readTimeout: SERIAL_DEFAULTS.READ_TIMEOUT_MS,
      maxQueuedLines: SERIAL_DEFAULTS.MAX_QUEUED_LINES,
      ...options,
    };
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  /** Records discarded because the queue was full */
  get droppedLines(): number {
    return this._droppedLines;
  }

  async open(): Promise<void> {
    if (this._isOpen) {
      logger.warn(`Serial port ${this.path} is already open`);
      return;
    }
    if (
      this.options.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new ConfigError(`Invalid baud rate: ${this.options.baudRate}`);
    }

    this.failure = null;
    this.lines = [];
    const port = this.portFactory({
      path: this.path,
      baudRate: this.options.baudRate,
      dataBits: this.options.dataBits,
      stopBits: this.options.stopBits,
      parity: this.options.parity,
      xon: this.options.xon,
      xoff: this.options.xoff,
      rtscts: this.options.rtscts,
      autoOpen: false,
    });
    this.port = port;

    await new Promise<void>((resolve, reject) => {
      port.open((err: Error | null) => {
        if (err) {
          reject(toConnectionError(err));
          return;
        }
        resolve();
      });
    });

    port.on('error', this._onError);
    port.on('close', this._onClose);

    // DTR high / RTS low powers the meter's optically isolated transmitter
    await new Promise<void>((resolve, reject) => {
      port.set({ dtr: true, rts: false }, (err: Error | null) => {
        if (err) reject(new SerialConnectionError(`Failed to set control lines: ${err.message}`));
        else resolve();
      });
    }).catch(async (err: unknown) => {
      await this._releasePort();
      throw err;
    });

    const parser = new ReadlineParser({
      delimiter: SERIAL_DEFAULTS.DELIMITER,
      includeDelimiter: true,
      encoding: 'ascii',
    });
    parser.on('data', this._onLine);
    port.pipe(parser);
    this.parser = parser;

    this._isOpen = true;
    logger.info(
      `Serial port ${this.path} opened (${this.options.baudRate} baud, ${this.options.dataBits}${this.options.parity[0]?.toUpperCase()}${this.options.stopBits})`
    );
  }

  /**
   * Resolves with the next record, or null when none arrived within the
   * timeout or `signal` was aborted. Rejects once the port has failed or
   * closed and the queue is empty.
   */
  async readLine(
    timeout: number = this.options.readTimeout,
    signal?: AbortSignal
  ): Promise<string | null> {
    const release = await this._readMutex.acquire();
    try {
      return await this._waitForLine(timeout, signal);
    } finally {
      release();
    }
  }

  private _waitForLine(timeout: number, signal?: AbortSignal): Promise<string | null> {
    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);
    if (!this._isOpen) return Promise.reject(new SerialReadError('Port closed'));
    if (signal?.aborted) return Promise.resolve(null);

    return new Promise<string | null>((resolve, reject) => {
      const settle = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.pending = null;
      };
      const onAbort = (): void => {
        settle();
        resolve(null);
      };
      const timer = setTimeout(onAbort, timeout);
      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending = {
        resolve: line => {
          settle();
          resolve(line);
        },
        reject: err => {
          settle();
          reject(err);
        },
      };
    });
  }

  private readonly _onLine = (line: string): void => {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.resolve(line);
      return;
    }
    this.lines.push(line);
    if (this.lines.length > this.options.maxQueuedLines) {
      this.lines.shift();
      this._droppedLines++;
      logger.warn(`Line queue overflow on ${this.path}, oldest record dropped`);
    }
  };

  private readonly _onError = (err: Error): void => {
    logger.error(`Serial port ${this.path} error: ${err.message}`);
    this._fail(new SerialTransportError(err.message));
  };

  private readonly _onClose = (): void => {
    this._isOpen = false;
    if (this._isClosing) return;
    logger.warn(`Serial port ${this.path} closed unexpectedly`);
    this._fail(new SerialReadError(`Serial port ${this.path} closed unexpectedly`));
  };

  private _fail(err: Error): void {
    this.failure ??= err;
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(this.failure);
    }
  }

  private async _releasePort(): Promise<void> {
    const port = this.port;
    if (!port) return;

    if (this.parser) {
      port.unpipe(this.parser);
      this.parser.removeAllListeners('data');
      this.parser = null;
    }

    if (port.isOpen) {
      await new Promise<void>((resolve, reject) => {
        port.close((err: Error | null) => {
          if (err) reject(new SerialTransportError(`Failed to close ${this.path}: ${err.message}`));
          else resolve();
        });
      });
      logger.debug(`Serial port ${this.path} closed`);
    }

    port.off('error', this._onError);
    port.off('close', this._onClose);
    this.port = null;
  }

  /**
   * Closes the port. Safe to call more than once.
   */
  async close(): Promise<void> {
    this._isClosing = true;
    try {
      this._fail(new SerialReadError('Port closed'));
      await this._releasePort();
    } finally {
      this._isOpen = false;
      this._isClosing = false;
    }
  }

  /**
   * Serial ports visible to the OS.
   */
  static async listPorts(): Promise<SerialPortSummary[]> {
    const ports = await SerialPort.list();
    return ports.map(p => ({
      path: p.path,
      manufacturer: p.manufacturer,
      serialNumber: p.serialNumber,
      vendorId: p.vendorId,
      productId: p.productId,
    }));
  }
}

function toConnectionError(err: Error): SerialConnectionError {
  const message = err.message.toLowerCase();
  if (message.includes('permission')) return new SerialConnectionError('Permission denied');
  if (message.includes('busy') || message.includes('lock'))
    return new SerialConnectionError('Serial port is busy');
  if (
    message.includes('no such file') ||
    message.includes('not found') ||
    message.includes('does not exist')
  )
    return new SerialConnectionError('Serial port does not exist');
  return new SerialConnectionError(err.message);
}

export default SerialLineTransport;

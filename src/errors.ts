// src/errors.ts

/**
 * Base class for all errors raised by this package
 */
export class Ut803Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'Ut803Error';
  }
}

// --- Frame decoding errors ---

/**
 * Base class for errors that make a single frame unusable.
 * The caller discards the frame and waits for the next one.
 */
export class FrameDecodeError extends Ut803Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameDecodeError';
  }
}

/**
 * Error class for a frame that is not exactly 11 characters long
 */
export class FrameLengthError extends FrameDecodeError {
  received: number;
  expected: number;

  constructor(received: number, expected: number) {
    super(`Invalid frame length: received ${received}, expected ${expected}`);
    this.name = 'FrameLengthError';
    this.received = received;
    this.expected = expected;
  }
}

/**
 * Error class for a character that is not valid at its frame position
 */
export class InvalidDigitError extends FrameDecodeError {
  position: number;
  character: string;

  constructor(position: number, character: string) {
    super(`Invalid digit ${JSON.stringify(character)} at frame position ${position}`);
    this.name = 'InvalidDigitError';
    this.position = position;
    this.character = character;
  }
}

/**
 * Error class for a kind nibble outside the measurement table
 */
export class UnknownMeasurementKindError extends FrameDecodeError {
  code: number;

  constructor(code: number) {
    super(`Unknown measurement kind code: ${code}`);
    this.name = 'UnknownMeasurementKindError';
    this.code = code;
  }
}

// --- Configuration errors ---

/**
 * Error class for invalid command line or environment configuration
 */
export class ConfigError extends Ut803Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// --- I/O errors ---

/**
 * Base class for serial transport errors
 */
export class SerialTransportError extends Ut803Error {
  constructor(message: string = 'Serial transport error') {
    super(message);
    this.name = 'SerialTransportError';
  }
}

/**
 * Error class for failures while opening the serial port
 */
export class SerialConnectionError extends SerialTransportError {
  constructor(message: string = 'Serial connection error') {
    super(message);
    this.name = 'SerialConnectionError';
  }
}

/**
 * Error class for reads from a closed or failed port
 */
export class SerialReadError extends SerialTransportError {
  constructor(message: string = 'Serial read error') {
    super(message);
    this.name = 'SerialReadError';
  }
}

/**
 * Error class for failures of the output stream
 */
export class OutputWriteError extends Ut803Error {
  constructor(message: string = 'Output write failed') {
    super(message);
    this.name = 'OutputWriteError';
  }
}

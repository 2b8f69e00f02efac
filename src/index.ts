// src/index.ts

export {
  FrameDecoder,
  decodeFrame,
  decodeNibble,
  decodeBaseMagnitude,
  decodeFlags,
  decodeKind,
  computeExponent,
  scaleMagnitude,
} from './framers/frame-decoder.js';
export { resolveUnit, getUnit, getExponentOffsetForUnit } from './framers/unit-resolver.js';
export { acceptSample, createSessionState } from './session/session-state.js';
export { TsvWriter, formatHeader, formatDataLine, openFileOutput } from './session/tsv-writer.js';
export { prettyValueFormat, activeFlagNames, formatMonitorLine, formatFloat } from './utils/format.js';
export { loadConfig, USAGE } from './config.js';
export { default as Recorder } from './recorder.js';
export { default as SerialLineTransport } from './transport/node-transports/node-serialport.js';
export type { PortFactory, SerialPortHandle } from './transport/node-transports/node-serialport.js';
export { default as Diagnostics } from './utils/diagnostics.js';
export { default as Logger, rootLogger } from './logger.js';
export * from './errors.js';
export * from './constants/constants.js';
export { MeasurementKind } from './types/ut803-types.js';
export type {
  Reading,
  StatusFlags,
  FlagNibbles,
  ResolvedUnit,
  DecodeResult,
  LineSource,
  SerialTransportOptions,
  SerialPortSummary,
  SessionState,
  SampleDecision,
  RecorderOptions,
  RecorderConfig,
  CliCommand,
  DiagnosticsStats,
  DiagnosticsOptions,
  LogLevel,
  LogContext,
  LoggerInstance,
} from './types/ut803-types.js';

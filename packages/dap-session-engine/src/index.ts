/**
 * Client-side session engine for the Debug Adapter Protocol (DAP): typed
 * requests, capability negotiation, message correlation and a derived,
 * string-interned read cache.
 *
 * @module dap-session-engine
 */

export type { DebugProtocol } from '@vscode/debugprotocol';

export { Session } from './session';
export type {
  EndSessionMode,
  MessageEffect,
  SessionOptions,
  SessionState,
  SessionStats,
} from './session';
export { SessionData } from './sessionData';
export type { DebuggeeStatus, ThreadState, ThreadView } from './sessionData';
export { StringStorage } from './stringStorage';

export {
  AdapterProcessError,
  AdapterProcessErrorBuilder,
  ChildAdapterProcess,
} from './adapterProcess';
export type {
  AdapterConfig,
  AdapterExit,
  AdapterProcess,
  AdapterProcessFailure,
  AdapterProcessStage,
  SpawnFunction,
} from './adapterProcess';
export { AdapterConfigLoader } from './config/adapterConfigLoader';
export { ContentLengthTransport } from './transport/contentLengthTransport';
export type { MessageTransport } from './transport/messageTransport';

export {
  ContractViolationError,
  DAPRequestError,
  EndOfStreamError,
  MarshalError,
  SessionError,
  isSessionError,
} from './errors';
export type {
  MarshalErrorCode,
  SessionErrorCode,
  SessionErrorContext,
} from './errors';
export { childLogger, createLogger } from './logging';
export type { CreateLoggerOptions, LoggerInterface } from './logging';

export * from './marshal/schema';
export {
  deepClone,
  deepCloneJson,
  fromValue,
  injectIntoAncestor,
  mergeObject,
  toObject,
  toValue,
} from './marshal/marshaller';
export * from './protocol/capabilities';
export * from './protocol/json';
export * from './protocol/schemas';

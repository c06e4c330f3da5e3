import type { JsonObject } from './protocol/json';

export type SessionErrorCode =
  | 'ResponseDoesNotExist'
  | 'EventDoesNotExist'
  | 'RequestFailed'
  | 'RequestResponseMismatchedSeq'
  | 'WrongCommandForResponse'
  | 'InvalidMessage'
  | 'UnknownMessage'
  | 'InvalidSeqFromAdapter'
  | 'AdapterDoesNotSupportConfigurationDone'
  | 'AdapterDoesNotSupportTerminate'
  | 'AdapterDoesNotSupportRequest'
  | 'SessionNotStarted'
  | 'SessionTerminated'
  | 'AttachNotImplemented';

export interface SessionErrorContext {
  seq?: number;
  command?: string;
  event?: string;
  message?: JsonObject;
}

/**
 * A protocol-contract violation, capability refusal or lifecycle refusal
 * reported back to the caller of a Session operation.
 */
export class SessionError extends Error {
  constructor(
    public readonly code: SessionErrorCode,
    message: string,
    public readonly context: SessionErrorContext = {},
  ) {
    super(message);
    this.name = 'SessionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The adapter answered a request with `success: false`. `body` is the
 * response body as sent, usually carrying an `error` message object.
 */
export class DAPRequestError extends SessionError {
  public readonly body?: JsonObject;

  constructor(
    message: string,
    public readonly requestSeq: number,
    command: string,
    response: JsonObject,
    body?: JsonObject,
  ) {
    super('RequestFailed', message, {
      seq: requestSeq,
      command,
      message: response,
    });
    this.name = 'DAPRequestError';
    if (body) this.body = body;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The adapter's output stream ended, or failed with `cause`. Terminal for the
 * session that owns it.
 */
export class EndOfStreamError extends Error {
  constructor(
    message: string = 'Adapter output stream ended',
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'EndOfStreamError';
    Object.setPrototypeOf(this, EndOfStreamError.prototype);
  }
}

/**
 * A state-dependent operation was invoked out of order. Not recoverable.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
    Object.setPrototypeOf(this, ContractViolationError.prototype);
  }
}

export function assertContract(
  condition: boolean,
  message: string,
): asserts condition {
  if (!condition) {
    throw new ContractViolationError(message);
  }
}

export function isSessionError(
  error: unknown,
  code?: SessionErrorCode,
): error is SessionError {
  return (
    error instanceof SessionError && (code === undefined || error.code === code)
  );
}

export type MarshalErrorCode =
  | 'AncestorDoesNotExist'
  | 'AncestorIsNotAnObject'
  | 'UntaggedUnion'
  | 'UnsupportedShape'
  | 'TypeMismatch'
  | 'NotAnObject';

/**
 * A value did not fit the schema it was marshalled with. `path` is the dotted
 * location inside the value, `$` being the root.
 */
export class MarshalError extends Error {
  constructor(
    public readonly code: MarshalErrorCode,
    public readonly path: string,
    message: string,
  ) {
    super(`${message} (at ${path})`);
    this.name = 'MarshalError';
    Object.setPrototypeOf(this, MarshalError.prototype);
  }
}

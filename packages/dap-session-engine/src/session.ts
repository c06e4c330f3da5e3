import {
  AdapterConfig,
  AdapterExit,
  AdapterProcess,
  ChildAdapterProcess,
} from './adapterProcess';
import {
  ContractViolationError,
  DAPRequestError,
  EndOfStreamError,
  SessionError,
  SessionErrorCode,
  assertContract,
} from './errors';
import { LoggerInterface, childLogger, createLogger } from './logging';
import { deepCloneJson, fromValue, mergeObject, toObject, toValue } from './marshal/marshaller';
import type { Schema } from './marshal/schema';
import {
  ADAPTER_CAPABILITY_KINDS,
  AdapterCapabilities,
  AdapterCapabilityKind,
  CLIENT_CAPABILITY_KINDS,
  CapabilitySet,
  ClientCapabilityKind,
  capabilitySetFromObject,
  emptyAdapterCapabilities,
  emptyClientCapabilities,
} from './protocol/capabilities';
import {
  JsonObject,
  JsonValue,
  getObject,
  getString,
  getValue,
  isJsonObject,
} from './protocol/json';
import {
  ConfigurationDoneArguments,
  DisconnectArguments,
  InitializeArguments,
  LaunchArguments,
  ModulesArguments,
  RequestCommand,
  TerminateArguments,
  capabilityArraysSchema,
  configurationDoneArgumentsSchema,
  disconnectArgumentsSchema,
  initializeArgumentsSchema,
  launchArgumentsSchema,
  modulesArgumentsSchema,
  noArgumentsSchema,
  requestSchema,
  terminateArgumentsSchema,
} from './protocol/schemas';
import { ContentLengthTransport } from './transport/contentLengthTransport';
import type { MessageTransport } from './transport/messageTransport';

/**
 * `attached` is reserved: no operation enters it yet.
 */
export type SessionState = 'not_started' | 'launched' | 'attached' | 'terminated';

export type EndSessionMode = 'terminate' | 'disconnect';

export interface SessionOptions {
  /** Interval the wait helpers poll the transport at. Defaults to 10ms. */
  pollIntervalMs?: number;
  logger?: LoggerInterface;
}

export interface SessionStats {
  requestsSent: number;
  responsesReceived: number;
  eventsReceived: number;
  pendingResponses: number;
  pendingEvents: number;
  handledResponses: number;
  handledEvents: number;
}

/** Runs against a message before it moves from pending to handled. */
export type MessageEffect = (message: JsonObject) => void;

const DEFAULT_POLL_INTERVAL_MS = 10;
const MAX_SEQ = 2 ** 31 - 1;

interface CapabilityGate {
  capability: AdapterCapabilityKind;
  code: SessionErrorCode;
}

const CAPABILITY_GATES: Partial<Record<RequestCommand, CapabilityGate>> = {
  configurationDone: {
    capability: 'supportsConfigurationDoneRequest',
    code: 'AdapterDoesNotSupportConfigurationDone',
  },
  terminate: {
    capability: 'supportsTerminateRequest',
    code: 'AdapterDoesNotSupportTerminate',
  },
  modules: {
    capability: 'supportsModulesRequest',
    code: 'AdapterDoesNotSupportRequest',
  },
};

function isSeq(value: JsonValue | undefined): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Client side of one debug adapter connection.
 *
 * Every request kind has a `sendXRequest` / `handleXResponse` pair. Sends
 * return the allocated seq; incoming messages are pulled off the transport by
 * {@link queueMessages} into pending queues, and a `handle*` call validates
 * one of them, applies its effect and moves it to the handled queue, where it
 * stays for the lifetime of the session.
 */
export class Session {
  private readonly logger: LoggerInterface;
  private readonly pollIntervalMs: number;

  private nextSeq = 1;
  private currentState: SessionState = 'not_started';
  private clientCapabilitySet: CapabilitySet<ClientCapabilityKind> =
    emptyClientCapabilities();
  private adapterCapabilitySet: AdapterCapabilities = emptyAdapterCapabilities();
  private restartData: JsonValue | undefined;

  private readonly pendingResponses: JsonObject[] = [];
  private readonly handledResponses: JsonObject[] = [];
  private readonly pendingEvents: JsonObject[] = [];
  private readonly handledEvents: JsonObject[] = [];

  private requestsSent = 0;
  private responsesReceived = 0;
  private eventsReceived = 0;

  constructor(
    private readonly adapter: AdapterProcess,
    private readonly transport: MessageTransport,
    options: SessionOptions = {},
  ) {
    this.logger = childLogger(options.logger ?? createLogger(), {
      component: 'Session',
    });
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  /**
   * Spawns the adapter described by `config` and connects a session to its
   * standard streams.
   */
  public static async fromAdapterConfig(
    config: AdapterConfig,
    options: SessionOptions = {},
  ): Promise<Session> {
    const logger = options.logger ?? createLogger();
    const adapter = new ChildAdapterProcess(config, logger);
    await adapter.spawn();
    const transport = new ContentLengthTransport(adapter.stdout, logger);
    return new Session(adapter, transport, { ...options, logger });
  }

  public get state(): SessionState {
    return this.currentState;
  }

  public get clientCapabilities(): CapabilitySet<ClientCapabilityKind> {
    return this.clientCapabilitySet;
  }

  public get adapterCapabilities(): AdapterCapabilities {
    return this.adapterCapabilitySet;
  }

  /** Restart payload retained from the last `terminated` event, if any. */
  public get pendingRestartData(): JsonValue | undefined {
    return this.restartData;
  }

  public get handled(): {
    responses: readonly JsonObject[];
    events: readonly JsonObject[];
  } {
    return { responses: this.handledResponses, events: this.handledEvents };
  }

  public stats(): SessionStats {
    return {
      requestsSent: this.requestsSent,
      responsesReceived: this.responsesReceived,
      eventsReceived: this.eventsReceived,
      pendingResponses: this.pendingResponses.length,
      pendingEvents: this.pendingEvents.length,
      handledResponses: this.handledResponses.length,
      handledEvents: this.handledEvents.length,
    };
  }

  public waitForAdapterExit(): Promise<AdapterExit> {
    return this.adapter.wait();
  }

  // --- initialize ---

  /**
   * `extra` is merged into the request's `arguments`, for adapter-specific
   * fields the typed arguments do not declare.
   */
  public sendInitRequest(
    args: InitializeArguments,
    extra: JsonObject = {},
  ): Promise<number> {
    return this.sendRequest('initialize', initializeArgumentsSchema, args, extra, () => {
      this.clientCapabilitySet = capabilitySetFromObject(
        toObject(initializeArgumentsSchema, args),
        CLIENT_CAPABILITY_KINDS,
      );
    });
  }

  public handleInitResponse(seq: number): void {
    this.handleResponse(seq, 'initialize', (response) => {
      const body = getObject(response, 'body');
      const arrays = fromValue(capabilityArraysSchema, body ?? {}, '$.body');
      this.adapterCapabilitySet = {
        ...arrays,
        support: capabilitySetFromObject(body, ADAPTER_CAPABILITY_KINDS),
      };
    });
  }

  // --- launch ---

  /**
   * Restart data from a previous `terminated` event is passed on as
   * `__restart` unless `args` carries its own.
   */
  public async sendLaunchRequest(
    args: LaunchArguments = {},
    extra: JsonObject = {},
  ): Promise<number> {
    this.assertCanSend('launch');
    assertContract(
      this.currentState === 'not_started',
      `launch requires state 'not_started', session is '${this.currentState}'`,
    );
    const restart = this.restartData;
    const launchArgs =
      restart !== undefined && args.__restart === undefined
        ? { ...args, __restart: restart }
        : args;
    return this.sendRequest('launch', launchArgumentsSchema, launchArgs, extra, () => {
      this.restartData = undefined;
    });
  }

  public handleLaunchResponse(seq: number): void {
    assertContract(
      this.currentState === 'not_started',
      `launch response requires state 'not_started', session is '${this.currentState}'`,
    );
    this.handleResponse(seq, 'launch', () => {
      this.currentState = 'launched';
    });
  }

  // --- configurationDone ---

  public sendConfigurationDoneRequest(
    args?: ConfigurationDoneArguments,
    extra: JsonObject = {},
  ): Promise<number> {
    return this.sendRequest(
      'configurationDone',
      configurationDoneArgumentsSchema,
      args,
      extra,
    );
  }

  public handleConfigurationDoneResponse(seq: number): void {
    this.handleResponse(seq, 'configurationDone');
  }

  // --- terminate / disconnect ---

  public sendTerminateRequest(
    args?: TerminateArguments,
    extra: JsonObject = {},
  ): Promise<number> {
    return this.sendRequest('terminate', terminateArgumentsSchema, args, extra);
  }

  public handleTerminateResponse(seq: number): void {
    this.handleResponse(seq, 'terminate');
  }

  public sendDisconnectRequest(
    args?: DisconnectArguments,
    extra: JsonObject = {},
  ): Promise<number> {
    return this.sendRequest('disconnect', disconnectArgumentsSchema, args, extra);
  }

  public handleDisconnectResponse(seq: number): void {
    this.handleResponse(seq, 'disconnect', () => {
      this.currentState = 'not_started';
    });
  }

  /**
   * Ends a launched debuggee with a terminate or disconnect request.
   * @returns the seq of the request sent.
   */
  public async endSession(mode: EndSessionMode): Promise<number> {
    switch (this.currentState) {
      case 'not_started':
        throw new SessionError('SessionNotStarted', 'Session has not been started');
      case 'attached':
        throw new SessionError(
          'AttachNotImplemented',
          'Ending an attached session is not implemented',
        );
      case 'terminated':
        throw new SessionError('SessionTerminated', 'Adapter has terminated');
      case 'launched':
        return mode === 'terminate'
          ? this.sendTerminateRequest()
          : this.sendDisconnectRequest();
    }
  }

  // --- threads / modules ---

  public sendThreadsRequest(extra: JsonObject = {}): Promise<number> {
    return this.sendRequest('threads', noArgumentsSchema, undefined, extra);
  }

  public sendModulesRequest(
    args?: ModulesArguments,
    extra: JsonObject = {},
  ): Promise<number> {
    return this.sendRequest('modules', modulesArgumentsSchema, args, extra);
  }

  // --- intake ---

  /**
   * Polls the transport once, waiting up to `timeoutMs`, and queues the
   * message it yields.
   * @returns whether a message was queued.
   * @throws EndOfStreamError when the adapter's output ended or failed; the session is
   * `terminated` from then on.
   */
  public async queueMessages(timeoutMs: number): Promise<boolean> {
    if (!(await this.transport.messageExists(timeoutMs))) return false;

    let message: JsonValue;
    try {
      message = this.transport.readMessage();
    } catch (error) {
      if (error instanceof EndOfStreamError) {
        this.currentState = 'terminated';
        this.logger.error('Adapter output stream ended; session terminated.');
      }
      throw error;
    }

    if (!isJsonObject(message)) {
      throw new SessionError('InvalidMessage', 'Message is not an object');
    }
    const type = message.type;
    if (typeof type !== 'string') {
      throw new SessionError(
        'InvalidMessage',
        "Message has no string 'type' field",
        { message },
      );
    }

    switch (type) {
      case 'response':
        this.pendingResponses.push(message);
        this.responsesReceived++;
        break;
      case 'event':
        this.pendingEvents.push(message);
        this.eventsReceived++;
        break;
      default:
        throw new SessionError('UnknownMessage', `Unknown message type '${type}'`, {
          message,
        });
    }
    this.logger.trace({ message }, `Queued ${type}`);
    return true;
  }

  /**
   * Queues messages until the response to `seq` is pending. Polls without a
   * deadline.
   */
  public async waitForResponse(seq: number): Promise<JsonObject> {
    for (;;) {
      const index = this.responseIndex(seq);
      if (index !== -1) return this.pendingResponses[index];
      await this.queueMessages(this.pollIntervalMs);
    }
  }

  /**
   * Queues messages until an event called `name` is pending. Polls without a
   * deadline.
   */
  public async waitForEvent(name: string): Promise<JsonObject> {
    for (;;) {
      const event = this.getEvent(name);
      if (event) return event;
      await this.queueMessages(this.pollIntervalMs);
    }
  }

  public hasResponse(seq: number): boolean {
    return this.responseIndex(seq) !== -1;
  }

  /** The oldest pending event called `name`. */
  public getEvent(name: string): JsonObject | undefined {
    const index = this.eventIndexByName(name);
    return index === -1 ? undefined : this.pendingEvents[index];
  }

  // --- correlation ---

  /**
   * Validates the pending response to request `seq`, runs `effect` on it and
   * moves it to the handled queue. Nothing moves if any step throws.
   */
  public handleResponse(
    seq: number,
    command: string,
    effect?: MessageEffect,
  ): JsonObject {
    if (!Number.isInteger(seq) || seq < 1 || seq >= this.nextSeq) {
      throw new SessionError(
        'ResponseDoesNotExist',
        `No request with seq ${seq} was sent`,
        { seq, command },
      );
    }
    const index = this.responseIndex(seq);
    if (index === -1) {
      throw new SessionError(
        'ResponseDoesNotExist',
        `No pending response to request ${seq} (${command})`,
        { seq, command },
      );
    }
    const response = this.pendingResponses[index];
    this.validateResponse(response, seq, command);
    effect?.(response);

    this.pendingResponses.splice(index, 1);
    this.handledResponses.push(response);
    return response;
  }

  /** Handles the oldest pending event called `name`. */
  public handleNamedEvent(name: string, effect?: MessageEffect): JsonObject {
    const index = this.eventIndexByName(name);
    if (index === -1) {
      throw new SessionError('EventDoesNotExist', `No pending '${name}' event`, {
        event: name,
      });
    }
    return this.consumeEvent(index, effect);
  }

  /** Handles the pending event whose own `seq` is `seq`. */
  public handleEvent(seq: number, effect?: MessageEffect): JsonObject {
    const index = this.pendingEvents.findIndex((event) => {
      const eventSeq = event.seq;
      if (!isSeq(eventSeq)) {
        throw new SessionError(
          'InvalidSeqFromAdapter',
          'Event seq is not an integer',
          { message: event },
        );
      }
      return eventSeq === seq;
    });
    if (index === -1) {
      throw new SessionError('EventDoesNotExist', `No pending event with seq ${seq}`, {
        seq,
      });
    }
    return this.consumeEvent(index, effect);
  }

  private consumeEvent(index: number, effect?: MessageEffect): JsonObject {
    const event = this.pendingEvents[index];
    effect?.(event);

    if (getString(event, 'event') === 'terminated') {
      const restart = getValue(event, 'body.restart');
      if (restart !== undefined) {
        this.restartData = deepCloneJson(restart);
      }
    }

    this.pendingEvents.splice(index, 1);
    this.handledEvents.push(event);
    return event;
  }

  private responseIndex(requestSeq: number): number {
    return this.pendingResponses.findIndex((response) => {
      const raw = response.request_seq;
      if (!isSeq(raw)) {
        throw new SessionError(
          'InvalidSeqFromAdapter',
          'Response request_seq is not an integer',
          { message: response },
        );
      }
      return raw === requestSeq;
    });
  }

  private eventIndexByName(name: string): number {
    return this.pendingEvents.findIndex(
      (event) => getString(event, 'event') === name,
    );
  }

  private validateResponse(
    response: JsonObject,
    seq: number,
    command: string,
  ): void {
    if (response.success !== true) {
      const message =
        getString(response, 'message') ?? `Request ${seq} (${command}) failed.`;
      this.logger.warn({ response }, `Request ${seq} (${command}) failed.`);
      throw new DAPRequestError(
        message,
        seq,
        command,
        response,
        getObject(response, 'body'),
      );
    }
    if (response.request_seq !== seq) {
      throw new SessionError(
        'RequestResponseMismatchedSeq',
        `Response request_seq ${String(response.request_seq)} does not match ${seq}`,
        { seq, command, message: response },
      );
    }
    if (response.command !== command) {
      throw new SessionError(
        'WrongCommandForResponse',
        `Expected a '${command}' response, got '${String(response.command)}'`,
        { seq, command, message: response },
      );
    }
  }

  // --- outgoing ---

  private assertCanSend(command: RequestCommand): void {
    if (this.currentState === 'terminated') {
      throw new SessionError(
        'SessionTerminated',
        `Cannot send '${command}': adapter has terminated`,
        { command },
      );
    }
    const gate = CAPABILITY_GATES[command];
    if (gate && !this.adapterCapabilitySet.support.contains(gate.capability)) {
      this.logger.warn(`Adapter does not support '${command}' (${gate.capability}).`);
      throw new SessionError(
        gate.code,
        `Adapter does not declare ${gate.capability}`,
        { command },
      );
    }
  }

  private newSeq(): number {
    if (this.nextSeq > MAX_SEQ) {
      throw new ContractViolationError('Sequence numbers exhausted');
    }
    return this.nextSeq++;
  }

  /**
   * Gates, encodes and writes one request. `onEncoded` runs once the request
   * is known to be well-formed, before it is written.
   */
  private async sendRequest<A>(
    command: RequestCommand,
    schema: Schema<A>,
    args: A,
    extra: JsonObject,
    onEncoded?: () => void,
  ): Promise<number> {
    this.assertCanSend(command);

    const encodedArgs = toValue(schema, args);
    const seq = this.newSeq();
    const object = toObject(requestSchema, {
      seq,
      type: 'request',
      command,
      arguments: encodedArgs,
    });
    if (object.arguments === null) delete object.arguments;
    if (Object.keys(extra).length > 0) {
      if (object.arguments === undefined) object.arguments = {};
      mergeObject(object, extra, 'arguments');
    }
    onEncoded?.();

    await this.adapter.writeAll(this.transport.createMessage(object));
    this.requestsSent++;
    this.logger.debug({ seq, command }, 'Sent request');
    return seq;
  }
}

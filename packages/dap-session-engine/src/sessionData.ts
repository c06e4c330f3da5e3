import { LoggerInterface, childLogger, createLogger } from './logging';
import { deepClone, fromValue } from './marshal/marshaller';
import { Tag, Tagged, list } from './marshal/schema';
import { getValue } from './protocol/json';
import {
  Module,
  Output,
  StoppedBody,
  Thread,
  continuedBodySchema,
  exitedBodySchema,
  moduleIdEquals,
  moduleIdToString,
  moduleSchema,
  outputSchema,
  stoppedBodySchema,
  threadSchema,
} from './protocol/schemas';
import type { Session } from './session';
import { StringStorage } from './stringStorage';

export type DebuggeeStatus =
  | Tag<'not_running'>
  | Tag<'running'>
  | Tag<'stopped'>
  | Tagged<'exited', number>;

/**
 * Run state of one thread. A thread stopped by an `allThreadsStopped` event
 * aimed at another thread carries no body.
 */
export type ThreadState =
  | Tag<'unknown'>
  | Tag<'continued'>
  | { tag: 'stopped'; body?: StoppedBody };

export interface ThreadView extends Thread {
  state: ThreadState;
}

const threadListSchema = list(threadSchema);
const moduleListSchema = list(moduleSchema);

/**
 * Read cache projected from a session's messages. Every string it stores is
 * interned, so repeated names and paths are held once.
 *
 * Handlers consume the message they read through the session, the same way
 * a typed `handle*Response` does.
 */
export class SessionData {
  private readonly logger: LoggerInterface;
  private readonly strings = new StringStorage();
  private readonly moduleList: Module[] = [];
  private threadMap = new Map<number, ThreadView>();
  private readonly outputLog: Output[] = [];
  private debuggeeStatus: DebuggeeStatus = { tag: 'not_running' };

  constructor(logger: LoggerInterface = createLogger()) {
    this.logger = childLogger(logger, { component: 'SessionData' });
  }

  public get modules(): readonly Module[] {
    return this.moduleList;
  }

  /** Threads in the order they were first seen. */
  public get threads(): readonly ThreadView[] {
    return [...this.threadMap.values()];
  }

  public get output(): readonly Output[] {
    return this.outputLog;
  }

  public get status(): DebuggeeStatus {
    return this.debuggeeStatus;
  }

  public get internedStringCount(): number {
    return this.strings.size;
  }

  /** Consumes the oldest pending `module` event. */
  public handleEventModules(session: Session): void {
    session.handleNamedEvent('module', (event) => {
      const loaded = fromValue(
        moduleSchema,
        getValue(event, 'body.module'),
        '$.body.module',
      );
      this.addModule(loaded);
    });
  }

  public handleResponseThreads(session: Session, seq: number): void {
    session.handleResponse(seq, 'threads', (response) => {
      const threads = fromValue(
        threadListSchema,
        getValue(response, 'body.threads'),
        '$.body.threads',
      );
      this.setThreads(threads);
    });
  }

  public handleResponseModules(session: Session, seq: number): void {
    session.handleResponse(seq, 'modules', (response) => {
      const modules = fromValue(
        moduleListSchema,
        getValue(response, 'body.modules'),
        '$.body.modules',
      );
      for (const entry of modules) this.addModule(entry);
    });
  }

  public handleEventOutput(session: Session): void {
    session.handleNamedEvent('output', (event) => {
      const output = fromValue(outputSchema, getValue(event, 'body'), '$.body');
      this.outputLog.push(deepClone(outputSchema, output, this.strings));
    });
  }

  public handleEventExited(session: Session): void {
    session.handleNamedEvent('exited', (event) => {
      const { exitCode } = fromValue(
        exitedBodySchema,
        getValue(event, 'body'),
        '$.body',
      );
      this.debuggeeStatus = { tag: 'exited', value: exitCode };
    });
  }

  /**
   * Stops the event's thread, keeping the event body, and every other known
   * thread when `allThreadsStopped` is set.
   */
  public handleEventStopped(session: Session): void {
    session.handleNamedEvent('stopped', (event) => {
      const parsed = fromValue(stoppedBodySchema, getValue(event, 'body'), '$.body');
      const body = deepClone(stoppedBodySchema, parsed, this.strings);

      if (body.threadId !== undefined) {
        this.setThreadState(body.threadId, { tag: 'stopped', body });
      }
      if (body.allThreadsStopped) {
        for (const thread of this.threadMap.values()) {
          if (thread.state.tag !== 'stopped') thread.state = { tag: 'stopped' };
        }
      }
      this.debuggeeStatus = { tag: 'stopped' };
    });
  }

  /** `allThreadsContinued` defaults to true. */
  public handleEventContinued(session: Session): void {
    session.handleNamedEvent('continued', (event) => {
      const body = fromValue(
        continuedBodySchema,
        getValue(event, 'body'),
        '$.body',
      );

      this.setThreadState(body.threadId, { tag: 'continued' });
      if (body.allThreadsContinued ?? true) {
        for (const thread of this.threadMap.values()) {
          thread.state = { tag: 'continued' };
        }
      }
      this.debuggeeStatus = { tag: 'running' };
    });
  }

  /** An exit status outlives the termination that follows it. */
  public handleEventTerminated(session: Session): void {
    session.handleNamedEvent('terminated', () => {
      if (this.debuggeeStatus.tag !== 'exited') {
        this.debuggeeStatus = { tag: 'not_running' };
      }
    });
  }

  /**
   * Stores a copy of `module` unless one with the same id is already held.
   * A known module is never refreshed.
   * @returns whether the module was stored.
   */
  public addModule(candidate: Module): boolean {
    const known = this.moduleList.some((stored) =>
      moduleIdEquals(stored.id, candidate.id),
    );
    if (known) {
      this.logger.trace(`Module ${moduleIdToString(candidate.id)} already known`);
      return false;
    }
    this.moduleList.push(deepClone(moduleSchema, candidate, this.strings));
    return true;
  }

  /**
   * Replaces the thread snapshot wholesale. A thread that is still listed
   * keeps its run state.
   */
  public setThreads(threads: readonly Thread[]): void {
    const next = new Map<number, ThreadView>();
    for (const thread of threads) {
      const cloned = deepClone(threadSchema, thread, this.strings);
      const state: ThreadState = this.threadMap.get(cloned.id)?.state ?? {
        tag: 'unknown',
      };
      next.set(cloned.id, { ...cloned, state });
    }
    this.threadMap = next;
  }

  private setThreadState(id: number, state: ThreadState): void {
    const known = this.threadMap.get(id);
    if (known) {
      known.state = state;
      return;
    }
    this.logger.debug(`Thread ${id} first seen in a run-state event`);
    this.threadMap.set(id, { id, name: this.strings.getAndPut(''), state });
  }
}

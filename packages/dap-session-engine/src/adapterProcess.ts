import * as child_process from 'child_process';
import type { Readable } from 'stream';
import { ContractViolationError } from './errors';
import { LoggerInterface, childLogger } from './logging';

/**
 * Configuration for a debug adapter.
 */
export interface AdapterConfig {
  /**
   * Unique type identifier for the adapter (e.g., 'node', 'python').
   */
  type: string;
  /**
   * The command to execute to start the debug adapter.
   */
  command: string;
  args?: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export type AdapterProcessStage = 'spawn' | 'early_exit' | 'stream_setup';

/** What went wrong while bringing an adapter process up. */
export interface AdapterProcessFailure {
  stage: AdapterProcessStage;
  adapterConfig: AdapterConfig;
  underlyingError?: Error;
  stderrOutput?: string;
  exitCode?: number;
  signal?: NodeJS.Signals;
}

export class AdapterProcessError extends Error {
  public readonly stage: AdapterProcessStage;
  public readonly adapterType: string;
  public readonly adapterConfig: AdapterConfig;
  public readonly underlyingError?: Error;
  public readonly stderrOutput?: string;
  public readonly exitCode?: number;
  public readonly signal?: NodeJS.Signals;

  constructor(message: string, failure: AdapterProcessFailure) {
    super(message, { cause: failure.underlyingError });
    this.name = 'AdapterProcessError';
    this.stage = failure.stage;
    this.adapterType = failure.adapterConfig.type;
    this.adapterConfig = failure.adapterConfig;
    this.underlyingError = failure.underlyingError;
    this.stderrOutput = failure.stderrOutput;
    this.exitCode = failure.exitCode;
    this.signal = failure.signal;
    Object.setPrototypeOf(this, AdapterProcessError.prototype);
  }
}

export class AdapterProcessErrorBuilder {
  private readonly failure: Partial<AdapterProcessFailure> = {};

  constructor(private readonly message: string) {}

  public stage(stage: AdapterProcessStage): this {
    this.failure.stage = stage;
    return this;
  }

  /** Also fixes the adapter type reported by the error. */
  public adapterConfig(adapterConfig: AdapterConfig): this {
    this.failure.adapterConfig = adapterConfig;
    return this;
  }

  public underlyingError(error: Error): this {
    this.failure.underlyingError = error;
    return this;
  }

  public stderrOutput(stderr: string): this {
    this.failure.stderrOutput = stderr;
    return this;
  }

  public exitCode(exitCode: number): this {
    this.failure.exitCode = exitCode;
    return this;
  }

  public signal(signal: NodeJS.Signals): this {
    this.failure.signal = signal;
    return this;
  }

  public build(): AdapterProcessError {
    const { stage, adapterConfig } = this.failure;
    if (!stage) {
      throw new Error("AdapterProcessErrorBuilder: 'stage' is required.");
    }
    if (!adapterConfig) {
      throw new Error(
        "AdapterProcessErrorBuilder: 'adapterConfig' is required.",
      );
    }
    return new AdapterProcessError(this.message, {
      ...this.failure,
      stage,
      adapterConfig,
    });
  }
}

export interface AdapterExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Supervises the adapter subprocess: the session writes requests to its input
 * and the transport reads its output.
 */
export interface AdapterProcess {
  /** The adapter's output stream. Only available after {@link spawn}. */
  readonly stdout: Readable;
  spawn(): Promise<void>;
  /** Resolves once the process has exited. */
  wait(): Promise<AdapterExit>;
  writeAll(bytes: Buffer): Promise<void>;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: child_process.SpawnOptions,
) => child_process.ChildProcess;

/**
 * {@link AdapterProcess} backed by `child_process.spawn` over stdio pipes.
 */
export class ChildAdapterProcess implements AdapterProcess {
  private readonly logger: LoggerInterface;
  private child: child_process.ChildProcess | undefined;
  private exit: Promise<AdapterExit> | undefined;
  private stderrOutput = '';

  constructor(
    private readonly config: AdapterConfig,
    logger: LoggerInterface,
    private readonly spawnProcess: SpawnFunction = child_process.spawn,
  ) {
    this.logger = childLogger(logger, {
      component: 'ChildAdapterProcess',
      adapterType: config.type,
    });
  }

  public get stdout(): Readable {
    const stdout = this.child?.stdout;
    if (!stdout) {
      throw new ContractViolationError('Adapter process has not been spawned');
    }
    return stdout;
  }

  /** Everything the adapter wrote to stderr so far. */
  public get stderr(): string {
    return this.stderrOutput;
  }

  public spawn(): Promise<void> {
    if (this.child) {
      return Promise.reject(
        new ContractViolationError('Adapter process already spawned'),
      );
    }
    const config = this.config;
    const errMsgPrefix = `Failed to spawn debug adapter process for '${config.type}'. Command: ${config.command}`;

    return new Promise((resolve, reject) => {
      let settled = false;

      const onSpawnError = (spawnError: Error): void => {
        if (settled) return;
        settled = true;
        this.logger.error(
          { originalError: spawnError.message, stderr: this.stderrOutput },
          `${errMsgPrefix}: Process emitted 'error' event.`,
        );
        reject(
          new AdapterProcessErrorBuilder(`${errMsgPrefix}: ${spawnError.message}`)
            .stage('spawn')
            .adapterConfig(config)
            .underlyingError(spawnError)
            .stderrOutput(this.stderrOutput)
            .build(),
        );
      };

      const onPrematureExit = (
        code: number | null,
        signal: NodeJS.Signals | null,
      ): void => {
        if (settled) return;
        settled = true;
        this.logger.error(
          { stderr: this.stderrOutput },
          `${errMsgPrefix}: Process exited prematurely. Code: ${code}, Signal: ${signal}.`,
        );
        const builder = new AdapterProcessErrorBuilder(
          `${errMsgPrefix}: Process exited prematurely. Code: ${code}, Signal: ${signal}`,
        )
          .stage('early_exit')
          .adapterConfig(config)
          .stderrOutput(this.stderrOutput);
        if (code !== null) builder.exitCode(code);
        if (signal) builder.signal(signal);
        reject(builder.build());
      };

      let child: child_process.ChildProcess;
      try {
        const spawnOptions: child_process.SpawnOptions = {
          stdio: ['pipe', 'pipe', 'pipe'],
          env: { ...process.env, ...config.env },
          detached: false,
        };
        if (config.cwd) spawnOptions.cwd = config.cwd;
        child = this.spawnProcess(config.command, config.args ?? [], spawnOptions);
      } catch (syncSpawnError: unknown) {
        const err =
          syncSpawnError instanceof Error
            ? syncSpawnError
            : new Error(String(syncSpawnError));
        onSpawnError(err);
        return;
      }

      this.child = child;
      this.exit = new Promise((resolveExit) => {
        child.once('exit', (code, signal) => resolveExit({ code, signal }));
      });
      child.stderr?.on('data', (data: Buffer) => {
        this.stderrOutput += data.toString();
      });
      // A write to a closed pipe also fails through the write callback.
      child.stdin?.on('error', (error: Error) => {
        this.logger.error(
          { err: error },
          `Adapter '${config.type}' stdin stream error: ${error.message}`,
        );
      });

      child.once('error', onSpawnError);
      child.once('exit', onPrematureExit);
      child.once('spawn', () => {
        if (settled) return;
        if (!child.stdin || !child.stdout) {
          settled = true;
          reject(
            new AdapterProcessErrorBuilder(
              `${errMsgPrefix}: stdio pipes are not available`,
            )
              .stage('stream_setup')
              .adapterConfig(config)
              .build(),
          );
          return;
        }
        settled = true;
        child.removeListener('error', onSpawnError);
        child.removeListener('exit', onPrematureExit);
        child.on('error', (error: Error) => {
          this.logger.error({ err: error }, 'Adapter process error.');
        });
        this.logger.info(
          `Adapter process for '${config.type}' spawned successfully with PID: ${child.pid}.`,
        );
        resolve();
      });
    });
  }

  public wait(): Promise<AdapterExit> {
    if (!this.exit) {
      return Promise.reject(
        new ContractViolationError('Adapter process has not been spawned'),
      );
    }
    return this.exit;
  }

  public writeAll(bytes: Buffer): Promise<void> {
    const stdin = this.child?.stdin;
    if (!stdin) {
      return Promise.reject(
        new ContractViolationError('Adapter process has not been spawned'),
      );
    }
    return new Promise((resolve, reject) => {
      stdin.write(bytes, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * @squadline/runtime - Host
 *
 * Process-level lifecycle for the runtime: background services (cache sweep),
 * chat transports, and ordered startup/shutdown tasks.
 */

import { describeError } from '../../domain/exceptions';
import type { IChatTransport } from '../ports';

/**
 * Host configuration options
 */
export interface HostOptions {
  /** Application name */
  name?: string;

  /** Stop on SIGTERM/SIGINT */
  gracefulShutdown?: boolean;

  /** Shutdown timeout in milliseconds */
  shutdownTimeout?: number;

  /** Custom logger */
  logger?: ILogger;
}

/**
 * Logger port used by every runtime component
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Host status
 */
export type HostStatus = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';

/**
 * Task run while the host starts or stops
 */
export type LifecycleTask = () => Promise<void> | void;

/**
 * Background service interface
 * Services that run in the background alongside the application
 */
export interface IBackgroundService {
  /** Service name */
  readonly name: string;

  /** Start the service */
  start(): Promise<void>;

  /** Stop the service */
  stop(): Promise<void>;

  /** Check if service is running */
  isRunning(): boolean;
}

/**
 * Abstract base class for background services
 */
export abstract class BackgroundServiceBase implements IBackgroundService {
  abstract readonly name: string;
  protected running = false;
  protected abortController: AbortController | null = null;
  protected loop: Promise<void> | null = null;

  constructor(protected readonly logger: ILogger = consoleLogger) {}

  async start(): Promise<void> {
    if (this.running) return;

    this.running = true;
    this.abortController = new AbortController();

    this.loop = this.executeAsync(this.abortController.signal).catch((error: unknown) => {
      this.logger.error(`[${this.name}] Service error:`, error);
      this.running = false;
    });
  }

  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    this.abortController?.abort();
    this.abortController = null;
    await this.loop;
    this.loop = null;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Implement this method to run the background task
   */
  protected abstract executeAsync(signal: AbortSignal): Promise<void>;

  /**
   * Resolves after `ms`, or early with `false` once `signal` aborts
   */
  protected delay(ms: number, signal: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve(false);
        return;
      }

      const onAbort = () => {
        clearTimeout(timeout);
        resolve(false);
      };
      const timeout = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve(true);
      }, ms);

      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Interval-based background service.
 * Sleeps `intervalMs`, runs `execute()`, and repeats until stopped.
 */
export abstract class IntervalService extends BackgroundServiceBase {
  constructor(
    protected readonly intervalMs: number,
    logger?: ILogger,
  ) {
    super(logger);
  }

  protected async executeAsync(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const elapsed = await this.delay(this.intervalMs, signal);
      if (!elapsed) break;
      await this.execute();
    }
  }

  /**
   * Implement this method for the periodic task
   */
  protected abstract execute(): Promise<void>;
}

/**
 * Console logger filtered by level
 */
export function createConsoleLogger(level: LogLevel = 'info'): ILogger {
  const threshold = LOG_LEVEL_ORDER[level];
  const enabled = (candidate: LogLevel) => LOG_LEVEL_ORDER[candidate] >= threshold;

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(`[DEBUG] ${message}`, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.info(`[INFO] ${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(`[ERROR] ${message}`, ...args);
    },
  };
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = createConsoleLogger('debug');

/**
 * Logger that drops everything (tests)
 */
export const silentLogger: ILogger = createConsoleLogger('silent');

/**
 * RuntimeHost - owns the process lifecycle of the runtime
 *
 * @example
 * ```typescript
 * const host = new RuntimeHost({ name: 'squadline' });
 * host.addStartupTask('load-mappings', () => teamMapping.loadMappingsFromStore());
 * host.addBackgroundService(new CacheSweepService(cache));
 * host.addTransport(telegramTransport);
 * await host.start();
 * ```
 */
export class RuntimeHost {
  readonly name: string;
  private _status: HostStatus = 'stopped';
  private transports: IChatTransport[] = [];
  private backgroundServices: IBackgroundService[] = [];
  private startupTasks: Array<{ name: string; task: LifecycleTask }> = [];
  private shutdownTasks: Array<{ name: string; task: LifecycleTask }> = [];
  private signalHandlersInstalled = false;
  private logger: ILogger;

  constructor(private readonly options: HostOptions = {}) {
    this.name = options.name ?? 'squadline-runtime';
    this.logger = options.logger ?? consoleLogger;
  }

  get status(): HostStatus {
    return this._status;
  }

  addTransport(transport: IChatTransport): this {
    this.transports.push(transport);
    return this;
  }

  getTransports(): IChatTransport[] {
    return [...this.transports];
  }

  addBackgroundService(service: IBackgroundService): this {
    this.backgroundServices.push(service);
    return this;
  }

  getBackgroundServices(): IBackgroundService[] {
    return [...this.backgroundServices];
  }

  /**
   * Run before background services and transports start, in insertion order
   */
  addStartupTask(name: string, task: LifecycleTask): this {
    this.startupTasks.push({ name, task });
    return this;
  }

  /**
   * Run after background services and transports stop, in insertion order
   */
  addShutdownTask(name: string, task: LifecycleTask): this {
    this.shutdownTasks.push({ name, task });
    return this;
  }

  getOptions(): HostOptions {
    return { ...this.options };
  }

  async start(): Promise<void> {
    if (this._status !== 'stopped') {
      throw new Error(`Cannot start host in ${this._status} state`);
    }

    this._status = 'starting';
    this.logger.info(`Starting host: ${this.name}`);

    const startedServices: IBackgroundService[] = [];
    const startedTransports: IChatTransport[] = [];

    try {
      if (this.options.gracefulShutdown === true) {
        this.setupGracefulShutdown();
      }

      for (const { name, task } of this.startupTasks) {
        this.logger.debug(`Running startup task: ${name}`);
        await task();
      }

      await Promise.all(
        this.backgroundServices.map(async (service) => {
          this.logger.info(`Starting service: ${service.name}`);
          await service.start();
          startedServices.push(service);
        }),
      );

      await Promise.all(
        this.transports.map(async (transport) => {
          this.logger.info(`Starting transport: ${transport.name}`);
          await transport.start();
          startedTransports.push(transport);
        }),
      );

      this._status = 'running';
      this.logger.info(`Host ${this.name} started successfully`);
    } catch (error) {
      this._status = 'error';
      this.logger.error(`Host ${this.name} failed to start`, error);
      await this.rollbackStart(startedTransports, startedServices);
      throw error;
    }
  }

  /**
   * Stop whatever a failed start already brought up, transports first
   */
  private async rollbackStart(transports: IChatTransport[], services: IBackgroundService[]): Promise<void> {
    const stops = [
      ...transports.map((transport) => ({ name: transport.name, stop: () => transport.stop() })),
      ...services.map((service) => ({ name: service.name, stop: () => service.stop() })),
    ];

    for (const { name, stop } of stops) {
      try {
        await stop();
      } catch (error) {
        this.logger.error(`Failed to stop ${name} after a failed start: ${describeError(error)}`);
      }
    }
  }

  /**
   * Stops a running host. From the error state it retries the full
   * teardown so shutdown tasks still run after a failed start.
   */
  async stop(): Promise<void> {
    if (this._status !== 'running' && this._status !== 'error') {
      return;
    }

    this._status = 'stopping';
    this.logger.info(`Stopping host: ${this.name}`);

    const timeout = this.options.shutdownTimeout ?? 30000;
    let timer: NodeJS.Timeout | undefined;

    try {
      await Promise.race([
        this.performShutdown(),
        new Promise<void>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Shutdown timeout')), timeout);
        }),
      ]);

      this._status = 'stopped';
      this.logger.info(`Host ${this.name} stopped successfully`);
    } catch (error) {
      this.logger.error(`Error during shutdown: ${describeError(error)}`);
      this._status = 'error';
    } finally {
      clearTimeout(timer);
    }
  }

  private async performShutdown(): Promise<void> {
    // Transports first so no new messages arrive mid-teardown
    await Promise.all(
      this.transports.map(async (transport) => {
        this.logger.info(`Stopping transport: ${transport.name}`);
        await transport.stop();
      }),
    );

    await Promise.all(
      this.backgroundServices.map(async (service) => {
        this.logger.info(`Stopping service: ${service.name}`);
        await service.stop();
      }),
    );

    for (const { name, task } of this.shutdownTasks) {
      this.logger.debug(`Running shutdown task: ${name}`);
      await task();
    }
  }

  private setupGracefulShutdown(): void {
    if (this.signalHandlersInstalled) return;
    this.signalHandlersInstalled = true;

    const shutdown = (signal: string) => {
      this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
      this.stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          this.logger.error('Graceful shutdown failed', error);
          process.exit(1);
        });
    };

    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
  }
}

/**
 * Create a new host
 */
export function createHost(options?: HostOptions): RuntimeHost {
  return new RuntimeHost(options);
}

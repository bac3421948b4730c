/**
 * @squadline/runtime - Hosting Module
 *
 * Process lifecycle, background services, logging and the composition root
 */

export type {
  HostOptions,
  HostStatus,
  IBackgroundService,
  ILogger,
  LifecycleTask,
  LogLevel,
} from './host';

export {
  RuntimeHost,
  createHost,
  BackgroundServiceBase,
  IntervalService,
  createConsoleLogger,
  consoleLogger,
  silentLogger,
} from './host';

export { createRuntime, SettingsToken, LoggerToken, DocumentStoreToken } from './runtime';
export type { Runtime, RuntimeOptions } from './runtime';

/**
 * @fileoverview Unit tests for RuntimeHost, the console logger and createRuntime
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import {
  CacheSweepService,
  ConfigurationError,
  DocumentStoreToken,
  InMemoryDocumentStore,
  InjectionToken,
  IntervalService,
  RuntimeHost,
  SettingsToken,
  TEAM_MAPPINGS_COLLECTION,
  TTLCache,
  TeamMappingService,
  createConsoleLogger,
  createRuntime,
  loadSettings,
  type IBackgroundService,
  type Runtime,
} from '../../../src';
import { waitFor } from '../../helpers/async';
import { command } from '../../helpers/capabilities';
import { createMockLogger, type MockLogger } from '../../helpers/logger';
import { FakeTransport } from '../../helpers/transport';

function recordingService(name: string, events: string[]): IBackgroundService {
  let running = false;
  return {
    name,
    start: async () => {
      running = true;
      events.push(`start service ${name}`);
    },
    stop: async () => {
      running = false;
      events.push(`stop service ${name}`);
    },
    isRunning: () => running,
  };
}

class TransportWithLog extends FakeTransport {
  constructor(private readonly events: string[]) {
    super('log-transport');
  }

  async start(): Promise<void> {
    await super.start();
    this.events.push('start transport');
  }

  async stop(): Promise<void> {
    await super.stop();
    this.events.push('stop transport');
  }
}

class FailingTransport extends FakeTransport {
  constructor() {
    super('failing');
  }

  async start(): Promise<void> {
    throw new Error('connection refused');
  }
}

class CountingService extends IntervalService {
  readonly name = 'counting';
  ticks = 0;

  protected async execute(): Promise<void> {
    this.ticks++;
  }
}

describe('RuntimeHost', () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('should start tasks, services and transports in order and stop them in reverse', async () => {
    const events: string[] = [];
    const host = new RuntimeHost({ name: 'test-host', logger })
      .addStartupTask('first', () => {
        events.push('startup first');
      })
      .addStartupTask('second', async () => {
        events.push('startup second');
      })
      .addBackgroundService(recordingService('sweep', events))
      .addTransport(new TransportWithLog(events))
      .addShutdownTask('flush', () => {
        events.push('shutdown flush');
      });

    await host.start();
    expect(host.status).toBe('running');

    await host.stop();
    expect(host.status).toBe('stopped');

    expect(events).toEqual([
      'startup first',
      'startup second',
      'start service sweep',
      'start transport',
      'stop transport',
      'stop service sweep',
      'shutdown flush',
    ]);
    expect(logger.info).toHaveBeenCalledWith('Host test-host started successfully');
  });

  it('should refuse to start twice', async () => {
    const host = new RuntimeHost({ logger });
    await host.start();

    await expect(host.start()).rejects.toThrow('Cannot start host in running state');
    await host.stop();
  });

  it('should enter the error state when a startup task fails', async () => {
    const failure = new Error('no store');
    const host = new RuntimeHost({ name: 'test-host', logger }).addStartupTask('load', () => {
      throw failure;
    });

    await expect(host.start()).rejects.toThrow('no store');
    expect(host.status).toBe('error');
    expect(logger.error).toHaveBeenCalledWith('Host test-host failed to start', failure);
  });

  it('should stop started services when a transport fails to start', async () => {
    const sweep = new CacheSweepService(new TTLCache<string>(), 50, logger);
    const host = new RuntimeHost({ name: 'test-host', logger })
      .addBackgroundService(sweep)
      .addTransport(new FailingTransport());

    await expect(host.start()).rejects.toThrow('connection refused');

    expect(host.status).toBe('error');
    expect(sweep.isRunning()).toBe(false);

    await host.stop();

    expect({ status: host.status, sweepRunning: sweep.isRunning() }).toEqual({
      status: 'stopped',
      sweepRunning: false,
    });
  });

  it('should run shutdown tasks when stopped after a failed start', async () => {
    const events: string[] = [];
    const host = new RuntimeHost({ logger })
      .addStartupTask('load', () => {
        throw new Error('no store');
      })
      .addShutdownTask('flush', () => {
        events.push('shutdown flush');
      });

    await expect(host.start()).rejects.toThrow('no store');
    await host.stop();

    expect(host.status).toBe('stopped');
    expect(events).toEqual(['shutdown flush']);
  });

  it('should give up on a shutdown that exceeds the timeout', async () => {
    const host = new RuntimeHost({ logger, shutdownTimeout: 10 }).addShutdownTask(
      'hang',
      () => new Promise<void>(() => undefined),
    );
    await host.start();

    await host.stop();

    expect(host.status).toBe('error');
    expect(logger.error).toHaveBeenCalledWith('Error during shutdown: Shutdown timeout');
  });

  it('should ignore stop when not running', async () => {
    const host = new RuntimeHost({ logger });

    await host.stop();

    expect(host.status).toBe('stopped');
  });

  it('should run an interval service until it is stopped', async () => {
    const service = new CountingService(5, logger);
    const host = new RuntimeHost({ logger }).addBackgroundService(service);

    await host.start();
    await waitFor(() => service.ticks >= 2, 2_000, 5);
    await host.stop();

    expect(service.isRunning()).toBe(false);
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should drop messages below the level and prefix the rest', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const log = createConsoleLogger('warn');
    log.debug('hidden');
    log.warn('cache %s', 'slow');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] cache %s', 'slow');
  });

  it('should print nothing when silent', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    createConsoleLogger('silent').error('boom');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('createRuntime', () => {
  let logger: MockLogger;
  let runtime: Runtime | undefined;

  beforeEach(() => {
    logger = createMockLogger();
  });

  afterEach(async () => {
    await runtime?.stop();
    runtime = undefined;
  });

  it('should register the core services in the container', () => {
    const store = new InMemoryDocumentStore();
    const settings = loadSettings({ TEAM_ID: 'TEAMA' });
    const created = createRuntime(settings, { logger, store });
    runtime = created;

    expect(created.container.resolve(SettingsToken)).toBe(settings);
    expect(created.container.resolve(DocumentStoreToken)).toBe(store);
    expect(created.container.resolve(TeamMappingService)).toBe(created.teamMapping);
    expect(created.sweep.name).toBe('cache-sweep');
  });

  it('should load persisted mappings and start transports on start', async () => {
    const store = new InMemoryDocumentStore();
    await store.createDocument(TEAM_MAPPINGS_COLLECTION, { conversationId: 'chat-5', teamId: 'TEAMB' }, 'chat-5');
    const transport = new FakeTransport();
    const created = createRuntime(loadSettings({}), { logger, store, transports: [transport] });
    runtime = created;

    await created.start();

    expect(created.host.status).toBe('running');
    expect(created.sweep.isRunning()).toBe(true);
    expect(transport.started).toBe(true);
    expect(created.teamMapping.resolve('chat-5')).toEqual({ teamId: 'TEAMB', source: 'memory', exact: true });
  });

  it('should skip loading mappings when asked', async () => {
    const store = new InMemoryDocumentStore();
    await store.createDocument(TEAM_MAPPINGS_COLLECTION, { conversationId: 'chat-5', teamId: 'TEAMB' }, 'chat-5');
    const created = createRuntime(loadSettings({}), { logger, store, loadMappings: false });
    runtime = created;

    await created.start();

    expect(created.teamMapping.resolve('chat-5')).toBeUndefined();
  });

  it('should refuse to start with an invalid container', async () => {
    const RosterToken = new InjectionToken<string[]>('IRoster');
    class PlayerService {
      constructor(readonly roster: string[]) {}
    }
    const created = createRuntime(loadSettings({}), {
      logger,
      configureServices: (container) => {
        container.addSingleton(PlayerService, PlayerService, [RosterToken]);
      },
    });
    runtime = created;

    await expect(created.start()).rejects.toThrow(
      "Container configuration is invalid (1 error(s)):\n- Service 'PlayerService' depends on unregistered 'IRoster'",
    );
    expect(created.host.status).toBe('error');
    expect(logger.error).toHaveBeenCalledWith(
      'Host squadline-runtime failed to start',
      expect.any(ConfigurationError),
    );
  });

  it('should log registry health issues found at startup', async () => {
    const created = createRuntime(loadSettings({}), { logger });
    runtime = created;
    created.registries.commands.register('/list', command('/list'), { dependencies: ['roster'] });

    await created.start();

    expect(logger.warn).toHaveBeenCalledWith("Registry issue: command '/list' depends on missing item 'roster'");
  });

  it('should clear caches and registries on stop', async () => {
    const transport = new FakeTransport();
    const created = createRuntime(loadSettings({}), { logger, transports: [transport] });
    runtime = created;
    created.registries.commands.register('/list', command('/list'));
    await created.start();
    await created.tenantCache.setPlayerList('TEAMA', []);

    await created.stop();

    expect(created.host.status).toBe('stopped');
    expect(transport.started).toBe(false);
    expect(created.sweep.isRunning()).toBe(false);
    expect(created.cache.size).toBe(0);
    expect(created.registries.commands.names()).toEqual([]);
  });
});

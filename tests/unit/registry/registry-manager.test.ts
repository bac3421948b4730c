/**
 * @fileoverview Unit tests for RegistryManager
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { ExtensionPointCatalog, RegistryManager, type Capability } from '../../../src';
import { createMockLogger, type MockLogger } from '../../helpers/logger';
import { command, service, tool } from '../../helpers/capabilities';

describe('RegistryManager', () => {
  let logger: MockLogger;
  let manager: RegistryManager;

  beforeEach(() => {
    logger = createMockLogger();
    manager = new RegistryManager({ logger });
  });

  describe('initialize', () => {
    it('should discover every group, then run hooks, once', async () => {
      const loadTools = jest.fn((): Capability[] => [tool('get_players'), tool('get_fixtures')]);
      const catalog = new ExtensionPointCatalog()
        .add('tools', 'players', loadTools)
        .add('commands', 'core', () => command('/list'))
        .add('services', 'broken', () => {
          throw new Error('missing module');
        });
      manager = new RegistryManager({ logger, catalog });
      manager.commands.addDiscoveryHook((registry) => {
        registry.register('/help', command('/help'));
      });

      const first = manager.initialize();
      const second = manager.initialize();
      const summary = await first;

      expect(await second).toBe(summary);
      expect(loadTools).toHaveBeenCalledTimes(1);
      expect(manager.isInitialized).toBe(true);
      expect(summary.succeeded).toBe(3);
      expect(summary.failed).toBe(1);
      expect(summary.byRegistry.commands?.succeeded).toBe(2);
      expect(summary.byRegistry.services?.errors[0]?.message).toBe(
        "Failed to load 'broken' from group 'services': missing module",
      );
      expect(manager.tools.names()).toEqual(['get_players', 'get_fixtures']);
      expect(manager.commands.names()).toEqual(['/list', '/help']);
      expect(logger.info).toHaveBeenCalledWith('Registries initialized: 3 discovery step(s) succeeded, 1 failed');
    });
  });

  describe('getSystemStatistics', () => {
    it('should total the items of every registry', () => {
      manager.tools.register('get_players', tool('get_players'));
      manager.commands.register('/list', command('/list'));
      manager.commands.register('/help', command('/help'));

      const statistics = manager.getSystemStatistics();

      expect(statistics.totalRegistries).toBe(3);
      expect(statistics.totalItems).toBe(3);
      expect(statistics.registries.commands?.itemCount).toBe(2);
      expect(statistics.registries.services?.itemCount).toBe(0);
    });
  });

  describe('search', () => {
    beforeEach(() => {
      manager.tools.register('get_players', tool('get_players', 'Players of the team'));
      manager.tools.register('get_fixtures', tool('get_fixtures', 'Upcoming matches'));
      manager.commands.register('/list', command('/list', 'List players'));
      manager.commands.register('/stats', command('/stats', 'Season numbers'), { tags: ['Player-Stats'] });
      manager.services.register('notifier', service('notifier', 'Sends reminders'));
    });

    it('should match names, descriptions and tags case-insensitively', () => {
      const results = manager.search('PLAYER');

      expect(results.tools.map((registered) => registered.name)).toEqual(['get_players']);
      expect(results.commands.map((registered) => registered.name)).toEqual(['/list', '/stats']);
      expect(results.services).toEqual([]);
    });

    it('should return nothing for a blank query', () => {
      expect(manager.search('   ')).toEqual({ tools: [], commands: [], services: [] });
    });
  });

  describe('validateDependencies', () => {
    it('should report missing dependencies as errors and disabled ones as warnings', () => {
      manager.tools.register('get_players', tool('get_players'), { enabled: false });
      manager.commands.register('/list', command('/list'), { dependencies: ['get_players', 'roster_db'] });

      expect(manager.validateDependencies()).toEqual({
        errors: ["command '/list' depends on missing item 'roster_db'"],
        warnings: ["command '/list' depends on disabled item 'get_players'"],
      });
    });
  });

  describe('healthCheck', () => {
    it('should be healthy with recommendations for empty registries', () => {
      expect(manager.healthCheck()).toEqual({
        status: 'healthy',
        issues: [],
        recommendations: [
          'Registry tools is empty - consider adding items',
          'Registry commands is empty - consider adding items',
          'Registry services is empty - consider adding items',
        ],
      });
    });

    it('should collect structural issues, validation warnings and dependency problems', () => {
      manager.tools.register('get_players', tool('get_players'));
      manager.tools.addAlias('players', 'get_player');
      manager.commands.register('/quiet', command('/quiet', ''), { dependencies: ['get_fixtures'] });
      manager.services.register('notifier', service('notifier'));

      expect(manager.healthCheck()).toEqual({
        status: 'unhealthy',
        issues: [
          "[tools] Alias 'players' points to unknown item 'get_player'",
          "command '/quiet' depends on missing item 'get_fixtures'",
        ],
        recommendations: ['[commands] /quiet.description: Command has no description'],
      });
    });
  });

  describe('cleanup', () => {
    it('should empty every registry and allow a fresh initialize', async () => {
      const loadCommands = jest.fn((): Capability => command('/list'));
      manager = new RegistryManager({ logger, catalog: new ExtensionPointCatalog().add('commands', 'core', loadCommands) });
      await manager.initialize();

      manager.cleanup();

      expect(manager.isInitialized).toBe(false);
      expect(manager.getSystemStatistics().totalItems).toBe(0);

      await manager.initialize();
      expect(loadCommands).toHaveBeenCalledTimes(2);
      expect(manager.commands.names()).toEqual(['/list']);
    });
  });
});

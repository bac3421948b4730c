/**
 * @fileoverview Unit tests for TeamMappingService
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import {
  InMemoryDocumentStore,
  MappingNotFoundError,
  StoreError,
  TEAM_MAPPINGS_COLLECTION,
  TeamMappingService,
  type IDocumentStore,
  type TeamMappingSettings,
} from '../../../src';
import { createMockLogger, type MockLogger } from '../../helpers/logger';

const now = new Date('2026-04-10T08:30:00Z');

function settingsWith(overrides: Partial<TeamMappingSettings> = {}): TeamMappingSettings {
  return { chatTeamMappings: {}, ...overrides };
}

function failingStore(message: string): IDocumentStore {
  const fail = async (): Promise<never> => {
    throw new Error(message);
  };
  return {
    getDocument: fail,
    queryDocuments: fail,
    createDocument: fail,
    updateDocument: fail,
    deleteDocument: fail,
  };
}

describe('TeamMappingService', () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  describe('resolve', () => {
    it('should prefer explicit chat pairs and remember the result', () => {
      const mappings = new TeamMappingService(
        settingsWith({ defaultTeamId: 'TEAMA', chatTeamMappings: { 'chat-42': 'TEAMB' } }),
        { logger, now: () => now },
      );

      expect(mappings.resolve('chat-42')).toEqual({ teamId: 'TEAMB', source: 'environment', exact: true });
      expect(logger.info).toHaveBeenCalledWith('Resolved chat chat-42 to team TEAMB from configuration');
      expect(mappings.resolve('chat-42')).toEqual({ teamId: 'TEAMB', source: 'memory', exact: true });
      expect(mappings.getMappingStats().mappings).toEqual({ 'chat-42': 'TEAMB' });
    });

    it('should map the main and leadership chats to the configured team', () => {
      const mappings = new TeamMappingService(
        settingsWith({ teamId: 'TEAMA', mainChatId: 'chat-main', leadershipChatId: 'chat-lead' }),
        { logger },
      );

      expect(mappings.resolveTeamId('chat-main')).toBe('TEAMA');
      expect(mappings.resolveTeamId('chat-lead')).toBe('TEAMA');
      expect(mappings.resolveTeamId('chat-other')).toBeUndefined();
    });

    it('should ignore the configured chats when no team id is set', () => {
      const mappings = new TeamMappingService(settingsWith({ mainChatId: 'chat-main' }), { logger });

      expect(mappings.resolve('chat-main')).toBeUndefined();
    });

    it('should let an explicit pair override the main chat', () => {
      const mappings = new TeamMappingService(
        settingsWith({ teamId: 'TEAMA', mainChatId: 'chat-main', chatTeamMappings: { 'chat-main': 'TEAMC' } }),
        { logger },
      );

      expect(mappings.resolveTeamId('chat-main')).toBe('TEAMC');
    });

    it('should prefer memory over configuration', () => {
      const mappings = new TeamMappingService(settingsWith({ chatTeamMappings: { 'chat-42': 'TEAMB' } }), {
        logger,
      });
      mappings.addChatMapping('chat-42', 'TEAMD');

      expect(mappings.resolve('chat-42')).toEqual({ teamId: 'TEAMD', source: 'memory', exact: true });
    });

    it('should fall back to the default team without remembering it', () => {
      const mappings = new TeamMappingService(settingsWith({ defaultTeamId: 'TEAMA' }), { logger });

      expect(mappings.resolve('chat-9')).toEqual({ teamId: 'TEAMA', source: 'default', exact: false });
      expect(logger.warn).toHaveBeenCalledWith('No mapping for chat chat-9; falling back to default team TEAMA');
      expect(mappings.getMappingStats().totalMappings).toBe(0);
    });

    it('should use a default team set at runtime', () => {
      const mappings = new TeamMappingService(settingsWith(), { logger });
      expect(mappings.resolve('chat-9')).toBeUndefined();

      mappings.setDefaultTeamId('TEAMZ');
      expect(mappings.resolveTeamId('chat-9')).toBe('TEAMZ');
    });
  });

  describe('requireTeamId', () => {
    it('should throw MappingNotFoundError when nothing applies', () => {
      const mappings = new TeamMappingService(settingsWith(), { logger });

      expect(() => mappings.requireTeamId('chat-9')).toThrow(MappingNotFoundError);
      expect(() => mappings.requireTeamId('chat-9')).toThrow("No team is mapped to conversation 'chat-9'");
    });
  });

  describe('addChatMapping', () => {
    it('should log when a chat moves to another team and stay quiet on repeats', () => {
      const mappings = new TeamMappingService(settingsWith(), { logger });

      mappings.addChatMapping('chat-1', 'TEAMA');
      mappings.addChatMapping('chat-1', 'TEAMA');
      expect(logger.info).not.toHaveBeenCalled();

      mappings.addChatMapping('chat-1', 'TEAMB');
      expect(logger.info).toHaveBeenCalledWith('Chat chat-1 moved from team TEAMA to TEAMB');
      expect(mappings.resolveTeamId('chat-1')).toBe('TEAMB');
    });

    it('should forget memory mappings on clear', () => {
      const mappings = new TeamMappingService(settingsWith(), { logger });
      mappings.addChatMapping('chat-1', 'TEAMA');

      mappings.clearMappings();

      expect(mappings.resolve('chat-1')).toBeUndefined();
    });
  });

  describe('persistence', () => {
    let store: InMemoryDocumentStore;
    let mappings: TeamMappingService;

    beforeEach(() => {
      store = new InMemoryDocumentStore();
      mappings = new TeamMappingService(settingsWith({ defaultTeamId: 'TEAMA' }), {
        store,
        logger,
        now: () => now,
      });
    });

    it('should create a document keyed by the conversation id', async () => {
      await mappings.saveMappingToStore('chat-7', 'TEAMB');

      expect(await store.getDocument(TEAM_MAPPINGS_COLLECTION, 'chat-7')).toEqual({
        id: 'chat-7',
        conversationId: 'chat-7',
        teamId: 'TEAMB',
        createdAt: '2026-04-10T08:30:00.000Z',
      });
      expect(mappings.resolve('chat-7')).toEqual({ teamId: 'TEAMB', source: 'memory', exact: true });
    });

    it('should update the team of an existing document', async () => {
      await mappings.saveMappingToStore('chat-7', 'TEAMB');
      await mappings.saveMappingToStore('chat-7', 'TEAMC');

      expect(store.count(TEAM_MAPPINGS_COLLECTION)).toBe(1);
      expect(await store.getDocument(TEAM_MAPPINGS_COLLECTION, 'chat-7')).toMatchObject({ teamId: 'TEAMC' });
      expect(mappings.resolveTeamId('chat-7')).toBe('TEAMC');
    });

    it('should settle concurrent saves for a new chat in call order', async () => {
      const results = await Promise.allSettled([
        mappings.saveMappingToStore('chat-7', 'TEAMB'),
        mappings.saveMappingToStore('chat-7', 'TEAMC'),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled']);
      expect(store.count(TEAM_MAPPINGS_COLLECTION)).toBe(1);
      expect(await store.getDocument(TEAM_MAPPINGS_COLLECTION, 'chat-7')).toMatchObject({ teamId: 'TEAMC' });
      expect(mappings.getMappingStats()).toMatchObject({ storeErrors: 0, mappings: { 'chat-7': 'TEAMC' } });
    });

    it('should load stored mappings and skip malformed documents', async () => {
      await store.createDocument(
        TEAM_MAPPINGS_COLLECTION,
        { conversationId: 'chat-1', teamId: 'TEAMB', createdAt: '2026-01-01T00:00:00.000Z' },
        'chat-1',
      );
      await store.createDocument(TEAM_MAPPINGS_COLLECTION, { teamId: 'TEAMC' }, 'chat-2');
      await store.createDocument(TEAM_MAPPINGS_COLLECTION, { conversationId: 'chat-3' }, 'chat-3');

      expect(await mappings.loadMappingsFromStore()).toBe(2);
      expect(mappings.getMappingStats()).toEqual({
        totalMappings: 2,
        defaultTeamId: 'TEAMA',
        storeErrors: 0,
        mappings: { 'chat-1': 'TEAMB', 'chat-2': 'TEAMC' },
      });
      expect(logger.warn).toHaveBeenCalledWith('Skipping malformed team mapping document chat-3');
      expect(logger.info).toHaveBeenCalledWith('Loaded 2 team mapping(s) from team_chat_mappings');
    });

    it('should wrap store failures in StoreError and count them', async () => {
      mappings = new TeamMappingService(settingsWith(), { store: failingStore('connection reset'), logger });

      await expect(mappings.loadMappingsFromStore()).rejects.toThrow(StoreError);
      await expect(mappings.saveMappingToStore('chat-7', 'TEAMB')).rejects.toThrow(
        "Store save on 'team_chat_mappings' failed: connection reset",
      );

      expect(mappings.getMappingStats().storeErrors).toBe(2);
      expect(mappings.resolve('chat-7')).toBeUndefined();
      expect(logger.error).toHaveBeenCalledWith("Store query on 'team_chat_mappings' failed: connection reset");
    });

    it('should fail without a store', async () => {
      mappings = new TeamMappingService(settingsWith(), { logger });

      await expect(mappings.loadMappingsFromStore()).rejects.toThrow(
        "Store query on 'team_chat_mappings' failed: No document store configured",
      );
    });

    it('should upsert through the store interface', async () => {
      const getDocument = jest.spyOn(store, 'getDocument');
      const createDocument = jest.spyOn(store, 'createDocument');

      await mappings.saveMappingToStore('chat-7', 'TEAMB');

      expect(getDocument).toHaveBeenCalledWith(TEAM_MAPPINGS_COLLECTION, 'chat-7');
      expect(createDocument).toHaveBeenCalledWith(
        TEAM_MAPPINGS_COLLECTION,
        { conversationId: 'chat-7', teamId: 'TEAMB', createdAt: '2026-04-10T08:30:00.000Z' },
        'chat-7',
      );
    });
  });
});

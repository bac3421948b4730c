/**
 * @squadline/runtime - Team Mapping Service
 *
 * Resolves a conversation id to the team (tenant) it belongs to.
 *
 * Resolution order, stopping at the first hit:
 * 1. in-memory mappings (no I/O)
 * 2. configured chats: `CHAT_TEAM_MAPPINGS`, then the main and leadership
 *    chats mapped to `TEAM_ID`; a hit is written back to memory
 * 3. the default team, flagged `exact: false`
 *
 * Persistence is explicit: `loadMappingsFromStore()` at startup and
 * `saveMappingToStore()` when a chat is linked.
 */

import { MappingNotFoundError, StoreError, describeError } from '../../domain/exceptions';
import type { TeamMapping, TeamResolution } from '../../domain/tenancy';
import { AsyncLock } from '../../infrastructure/concurrency';
import { consoleLogger, type ILogger } from '../host/host';
import type { IDocumentStore, StoredDocument } from '../ports';
import type { Settings } from '../config/settings';

export const TEAM_MAPPINGS_COLLECTION = 'team_chat_mappings';

export type TeamMappingSettings = Pick<
  Settings,
  'teamId' | 'defaultTeamId' | 'mainChatId' | 'leadershipChatId' | 'chatTeamMappings'
>;

export interface TeamMappingServiceOptions {
  store?: IDocumentStore;
  logger?: ILogger;
  now?: () => Date;
}

export interface MappingStats {
  totalMappings: number;
  defaultTeamId: string | undefined;
  storeErrors: number;
  /** conversationId → teamId */
  mappings: Record<string, string>;
}

function toMapping(document: StoredDocument): TeamMapping | undefined {
  const conversationId = typeof document.conversationId === 'string' ? document.conversationId : document.id;
  const { teamId, createdAt } = document;
  if (typeof teamId !== 'string' || teamId === '') return undefined;

  const created = typeof createdAt === 'string' || createdAt instanceof Date ? new Date(createdAt) : new Date(0);
  return {
    conversationId,
    teamId,
    createdAt: Number.isNaN(created.getTime()) ? new Date(0) : created,
  };
}

/**
 * TeamMappingService
 *
 * @example
 * ```typescript
 * const mappings = new TeamMappingService(settings, { store });
 * await mappings.loadMappingsFromStore();
 *
 * const resolution = mappings.resolve('chat-42');
 * if (resolution && !resolution.exact) logger.warn('Routing chat-42 to the default team');
 * ```
 */
export class TeamMappingService {
  private mappings: Map<string, TeamMapping> = new Map();
  private defaultTeamId: string | undefined;
  private storeErrors = 0;
  private readonly saveLock = new AsyncLock();

  private readonly environmentMappings: Map<string, string>;
  private readonly store?: IDocumentStore;
  private readonly logger: ILogger;
  private readonly now: () => Date;

  constructor(settings: TeamMappingSettings, options: TeamMappingServiceOptions = {}) {
    this.store = options.store;
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? (() => new Date());
    this.defaultTeamId = settings.defaultTeamId;
    this.environmentMappings = TeamMappingService.environmentLookup(settings);
  }

  /**
   * Configured chats, explicit pairs first
   */
  private static environmentLookup(settings: TeamMappingSettings): Map<string, string> {
    const lookup = new Map<string, string>();
    if (settings.teamId) {
      for (const chatId of [settings.mainChatId, settings.leadershipChatId]) {
        if (chatId) lookup.set(chatId, settings.teamId);
      }
    }
    for (const [conversationId, teamId] of Object.entries(settings.chatTeamMappings)) {
      lookup.set(conversationId, teamId);
    }
    return lookup;
  }

  // ==================== Resolution ====================

  resolve(conversationId: string): TeamResolution | undefined {
    const remembered = this.mappings.get(conversationId);
    if (remembered) {
      return { teamId: remembered.teamId, source: 'memory', exact: true };
    }

    const configured = this.environmentMappings.get(conversationId);
    if (configured) {
      this.remember(conversationId, configured);
      this.logger.info(`Resolved chat ${conversationId} to team ${configured} from configuration`);
      return { teamId: configured, source: 'environment', exact: true };
    }

    if (this.defaultTeamId) {
      this.logger.warn(`No mapping for chat ${conversationId}; falling back to default team ${this.defaultTeamId}`);
      return { teamId: this.defaultTeamId, source: 'default', exact: false };
    }

    return undefined;
  }

  resolveTeamId(conversationId: string): string | undefined {
    return this.resolve(conversationId)?.teamId;
  }

  /**
   * @throws MappingNotFoundError when nothing, not even a default, applies
   */
  requireTeamId(conversationId: string): string {
    const teamId = this.resolveTeamId(conversationId);
    if (teamId === undefined) {
      throw new MappingNotFoundError(conversationId);
    }
    return teamId;
  }

  // ==================== Mutators ====================

  setDefaultTeamId(teamId: string | undefined): void {
    this.defaultTeamId = teamId;
  }

  /**
   * Map a conversation in memory; repeating the same pair is a no-op
   */
  addChatMapping(conversationId: string, teamId: string): void {
    const existing = this.mappings.get(conversationId);
    if (existing?.teamId === teamId) return;
    if (existing) {
      this.logger.info(`Chat ${conversationId} moved from team ${existing.teamId} to ${teamId}`);
    }
    this.remember(conversationId, teamId);
  }

  /**
   * Forget in-memory mappings; the store is untouched
   */
  clearMappings(): void {
    this.mappings.clear();
  }

  private remember(conversationId: string, teamId: string, createdAt: Date = this.now()): void {
    this.mappings.set(conversationId, { conversationId, teamId, createdAt });
  }

  // ==================== Persistence ====================

  /**
   * Load every persisted mapping into memory
   *
   * @returns mappings loaded
   * @throws StoreError when the store fails
   */
  async loadMappingsFromStore(): Promise<number> {
    const store = this.requireStore('query');

    let documents: StoredDocument[];
    try {
      documents = await store.queryDocuments(TEAM_MAPPINGS_COLLECTION);
    } catch (error) {
      throw this.storeFailure('query', error);
    }

    let loaded = 0;
    for (const document of documents) {
      const mapping = toMapping(document);
      if (!mapping) {
        this.logger.warn(`Skipping malformed team mapping document ${document.id}`);
        continue;
      }
      this.mappings.set(mapping.conversationId, mapping);
      loaded++;
    }

    this.logger.info(`Loaded ${loaded} team mapping(s) from ${TEAM_MAPPINGS_COLLECTION}`);
    return loaded;
  }

  /**
   * Persist one mapping (upsert keyed by conversation id), then map it in
   * memory
   *
   * @throws StoreError when the store fails; memory is left unchanged
   */
  async saveMappingToStore(conversationId: string, teamId: string): Promise<void> {
    const store = this.requireStore('save');

    // Saves run one at a time so the existence check and the write agree
    await this.saveLock.runExclusive(async () => {
      const createdAt = this.now();
      const data = { conversationId, teamId, createdAt: createdAt.toISOString() };

      try {
        const existing = await store.getDocument(TEAM_MAPPINGS_COLLECTION, conversationId);
        if (existing) {
          await store.updateDocument(TEAM_MAPPINGS_COLLECTION, conversationId, { teamId });
        } else {
          await store.createDocument(TEAM_MAPPINGS_COLLECTION, data, conversationId);
        }
      } catch (error) {
        throw this.storeFailure('save', error);
      }

      this.remember(conversationId, teamId, createdAt);
      this.logger.info(`Saved mapping chat ${conversationId} -> team ${teamId}`);
    });
  }

  getMappingStats(): MappingStats {
    const mappings: Record<string, string> = {};
    for (const [conversationId, mapping] of this.mappings) {
      mappings[conversationId] = mapping.teamId;
    }
    return {
      totalMappings: this.mappings.size,
      defaultTeamId: this.defaultTeamId,
      storeErrors: this.storeErrors,
      mappings,
    };
  }

  private requireStore(operation: string): IDocumentStore {
    if (!this.store) {
      throw this.storeFailure(operation, new Error('No document store configured'));
    }
    return this.store;
  }

  private storeFailure(operation: string, cause: unknown): StoreError {
    this.storeErrors++;
    const error = new StoreError(operation, TEAM_MAPPINGS_COLLECTION, cause);
    this.logger.error(describeError(error));
    return error;
  }
}

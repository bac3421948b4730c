/**
 * @squadline/runtime - Tenancy Types
 *
 * A tenant is one team. Every piece of data and configuration is partitioned
 * by its team id.
 */

/**
 * Team configuration as stored per tenant
 */
export interface TenantConfig {
  teamId: string;
  name: string;
  /** Chat the team's members talk in */
  mainChatId?: string;
  /** Chat for team admins */
  leadershipChatId?: string;
  settings: Record<string, unknown>;
}

export type PlayerStatus = 'pending' | 'active' | 'inactive';

/**
 * Player row kept in the hot player list
 */
export interface PlayerSummary {
  playerId: string;
  name: string;
  status: PlayerStatus;
}

/**
 * Invite link issued for a team chat
 */
export interface InviteLink {
  url: string;
  conversationId: string;
  expiresAt: Date;
}

/**
 * Persisted conversation → team link
 */
export interface TeamMapping {
  conversationId: string;
  teamId: string;
  createdAt: Date;
}

/**
 * Where a team id was found
 */
export type ResolutionSource = 'memory' | 'environment' | 'default';

/**
 * Outcome of resolving a conversation to a team.
 * `exact` is false when the team came from the configured default, which
 * callers should treat as lower-confidence routing.
 */
export interface TeamResolution {
  teamId: string;
  source: ResolutionSource;
  exact: boolean;
}

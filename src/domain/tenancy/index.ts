/**
 * @squadline/runtime - Tenancy Module
 */

export type {
  TenantConfig,
  PlayerStatus,
  PlayerSummary,
  InviteLink,
  TeamMapping,
  ResolutionSource,
  TeamResolution,
} from './types';

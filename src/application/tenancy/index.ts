/**
 * @squadline/runtime - Tenancy Module
 */

export { TeamMappingService, TEAM_MAPPINGS_COLLECTION } from './TeamMappingService';
export type { MappingStats, TeamMappingServiceOptions, TeamMappingSettings } from './TeamMappingService';

/**
 * @squadline/runtime - Settings
 *
 * Runtime configuration read from the environment and validated with zod.
 */

import { z } from 'zod';
import { ConfigurationError } from '../../domain/exceptions';
import type { LogLevel } from '../host/host';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

/** Unset and blank variables both count as absent */
const optionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional(),
);

const positiveMs = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().positive().default(fallback),
  );

/**
 * `chat=team,chat=team` → `{ chat: team }`
 */
const chatTeamMappings = z
  .preprocess((value) => value ?? '', z.string())
  .transform((raw, ctx) => {
    const mappings: Record<string, string> = {};
    for (const pair of raw.split(',')) {
      if (pair.trim() === '') continue;

      const separator = pair.indexOf('=');
      const conversationId = separator > 0 ? pair.slice(0, separator).trim() : '';
      const teamId = separator > 0 ? pair.slice(separator + 1).trim() : '';
      if (conversationId === '' || teamId === '') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected 'chat=team', got '${pair.trim()}'`,
        });
        continue;
      }
      mappings[conversationId] = teamId;
    }
    return mappings;
  });

export const settingsSchema = z.object({
  TEAM_ID: optionalText,
  DEFAULT_TEAM_ID: optionalText,
  MAIN_CHAT_ID: optionalText,
  LEADERSHIP_CHAT_ID: optionalText,
  CHAT_TEAM_MAPPINGS: chatTeamMappings,
  CACHE_SWEEP_INTERVAL_MS: positiveMs(60_000),
  CACHE_DEFAULT_TTL_MS: positiveMs(300_000),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() || undefined : value),
    z.enum(LOG_LEVELS).default('info'),
  ),
});

export type SettingsInput = z.input<typeof settingsSchema>;

/**
 * Validated runtime settings
 */
export interface Settings {
  /** Team the main and leadership chats belong to */
  teamId?: string;
  /** Fallback when a conversation has no mapping */
  defaultTeamId?: string;
  mainChatId?: string;
  leadershipChatId?: string;
  /** Explicit conversation → team pairs */
  chatTeamMappings: Record<string, string>;
  cacheSweepIntervalMs: number;
  cacheDefaultTtlMs: number;
  logLevel: LogLevel;
}

/**
 * Parse and validate settings
 *
 * @throws ConfigurationError listing every invalid variable
 *
 * @example
 * ```typescript
 * const settings = loadSettings(); // process.env
 * const forTests = loadSettings({ TEAM_ID: 'KAI', MAIN_CHAT_ID: 'chat-1' });
 * ```
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const result = settingsSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }

  const parsed = result.data;
  return {
    teamId: parsed.TEAM_ID,
    defaultTeamId: parsed.DEFAULT_TEAM_ID,
    mainChatId: parsed.MAIN_CHAT_ID,
    leadershipChatId: parsed.LEADERSHIP_CHAT_ID,
    chatTeamMappings: parsed.CHAT_TEAM_MAPPINGS,
    cacheSweepIntervalMs: parsed.CACHE_SWEEP_INTERVAL_MS,
    cacheDefaultTtlMs: parsed.CACHE_DEFAULT_TTL_MS,
    logLevel: parsed.LOG_LEVEL,
  };
}

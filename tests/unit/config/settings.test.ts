/**
 * @fileoverview Unit tests for loadSettings
 */

import { describe, it, expect } from '@jest/globals';
import { ConfigurationError, loadSettings } from '../../../src';

describe('loadSettings', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadSettings({})).toEqual({
      teamId: undefined,
      defaultTeamId: undefined,
      mainChatId: undefined,
      leadershipChatId: undefined,
      chatTeamMappings: {},
      cacheSweepIntervalMs: 60_000,
      cacheDefaultTtlMs: 300_000,
      logLevel: 'info',
    });
  });

  it('should read every variable', () => {
    const settings = loadSettings({
      TEAM_ID: 'TEAMA',
      DEFAULT_TEAM_ID: ' TEAMD ',
      MAIN_CHAT_ID: 'chat-main',
      LEADERSHIP_CHAT_ID: 'chat-lead',
      CHAT_TEAM_MAPPINGS: 'chat-42=TEAMB, chat-43 = TEAMC,',
      CACHE_SWEEP_INTERVAL_MS: '30000',
      CACHE_DEFAULT_TTL_MS: '1000',
      LOG_LEVEL: 'DEBUG',
    });

    expect(settings).toEqual({
      teamId: 'TEAMA',
      defaultTeamId: 'TEAMD',
      mainChatId: 'chat-main',
      leadershipChatId: 'chat-lead',
      chatTeamMappings: { 'chat-42': 'TEAMB', 'chat-43': 'TEAMC' },
      cacheSweepIntervalMs: 30_000,
      cacheDefaultTtlMs: 1_000,
      logLevel: 'debug',
    });
  });

  it('should treat blank values as unset', () => {
    const settings = loadSettings({ TEAM_ID: '   ', CACHE_SWEEP_INTERVAL_MS: '', LOG_LEVEL: ' ' });

    expect(settings.teamId).toBeUndefined();
    expect(settings.cacheSweepIntervalMs).toBe(60_000);
    expect(settings.logLevel).toBe('info');
  });

  it('should keep the text after the first equals sign as the team id', () => {
    expect(loadSettings({ CHAT_TEAM_MAPPINGS: 'chat-1=TEAM=A' }).chatTeamMappings).toEqual({ 'chat-1': 'TEAM=A' });
  });

  it('should reject a malformed chat mapping', () => {
    expect(() => loadSettings({ CHAT_TEAM_MAPPINGS: 'chat-42=TEAMB,oops' })).toThrow(
      "Invalid configuration: CHAT_TEAM_MAPPINGS: Expected 'chat=team', got 'oops'",
    );
  });

  it('should reject non-numeric and non-positive intervals', () => {
    expect(() => loadSettings({ CACHE_SWEEP_INTERVAL_MS: 'soon' })).toThrow(
      'Invalid configuration: CACHE_SWEEP_INTERVAL_MS: Expected number, received nan',
    );
    expect(() => loadSettings({ CACHE_DEFAULT_TTL_MS: '-5' })).toThrow(
      'Invalid configuration: CACHE_DEFAULT_TTL_MS: Number must be greater than 0',
    );
  });

  it('should list every invalid variable in one ConfigurationError', () => {
    let caught: unknown;
    try {
      loadSettings({ CHAT_TEAM_MAPPINGS: '=TEAMB', LOG_LEVEL: 'verbose' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.code).toBe('CONFIGURATION_ERROR');
    const issues = caught.details?.issues;
    expect(Array.isArray(issues) ? issues.length : 0).toBe(2);
    expect(caught.message).toContain("CHAT_TEAM_MAPPINGS: Expected 'chat=team', got '=TEAMB'");
    expect(caught.message).toContain('LOG_LEVEL: Invalid enum value');
  });
});

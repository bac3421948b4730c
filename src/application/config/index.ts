/**
 * @squadline/runtime - Configuration Module
 */

export { loadSettings, settingsSchema } from './settings';
export type { Settings, SettingsInput } from './settings';

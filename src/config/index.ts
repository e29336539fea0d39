/**
 * Configuration module exports
 */

export {
  resolveSettings,
  expandPath,
  parseBoolean,
  ENV,
  DEFAULTS,
  type RuntimeSettings,
  type TerraformSettings,
  type SettingSource,
  type ResolveSettingsOptions,
} from './settings.js';

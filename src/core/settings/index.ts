/**
 * Settings module
 */

export {
  SettingsValidator,
  validateRegion,
  validateDistributionId,
  validateDefaultPaths,
  REGION_PATTERN,
  DISTRIBUTION_ID_PATTERN,
  type SettingsValidationResult,
} from './validator.js';

export {
  decodeSettings,
  encodeSettings,
  defaultSettings,
  effectiveRegion,
  DEFAULT_REGION,
  DEFAULT_PATHS,
  FLAG_ON,
  FLAG_OFF,
} from './codec.js';

export {
  storedSettingsSchema,
  parseStoredSettings,
  STORED_FIELDS,
  LEGACY_FIELDS,
  type StoredSettings,
} from './schema.js';

export {
  MemorySettingsRepository,
  FileSettingsRepository,
  StoredSettingsRepository,
  getSettingsFilePath,
  DEFAULT_SETTINGS_DIR,
  type SettingsRepository,
  type FileSettingsOptions,
} from './repository.js';

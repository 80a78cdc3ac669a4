/**
 * Settings persistence
 *
 * Repositories store the encoded blob and run legacy credential migration
 * on every load, persisting the migrated blob right away.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Settings } from '../../types/settings.js';
import type { CredentialStore, MigrationResult } from '../credentials/credential-store.js';
import { decodeSettings, encodeSettings } from './codec.js';
import { parseStoredSettings, type StoredSettings } from './schema.js';

/**
 * Default settings directory
 */
export const DEFAULT_SETTINGS_DIR = '.cfi';

/**
 * Keyed blob store for settings
 */
export interface SettingsRepository {
  load(): Settings;
  /** @returns false when the stored content was already identical */
  save(settings: Settings): boolean;
}

/**
 * Shared load/save logic over a raw blob store
 */
export abstract class StoredSettingsRepository implements SettingsRepository {
  constructor(private readonly store?: CredentialStore) {}

  /** Read the stored blob, or null when nothing is stored */
  protected abstract read(): unknown;

  /** Replace the stored blob */
  protected abstract write(stored: StoredSettings): void;

  /**
   * Stored blob without migration or decoding
   */
  loadStored(): StoredSettings {
    return parseStoredSettings(this.read());
  }

  /**
   * Run legacy migration and persist its result when anything changed
   */
  migrate(): MigrationResult {
    const stored = this.loadStored();

    if (!this.store) {
      return { settings: stored, migrated: false };
    }

    const result = this.store.migrateLegacy(stored);
    if (result.migrated) {
      this.write(result.settings);
    }

    return result;
  }

  load(): Settings {
    return decodeSettings(this.migrate().settings);
  }

  save(settings: Settings): boolean {
    const stored = encodeSettings(settings);

    if (JSON.stringify(this.read()) === JSON.stringify(stored)) {
      return false;
    }

    this.write(stored);
    return true;
  }
}

/**
 * In-process repository
 */
export class MemorySettingsRepository extends StoredSettingsRepository {
  private blob: StoredSettings | null;

  constructor(initial: StoredSettings | null = null, store?: CredentialStore) {
    super(store);
    this.blob = initial ? { ...initial } : null;
  }

  protected read(): unknown {
    return this.blob;
  }

  protected write(stored: StoredSettings): void {
    this.blob = { ...stored };
  }

  /**
   * Current blob, for inspection
   */
  snapshot(): StoredSettings | null {
    return this.blob ? { ...this.blob } : null;
  }
}

/**
 * File repository options
 */
export interface FileSettingsOptions {
  /** Settings directory (default: .cfi) */
  settingsDir?: string;

  /** Environment name; selects settings.<env>.json */
  environment?: string;

  /** Base directory (default: process.cwd()) */
  cwd?: string;
}

/**
 * Get settings file path
 */
export function getSettingsFilePath(options: FileSettingsOptions = {}): string {
  const {
    settingsDir = DEFAULT_SETTINGS_DIR,
    environment = 'default',
    cwd = process.cwd(),
  } = options;

  const fileName =
    environment === 'default' ? 'settings.json' : `settings.${environment}.json`;

  return path.join(cwd, settingsDir, fileName);
}

/**
 * JSON file repository
 */
export class FileSettingsRepository extends StoredSettingsRepository {
  readonly filePath: string;

  constructor(options: FileSettingsOptions = {}, store?: CredentialStore) {
    super(store);
    this.filePath = getSettingsFilePath(options);
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  protected read(): unknown {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    try {
      const content = fs.readFileSync(this.filePath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load settings file: ${message}`);
    }
  }

  protected write(stored: StoredSettings): void {
    const settingsDir = path.dirname(this.filePath);

    try {
      if (!fs.existsSync(settingsDir)) {
        fs.mkdirSync(settingsDir, { recursive: true });
      }

      // Owner-only: the file holds encrypted credentials
      fs.writeFileSync(this.filePath, `${JSON.stringify(stored, null, 2)}\n`, {
        encoding: 'utf-8',
        mode: 0o600,
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to save settings file: ${message}`);
    }
  }
}

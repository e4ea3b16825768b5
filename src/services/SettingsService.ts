import { z } from 'zod';
import type { Env } from '../infra/env.js';
import type { AppConfigRepository } from '../infra/repositories/AppConfigRepository.js';
import {
  DEFAULT_ASPECT_RATIO,
  DEFAULT_MODEL,
  DEFAULT_SIZE,
  aspectRatioSchema,
  imageSizeSchema,
  modelSchema,
  type AspectRatio,
  type ImageModel,
  type ImageSize,
} from '../domain/entities/GenerationParams.js';
import { ValidationError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export const SETTING_KEYS = [
  'api.key',
  'api.model',
  'api.base_url',
  'defaults.aspect_ratio',
  'defaults.size',
  'output.directory',
  'output.auto_download',
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

export type SettingSource = 'env' | 'stored' | 'default';

export interface SettingEntry {
  key: SettingKey;
  value: string | null;
  source: SettingSource;
}

export interface Settings {
  apiKey: string | null;
  model: ImageModel;
  baseUrl: string | null;
  aspectRatio: AspectRatio;
  size: ImageSize;
  outputDirectory: string;
  autoDownload: boolean;
}

export const DEFAULT_OUTPUT_DIRECTORY = './banana-output';

const MASKED = '****';

const settingSchemas: Record<SettingKey, z.ZodType<string>> = {
  'api.key': z.string().min(1, { message: 'API key cannot be empty' }),
  'api.model': modelSchema,
  'api.base_url': z.string().url({ message: 'Base URL must be a valid URL' }),
  'defaults.aspect_ratio': aspectRatioSchema,
  'defaults.size': imageSizeSchema,
  'output.directory': z.string().min(1, { message: 'Output directory cannot be empty' }),
  'output.auto_download': z.enum(['true', 'false'], {
    errorMap: () => ({ message: 'Expected true or false' }),
  }),
};

const settingDefaults: Record<SettingKey, string | null> = {
  'api.key': null,
  'api.model': DEFAULT_MODEL,
  'api.base_url': null,
  'defaults.aspect_ratio': DEFAULT_ASPECT_RATIO,
  'defaults.size': DEFAULT_SIZE,
  'output.directory': DEFAULT_OUTPUT_DIRECTORY,
  'output.auto_download': 'true',
};

export function isSettingKey(key: string): key is SettingKey {
  const known: readonly string[] = SETTING_KEYS;
  return known.includes(key);
}

/**
 * User settings stored in app_config.
 * Read at submission time only: a job's parameters are a snapshot and never follow later changes.
 */
export class SettingsService {
  constructor(
    private env: Pick<Env, 'GEMINI_API_KEY' | 'GEMINI_BASE_URL'>,
    private configRepo: AppConfigRepository
  ) {}

  resolve(): Settings {
    return {
      apiKey: this.value('api.key'),
      model: modelSchema.parse(this.value('api.model')),
      baseUrl: this.value('api.base_url'),
      aspectRatio: aspectRatioSchema.parse(this.value('defaults.aspect_ratio')),
      size: imageSizeSchema.parse(this.value('defaults.size')),
      outputDirectory: this.value('output.directory') ?? DEFAULT_OUTPUT_DIRECTORY,
      autoDownload: this.value('output.auto_download') !== 'false',
    };
  }

  /**
   * Display value for one key; the API key is masked
   */
  get(key: string): string | null {
    const settingKey = this.requireKey(key);
    const value = this.value(settingKey);
    if (settingKey === 'api.key' && value !== null) {
      return MASKED;
    }
    return value;
  }

  list(): SettingEntry[] {
    return SETTING_KEYS.map((key) => {
      const { value, source } = this.lookup(key);
      return { key, value: key === 'api.key' && value !== null ? MASKED : value, source };
    });
  }

  set(key: string, value: string): void {
    const settingKey = this.requireKey(key);
    const result = settingSchemas[settingKey].safeParse(value.trim());
    if (!result.success) {
      throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid value', {
        key: settingKey,
      });
    }

    this.configRepo.set(settingKey, result.data);
    logger.info('Setting updated', { key: settingKey });
  }

  /**
   * Clears every stored setting; returns how many were removed
   */
  reset(): number {
    const removed = this.configRepo.clear();
    logger.info('Settings reset', { removed });
    return removed;
  }

  private value(key: SettingKey): string | null {
    return this.lookup(key).value;
  }

  private lookup(key: SettingKey): { value: string | null; source: SettingSource } {
    if (key === 'api.key' && this.env.GEMINI_API_KEY) {
      return { value: this.env.GEMINI_API_KEY, source: 'env' };
    }
    if (key === 'api.base_url' && this.env.GEMINI_BASE_URL) {
      return { value: this.env.GEMINI_BASE_URL, source: 'env' };
    }

    const stored = this.configRepo.get(key);
    if (stored !== null) {
      if (settingSchemas[key].safeParse(stored).success) {
        return { value: stored, source: 'stored' };
      }
      logger.warn('Ignoring invalid stored setting', { key });
    }
    return { value: settingDefaults[key], source: 'default' };
  }

  private requireKey(key: string): SettingKey {
    if (!isSettingKey(key)) {
      throw new ValidationError(`Unknown config key '${key}'`, { available: SETTING_KEYS });
    }
    return key;
  }
}

import { readFileSync } from 'node:fs';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import { TimeFormat } from '../format/TimeFormat';
import { ConfigError } from '../shared/errors';
import type { AppConfig, FormatSpec } from '../shared/types';
import { createLogger } from '../utils/logger';
import { toError } from '../utils/toError';

const log = createLogger('config');

const FormatSpecSchema = z
  .object({
    'show-hours': z.boolean().default(true),
    'show-minutes': z.boolean().default(true),
    'show-seconds': z.boolean().default(true),
    'show-decimals': z.boolean().default(true),
    'decimal-places': z.number().int().min(0).max(9).default(2),
    dynamic: z.boolean().default(false),
  })
  .default({})
  .transform((f): FormatSpec => ({
    showHours: f['show-hours'],
    showMinutes: f['show-minutes'],
    showSeconds: f['show-seconds'],
    showDecimals: f['show-decimals'],
    decimalPlaces: f['decimal-places'],
    dynamic: f.dynamic,
  }));

export const ConfigSchema = z
  .object({
    format: z
      .object({
        timer: FormatSpecSchema,
        split: FormatSpecSchema,
        segment: FormatSpecSchema,
      })
      .default({}),
    general: z
      .object({
        comparison: z.string().min(1).optional(),
        'split-format': z.enum(['time', 'delta']).default('delta'),
        'use-game-time': z.boolean().default(false),
      })
      .default({}),
  })
  .transform((c): AppConfig => ({
    format: c.format,
    general: {
      comparison: c.general.comparison,
      splitFormat: c.general['split-format'],
      useGameTime: c.general['use-game-time'],
    },
  }));

export function defaultConfig(): AppConfig {
  return ConfigSchema.parse({});
}

/** Validate a decoded configuration document; absent keys take their defaults */
export function parseConfig(input: unknown): Result<AppConfig, ConfigError> {
  const parsed = ConfigSchema.safeParse(input ?? {});
  if (parsed.success) return ok(parsed.data);
  const detail = parsed.error.issues
    .map(i => `${i.path.join('.') || '<root>'}: ${i.message}`)
    .join('; ');
  return err(new ConfigError(`Invalid configuration: ${detail}`, parsed.error));
}

/**
 * Read a JSON configuration file. A missing file yields the defaults; an
 * unreadable or invalid one is an error.
 */
export function loadConfig(path: string): Result<AppConfig, ConfigError> {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      log.warn({ path }, 'config file not found, using defaults');
      return ok(defaultConfig());
    }
    return err(new ConfigError(`Cannot read ${path}`, toError(e)));
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    return err(new ConfigError(`Malformed JSON in ${path}`, toError(e)));
  }
  return parseConfig(json);
}

export interface DisplayFormats {
  timer: TimeFormat;
  split: TimeFormat;
  segment: TimeFormat;
}

/** One pattern owner per display role */
export function createFormats(config: AppConfig): DisplayFormats {
  return {
    timer: new TimeFormat(config.format.timer),
    split: new TimeFormat(config.format.split),
    segment: new TimeFormat(config.format.segment),
  };
}

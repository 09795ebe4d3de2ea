import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createFormats, defaultConfig, loadConfig, parseConfig } from '../config';
import { ConfigError } from '../../shared/errors';

const FULL_FORMAT = {
  showHours: true,
  showMinutes: true,
  showSeconds: true,
  showDecimals: true,
  decimalPlaces: 2,
  dynamic: false,
};

describe('parseConfig', () => {
  it('fills every default from an empty document', () => {
    const result = parseConfig({});
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        format: { timer: FULL_FORMAT, split: FULL_FORMAT, segment: FULL_FORMAT },
        general: { comparison: undefined, splitFormat: 'delta', useGameTime: false },
      });
    }
  });

  it('treats a null document as empty', () => {
    expect(parseConfig(null).isOk()).toBe(true);
  });

  it('maps kebab-case keys', () => {
    const result = parseConfig({
      format: { timer: { 'decimal-places': 3, dynamic: true, 'show-hours': false } },
      general: { comparison: 'Best Segments', 'split-format': 'time', 'use-game-time': true },
    });
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.format.timer).toEqual({
        ...FULL_FORMAT, showHours: false, decimalPlaces: 3, dynamic: true,
      });
      expect(result.value.format.split).toEqual(FULL_FORMAT);
      expect(result.value.general).toEqual({
        comparison: 'Best Segments', splitFormat: 'time', useGameTime: true,
      });
    }
  });

  it('rejects decimal places outside 0..9', () => {
    const result = parseConfig({ format: { segment: { 'decimal-places': 12 } } });
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toContain('format.segment.decimal-places');
    }
  });

  it('accepts zero decimal places', () => {
    const result = parseConfig({ format: { split: { 'decimal-places': 0 } } });
    expect(result.isOk()).toBe(true);
  });

  it('rejects an unknown split format', () => {
    const result = parseConfig({ general: { 'split-format': 'percent' } });
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toContain('general.split-format');
    }
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'split-readout-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a JSON file', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, JSON.stringify({ format: { timer: { dynamic: true } } }));
    const result = loadConfig(path);
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.format.timer.dynamic).toBe(true);
    }
  });

  it('uses defaults when the file is missing', () => {
    const result = loadConfig(join(dir, 'missing.json'));
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual(defaultConfig());
    }
  });

  it('reports malformed JSON', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ "format": ');
    const result = loadConfig(path);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(`Malformed JSON in ${path}`);
      expect(result.error.cause).toBeInstanceOf(SyntaxError);
    }
  });

  it('reports a path that cannot be read', () => {
    const result = loadConfig(dir);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(`Cannot read ${dir}`);
    }
  });
});

describe('createFormats', () => {
  it('builds one pattern owner per role', () => {
    const config = defaultConfig();
    config.format.segment.showHours = false;
    const formats = createFormats(config);
    expect(formats.timer.getPattern()).toBe('h:m:s.dd');
    expect(formats.split.getPattern()).toBe('h:m:s.dd');
    expect(formats.segment.getPattern()).toBe('m:s.dd');
  });
});

import type { FormatSpec, MagnitudeBucket, VisibleFields } from '../shared/types';
import { createLogger } from '../utils/logger';

const log = createLogger('time-format');

const MINUTE_MS = 60_000;
const HOUR_MS = 3_600_000;

export const DEFAULT_FORMAT_SPEC: Readonly<FormatSpec> = {
  showHours: true,
  showMinutes: true,
  showSeconds: true,
  showDecimals: true,
  decimalPlaces: 2,
  dynamic: false,
};

export interface PatternResolution {
  pattern: string;
  cache: string | null; // what the owner should store for the next call
}

export function bucketFor(totalMs: number): MagnitudeBucket {
  const ms = Math.abs(totalMs);
  if (ms < MINUTE_MS) return 'underMinute';
  if (ms < HOUR_MS) return 'underHour';
  return 'hourPlus';
}

/** Which fields a pattern shows for a magnitude bucket; `null` keeps the configured flags */
export function visibleFields(bucket: MagnitudeBucket | null, spec: FormatSpec): VisibleFields {
  const fields: VisibleFields = {
    hours: spec.showHours,
    minutes: spec.showMinutes,
    seconds: spec.showSeconds,
    decimals: spec.showDecimals,
  };
  // Minutes and seconds together are precise enough without decimals
  const minSecShown = spec.showMinutes && spec.showSeconds;

  switch (bucket) {
    case null:
      return fields;
    case 'underMinute':
      return { ...fields, hours: false, minutes: false };
    case 'underHour':
      return { ...fields, hours: false, decimals: fields.decimals && !minSecShown };
    case 'hourPlus':
      return { ...fields, decimals: fields.decimals && !minSecShown };
  }
}

function decimals(places: number): string {
  return places > 0 ? '.' + 'd'.repeat(places) : '';
}

export function buildPattern(fields: VisibleFields, spec: FormatSpec): string {
  let pattern = '';
  const field = (token: string) => {
    if (pattern.length > 0) pattern += ':';
    pattern += token;
  };

  if (fields.hours) field('h');
  if (fields.minutes) field('m');
  if (fields.seconds) field('s');
  if (fields.decimals) pattern += decimals(spec.decimalPlaces);

  if (pattern.length > 0) return pattern;

  // A readout always shows at least seconds
  if (spec.showSeconds && spec.showDecimals) return 's' + decimals(spec.decimalPlaces);
  return 's';
}

export function computePattern(spec: FormatSpec, totalMs: number | null): string {
  const bucket = spec.dynamic && totalMs !== null ? bucketFor(totalMs) : null;
  return buildPattern(visibleFields(bucket, spec), spec);
}

/**
 * Resolve the pattern for a spec without mutating anything. Static specs
 * reuse `cached` when present; dynamic specs recompute on every call.
 */
export function resolvePattern(
  spec: FormatSpec,
  cached: string | null,
  totalMs: number | null = null,
): PatternResolution {
  if (!spec.dynamic && cached !== null) {
    return { pattern: cached, cache: cached };
  }
  const pattern = computePattern(spec, totalMs);
  return { pattern, cache: spec.dynamic ? null : pattern };
}

/**
 * Owns one display format and its memoized pattern. Callers hold the
 * instance exclusively for a refresh tick; there is no internal locking.
 */
export class TimeFormat {
  private _spec: FormatSpec;
  private _cachedPattern: string | null = null;

  constructor(spec: Partial<FormatSpec> = {}) {
    this._spec = { ...DEFAULT_FORMAT_SPEC, ...spec };
  }

  get spec(): Readonly<FormatSpec> { return this._spec; }
  get cachedPattern(): string | null { return this._cachedPattern; }

  getPattern(totalMs: number | null = null): string {
    const computed = this._spec.dynamic || this._cachedPattern === null;
    const { pattern, cache } = resolvePattern(this._spec, this._cachedPattern, totalMs);
    if (computed) {
      log.debug({ pattern, dynamic: this._spec.dynamic }, 'pattern computed');
    }
    this._cachedPattern = cache;
    return pattern;
  }

  /** Replace the spec and drop the memoized pattern */
  configure(spec: Partial<FormatSpec>): void {
    this._spec = { ...this._spec, ...spec };
    this.invalidate();
  }

  invalidate(): void {
    this._cachedPattern = null;
  }
}

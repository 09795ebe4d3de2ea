import type { DisplayFormats } from '../config/config';
import { formatDelta, formatDuration, formatDurationOpt } from '../format/duration';
import type { AppConfig, Time, TimingMethod } from '../shared/types';
import { pickTime } from './timing';

/** Configuration plus the pattern owners, held exclusively for one refresh tick */
export interface RenderContext {
  config: AppConfig;
  formats: DisplayFormats;
}

/** A cumulative split time in the split format, or `--` when unrecorded */
export function formatSplitTime(time: Time | undefined, method: TimingMethod, ctx: RenderContext): string {
  const ms = pickTime(time, method);
  const pattern = ctx.formats.split.getPattern(ms === null ? null : Math.abs(ms));
  return formatDurationOpt(ms, pattern);
}

export function formatSegmentTime(ms: number, ctx: RenderContext): string {
  return formatDuration(ms, ctx.formats.segment.getPattern(Math.abs(ms)));
}

export function formatSegmentDelta(diffMs: number, ctx: RenderContext): string {
  return formatDelta(diffMs, ctx.formats.segment.getPattern(Math.abs(diffMs)));
}

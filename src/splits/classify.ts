import type { SplitClass } from '../shared/types';

export interface SplitClassInput {
  comparisonMs: number; // the comparison's own duration for this segment
  splitMs: number;      // this segment's duration, or how long it has been running
  diffMs: number;       // signed: negative is ahead of the comparison
  goldMs: number | null;
  running: boolean;     // the segment is in progress and its split is not final
}

/** Presentation class per tag, for the styling layer */
export const SPLIT_CLASS_STYLES: Record<SplitClass, string | null> = {
  gold: 'goldsplit',
  'ahead-gaining': 'greensplit',
  'ahead-losing': 'lostgreensplit',
  'behind-gaining': 'gainedredsplit',
  'behind-losing': 'redsplit',
  none: null,
};

/** Marker for the segment in progress; chosen by the caller, not the classifier */
export const CURRENT_SEGMENT_STYLE = 'current-segment';

/**
 * A missing best counts as no best. So does a zero best: split files store
 * "never recorded" as zero, which makes an instantaneous segment look unset.
 */
export function hasRecordedBest(goldMs: number | null): boolean {
  return goldMs !== null && goldMs !== 0;
}

export function classifySplit(input: SplitClassInput): SplitClass {
  const { comparisonMs, splitMs, diffMs, goldMs, running } = input;

  // Gold wins over every other tag, but never while the split is still open
  if (!running && (goldMs === null || !hasRecordedBest(goldMs) || splitMs < goldMs)) return 'gold';

  // Ahead/behind follows the cumulative diff; gaining/losing this segment's own pace
  const gaining = splitMs <= comparisonMs;
  if (diffMs < 0) return gaining ? 'ahead-gaining' : 'ahead-losing';
  if (diffMs > 0) return gaining ? 'behind-gaining' : 'behind-losing';
  return 'none';
}

export function splitClassStyle(splitClass: SplitClass): string | null {
  return SPLIT_CLASS_STYLES[splitClass];
}

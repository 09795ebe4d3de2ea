export type TimingMethod = 'realTime' | 'gameTime';

export type TimerPhase = 'notRunning' | 'running' | 'paused' | 'ended';

export type SplitFormat = 'time' | 'delta';

export type MagnitudeBucket = 'underMinute' | 'underHour' | 'hourPlus';

export type SplitClass =
  | 'gold'
  | 'ahead-gaining'
  | 'ahead-losing'
  | 'behind-gaining'
  | 'behind-losing'
  | 'none';

export interface FormatSpec {
  showHours: boolean;
  showMinutes: boolean;
  showSeconds: boolean;
  showDecimals: boolean;
  decimalPlaces: number; // 0..9
  dynamic: boolean;
}

export interface VisibleFields {
  hours: boolean;
  minutes: boolean;
  seconds: boolean;
  decimals: boolean;
}

/** A time in milliseconds under each timing method; null when not recorded */
export interface Time {
  realTime: number | null;
  gameTime: number | null;
}

export interface SegmentSnapshot {
  name: string;
  comparisons: Record<string, Time>;
  bestSegmentTime: Time;
  splitTime: Time; // cumulative time at which the segment ended in this attempt
}

/** Read-only view of the external timer for one refresh tick */
export interface RunSnapshot {
  phase: TimerPhase;
  segments: SegmentSnapshot[];
  currentSplitIndex: number | null;
  currentComparison: string;
  timingMethod: TimingMethod;
  attemptMs: number;
  offsetMs: number;
  pauseMs: number | null;
  loadingMs: number;
}

export interface GeneralConfig {
  comparison?: string;
  splitFormat: SplitFormat;
  useGameTime: boolean;
}

export interface AppConfig {
  format: {
    timer: FormatSpec;
    split: FormatSpec;
    segment: FormatSpec;
  };
  general: GeneralConfig;
}

export interface SplitRow {
  index: number;
  name: string;
  value: string;
  current: boolean;
  splitClass: SplitClass;
}

export interface TimerReadout {
  text: string;
  main: string;
  fraction: string;
}

export interface SegmentInfo {
  bestLabel: string;
  best: string;
  comparisonLabel: string;
  comparison: string;
}

export interface SegmentDelta {
  index: number;
  value: string;
  splitClass: SplitClass;
}

export interface SplitsSnapshot {
  rows: SplitRow[];
  timer: TimerReadout;
  selected: SegmentInfo | null;
  previousDiff: SegmentDelta | null;
  previousBest: SegmentDelta | null;
}

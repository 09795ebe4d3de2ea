import { createFormats } from '../config/config';
import type { RenderContext } from '../splits/context';
import { previousSegmentBest, previousSegmentDiff, selectedSegmentInfo, timerReadout } from '../splits/info';
import { computeSplitRows } from '../splits/rows';
import type { AppConfig, RunSnapshot, SplitsSnapshot } from '../shared/types';
import { createLogger } from '../utils/logger';
import { toError } from '../utils/toError';

const log = createLogger('presenter');

export const REFRESH_INTERVAL_MS = 16;

/** Reads the external timer; called once per refresh tick */
export type RunSource = () => RunSnapshot;

type PresenterEventMap = {
  render: SplitsSnapshot;
  error: Error;
};
type PresenterEventType = keyof PresenterEventMap;
type PresenterListener<E extends PresenterEventType> = (payload: PresenterEventMap[E]) => void;

export class SplitsPresenter {
  private _ctx: RenderContext;
  private _selectedIndex: number | null = null;
  private _last: SplitsSnapshot | null = null;
  private _intervalId: ReturnType<typeof setInterval> | null = null;
  private _renderListeners = new Set<PresenterListener<'render'>>();
  private _errorListeners = new Set<PresenterListener<'error'>>();

  constructor(private source: RunSource, config: AppConfig) {
    this._ctx = { config, formats: createFormats(config) };
  }

  on<E extends PresenterEventType>(event: E, fn: PresenterListener<E>): void {
    this._listenersFor(event).add(fn);
  }

  off<E extends PresenterEventType>(event: E, fn: PresenterListener<E>): void {
    this._listenersFor(event).delete(fn);
  }

  private _listenersFor<E extends PresenterEventType>(event: E): Set<PresenterListener<E>> {
    // Each map entry is keyed to its own payload type
    const byEvent: { [K in PresenterEventType]: Set<PresenterListener<K>> } = {
      render: this._renderListeners,
      error: this._errorListeners,
    };
    return byEvent[event];
  }

  get running(): boolean { return this._intervalId !== null; }
  get lastSnapshot(): SplitsSnapshot | null { return this._last; }
  get selectedIndex(): number | null { return this._selectedIndex; }
  get config(): AppConfig { return this._ctx.config; }

  /** New configuration: fresh pattern owners, so no cached pattern survives */
  configure(config: AppConfig): void {
    this._ctx = { config, formats: createFormats(config) };
  }

  /** Segment whose info box is shown; `null` follows the current segment */
  select(index: number | null): void {
    this._selectedIndex = index;
  }

  render(run: RunSnapshot): SplitsSnapshot {
    return {
      rows: computeSplitRows(run, this._ctx),
      timer: timerReadout(run, this._ctx),
      selected: selectedSegmentInfo(run, this._ctx, this._selectedIndex),
      previousDiff: previousSegmentDiff(run, this._ctx),
      previousBest: previousSegmentBest(run, this._ctx),
    };
  }

  /** One tick: read the timer, render, notify. Source failures are reported, not rethrown. */
  refresh(): SplitsSnapshot | null {
    let run: RunSnapshot;
    try {
      run = this.source();
    } catch (e) {
      const error = toError(e);
      log.error({ err: error }, 'run source failed');
      this._errorListeners.forEach(fn => fn(error));
      return null;
    }
    const snap = this.render(run);
    this._last = snap;
    this._renderListeners.forEach(fn => fn(snap));
    return snap;
  }

  start(intervalMs = REFRESH_INTERVAL_MS): void {
    if (this._intervalId !== null) return;
    log.debug({ intervalMs }, 'refresh loop started');
    this.refresh();
    this._intervalId = setInterval(() => this.refresh(), intervalMs);
  }

  stop(): void {
    if (this._intervalId === null) return;
    clearInterval(this._intervalId);
    this._intervalId = null;
    log.debug('refresh loop stopped');
  }
}

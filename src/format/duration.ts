/** Canonical rendering for "no duration available" */
export const NO_DURATION = '--';

const HOUR_MS = 3_600_000;
const MINUTE_MS = 60_000;
const SECOND_MS = 1_000;

/** Append a whole-number field. Leading zero fields are dropped unless `alwaysShow`. */
function appendNumber(out: string, value: number, alwaysShow: boolean): string {
  if (value <= 0 && out.length === 0 && !alwaysShow) return out;
  // The first field keeps its natural width; later ones are two digits
  return out + (out.length === 0 ? String(value) : String(value).padStart(2, '0'));
}

/** Fraction of a second from the millisecond remainder, truncated (never rounded) */
function appendFraction(out: string, millis: number, width: number): string {
  const base = String(millis).padStart(3, '0');
  if (width <= 3) return out + base.slice(0, width);
  return out + base + '0'.repeat(width - 3);
}

/**
 * Render the absolute value of `ms` against a pattern.
 *
 * Tokens: `h` hours, `m` minutes (0-59), `s` seconds (0-59), a run of `d`
 * for the fraction (`d` tenths, `dd` hundredths, `ddd` milliseconds). Runs of
 * h/m/s only control presence. Anything else is a literal, written only once
 * something precedes it.
 *
 *   formatDuration(125_340, 'm:s.dd')   // "2:05.34"
 *   formatDuration(3_845_999, 'h:m:s')  // "1:04:05"
 */
export function formatDuration(ms: number, pattern: string): string {
  const abs = Math.trunc(Math.abs(ms));
  const hours = Math.floor(abs / HOUR_MS);
  const minutes = Math.floor(abs / MINUTE_MS) % 60;
  const seconds = Math.floor(abs / SECOND_MS) % 60;
  const millis = abs % SECOND_MS;

  let out = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    let count = 1;
    while (pattern[i + count] === ch) count++;
    i += count;

    switch (ch) {
      case 'h': out = appendNumber(out, hours, false); break;
      case 'm': out = appendNumber(out, minutes, false); break;
      case 's': out = appendNumber(out, seconds, true); break;
      case 'd': out = appendFraction(out, millis, count); break;
      default:
        if (out.length > 0) out += ch.repeat(count);
    }
  }
  return out;
}

export function formatDurationOpt(ms: number | null, pattern: string): string {
  return ms === null ? NO_DURATION : formatDuration(ms, pattern);
}

/** Readout form: negative durations get a leading `-` */
export function formatSigned(ms: number, pattern: string): string {
  const out = formatDuration(ms, pattern);
  return Math.trunc(ms) < 0 ? `-${out}` : out;
}

/** Delta form: `+` behind, `-` ahead, `~` dead even */
export function formatDelta(ms: number, pattern: string): string {
  const diff = Math.trunc(ms);
  const sign = diff > 0 ? '+' : diff < 0 ? '-' : '~';
  return sign + formatDuration(diff, pattern);
}

/** Split a readout at its last `.` so the fraction can be drawn smaller */
export function splitReadout(text: string): { main: string; fraction: string } {
  const dot = text.lastIndexOf('.');
  if (dot === -1) return { main: text, fraction: '' };
  return { main: text.slice(0, dot + 1), fraction: text.slice(dot + 1) };
}

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

// "12.345" is cut to "12.3", "1.050" to "1.05"
const SECONDS_WIDTH = 4;

/**
 * Human readable duration: `0 ms`, `250 ms`, `1.05 s`, `2 h 3 s`.
 */
export function prettyMs(ms: number): string {
  const value = Number.isFinite(ms) ? Math.floor(ms) : 0;

  if (value < 1) {
    return "0 ms";
  }
  if (value < MS_PER_SECOND) {
    return `${value} ms`;
  }
  if (value < MS_PER_MINUTE) {
    const seconds = Math.floor(value / MS_PER_SECOND);
    const fraction = String(value % MS_PER_SECOND).padStart(3, "0");
    return `${`${seconds}.${fraction}`.slice(0, SECONDS_WIDTH)} s`;
  }

  const parts: Array<[number, string]> = [
    [Math.floor(value / MS_PER_DAY), "d"],
    [Math.floor(value / MS_PER_HOUR) % 24, "h"],
    [Math.floor(value / MS_PER_MINUTE) % 60, "m"],
    [Math.floor(value / MS_PER_SECOND) % 60, "s"],
  ];
  return parts
    .filter(([amount]) => amount > 0)
    .map(([amount, unit]) => `${amount} ${unit}`)
    .join(" ");
}

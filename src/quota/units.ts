/** length of each duration unit spelling, in seconds */
export const UNIT_SECONDS: Readonly<Record<string, number>> = Object.freeze({
  seconds: 1, second: 1, secs: 1, sec: 1, s: 1,
  minutes: 60, minute: 60, mins: 60, min: 60, m: 60,
  hours: 3600, hour: 3600, hrs: 3600, hr: 3600, h: 3600,
  days: 86_400, day: 86_400, d: 86_400,
  weeks: 604_800, week: 604_800, wk: 604_800, w: 604_800,
  // 30-day month
  months: 2_592_000, month: 2_592_000, mo: 2_592_000,
  // 365-day year
  years: 31_536_000, year: 31_536_000, yr: 31_536_000, y: 31_536_000
});

/** fraction words and symbols that may stand in for a quantity */
export const FRACTIONS: Readonly<Record<string, number>> = Object.freeze({
  half: 0.5,
  quarter: 0.25,
  third: 1 / 3,
  '¾': 0.75,
  '½': 0.5,
  '¼': 0.25
});

/** unit spellings, longest first, so `m` is never tried before `month` */
export const UNITS_LONGEST_FIRST: readonly string[] = Object.freeze(
  Object.keys(UNIT_SECONDS).sort((a, b) => b.length - a.length)
);

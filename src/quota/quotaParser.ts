import { FRACTIONS, UNIT_SECONDS, UNITS_LONGEST_FIRST } from './units';
import type { QuotaBucketParams } from './bucketParams';
import { QuotaParseError } from '../quotaParseError';

const UNLIMITED = 'unlimited';

/** a count, an optional message word, then a separator keyword */
const COUNT_PATTERN = /(\d+(?:\.\d+)?)\s*(?:msgs?|messages?)?\s*(per|\/|every)/;

const SEPARATOR_PATTERN = /per|\/|every/;

/** a separator, whitespace, then the period phrase up to the end of the line */
const PERIOD_PATTERN = /(?:per|\/|every)\s+(.+)/;

const ARTICLE_PATTERN = /\ba\s+/g;

const FRACTION_PATTERNS: ReadonlyArray<[RegExp, string]> = Object.entries(FRACTIONS).map(
  ([word, value]): [RegExp, string] => [
    new RegExp(`(?<![\\p{L}\\p{N}_])${word}(?![\\p{L}\\p{N}_])`, 'gu'),
    String(value)
  ]
);

const DURATION_PATTERN = new RegExp(
  `\\b(\\d+(?:\\.\\d+)?)?\\s*(${UNITS_LONGEST_FIRST.join('|')})\\b`
);

/**
 * Turn a period phrase such as `half a week`, `3 hours` or `0.5 months` into seconds.
 * A missing quantity counts as one unit.
 * @throws QuotaParseError (`DURATION_NOT_PARSEABLE`) if no known unit is found
 */
export function parseDurationSeconds(phrase: string): number {
  let text = phrase.toLowerCase();
  for (const [pattern, value] of FRACTION_PATTERNS) {
    text = text.replace(pattern, value);
  }
  // fractions first: `half a week` → `0.5 a week` → `0.5 week`
  text = text.replace(ARTICLE_PATTERN, '');

  const match = DURATION_PATTERN.exec(text);
  if (!match) {
    throw new QuotaParseError(
      `Could not parse duration: '${phrase}'`,
      'DURATION_NOT_PARSEABLE',
      phrase
    );
  }

  const quantity = match[1] ? Number(match[1]) : 1;
  return quantity * UNIT_SECONDS[match[2]];
}

/**
 * Convert a quota phrase (`20 messages per week`, `1 msg every 3 hours`, `unlimited`)
 * into token-bucket parameters.
 *
 * A fractional count is truncated toward zero, so `2.9 messages per day` has a
 * capacity of 2.
 * @throws QuotaParseError if the count, the period or its unit is missing, or the
 * period is zero seconds long
 */
export function parseQuota(expression: string): QuotaBucketParams {
  const text = expression.trim().toLowerCase();

  if (text.includes(UNLIMITED)) {
    return { capacity: null, ratePerSec: 0 };
  }

  const countMatch = COUNT_PATTERN.exec(text);
  if (!countMatch) {
    if (!SEPARATOR_PATTERN.test(text)) {
      throw new QuotaParseError(
        `Could not find period in: '${expression}'`,
        'PERIOD_NOT_FOUND',
        expression
      );
    }
    throw new QuotaParseError(
      `Could not find message count in: '${expression}'`,
      'COUNT_NOT_FOUND',
      expression
    );
  }
  const capacity = Math.trunc(Number(countMatch[1]));

  // the count's own separator may lack trailing whitespace (`3 msgs/user per day`)
  const separatorIndex = countMatch.index + countMatch[0].length - countMatch[2].length;
  const periodMatch = PERIOD_PATTERN.exec(text.slice(separatorIndex));
  if (!periodMatch) {
    throw new QuotaParseError(
      `Could not find period in: '${expression}'`,
      'PERIOD_NOT_FOUND',
      expression
    );
  }
  const period = periodMatch[1].trim();

  const seconds = parseDurationSeconds(period);
  if (seconds === 0) {
    throw new QuotaParseError(
      `Duration cannot be zero: '${period}'`,
      'ZERO_DURATION',
      period
    );
  }

  return { capacity, ratePerSec: capacity / seconds };
}

import type { QuotaBucketParams } from './bucketParams';

/**
 * Render a rate as the shortest decimal that reads back as the same double, in
 * positional notation (`1e-7` becomes `0.0000001`).
 */
export function formatRate(rate: number): string {
  const text = String(rate);
  const match = /^(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }

  const digits = match[1] + (match[2] || '');
  const exponent = Number(match[3]);
  if (exponent < 0) {
    return `0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
  return digits.padEnd(exponent + 1, '0');
}

/** `capacity=3  rate_per_sec=0.75`, or `capacity=unlimited  rate_per_sec=0` */
export function formatBucketParams(params: QuotaBucketParams): string {
  const capacity = params.capacity === null ? 'unlimited' : String(params.capacity);
  return `capacity=${capacity}  rate_per_sec=${formatRate(params.ratePerSec)}`;
}

export type { QuotaBucketParams } from './quota/bucketParams';
export { FRACTIONS, UNIT_SECONDS } from './quota/units';
export { parseDurationSeconds, parseQuota } from './quota/quotaParser';
export { formatBucketParams, formatRate } from './quota/format';
export { QuotaParseError } from './quotaParseError';
export type { QuotaParseErrorCode } from './quotaParseError';

/** Token-bucket parameters described by a quota phrase */
export interface QuotaBucketParams {
  /**
   * maximum number of tokens the bucket holds, or null for an unlimited bucket
   */
  capacity: number | null;
  /**
   * tokens replenished per second (always 0 for an unlimited bucket, where it
   * carries no meaning)
   */
  ratePerSec: number;
}

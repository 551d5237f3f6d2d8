/**
 * Contract for the bibliographic metadata service behind enhanced scoring.
 */

export interface QualityEnrichmentClient {
  readonly name: string
  /** Largest batch the service accepts per request. */
  readonly maxBatchSize: number
  /**
   * Look up a batch of DOIs (already normalized). The returned map is keyed
   * by DOI; a null or missing entry means the service has no record.
   * Throws RateLimitError, TransientApiError or PermanentApiError.
   */
  fetchBatch(dois: string[], signal?: AbortSignal): Promise<Map<string, unknown>>
}

/**
 * Feed source contract. Transport reconnection and backoff belong to the
 * implementation; the engine only sees raw payloads, at least once each.
 */

export type RawEventHandler = (raw: unknown) => void;

export interface IFeedSource {
  /**
   * Starts delivering raw payloads for the given markets
   */
  subscribe(markets: string[], handler: RawEventHandler): Promise<void>;

  /**
   * Stops delivery
   */
  unsubscribe(): Promise<void>;
}

/**
 * Mail source capability
 * Anything that can hand over the most recent inbox messages as raw containers.
 */

export interface RawMessage {
  id: string;
  /** Full RFC 822 container */
  raw: Buffer;
  snippet: string;
  /** Provider metadata; the container headers are used when absent */
  subject?: string;
  sender?: string;
  date?: string;
}

export interface MailSource {
  readonly name: string;
  /**
   * Most recent messages first, at most `maxCount` of them
   * @throws UpstreamMailError when the source is unreachable or not authenticated
   */
  fetchRecent(maxCount: number): Promise<RawMessage[]>;
}

/**
 * Connection capability consumed by the REST adapter.
 *
 * Implementations own the serial line: buffering, timeouts, read-until parsing
 * and any retry loops. The adapter only calls these methods and shapes the
 * results, so any locking around the port belongs to the implementation too.
 */

/**
 * A string captured from the serial stream
 */
export interface ReceiveRecord {
  /** Unix epoch time in seconds (may be fractional) the data arrived at. */
  timestamp: number;
  data: string;
}

export interface SendOptions {
  /** Appended after the fragments are joined. Defaults to `"\r\n"`. */
  ending?: string;
  /** Placed between fragments. Defaults to a single space. */
  concatenate?: string;
}

export interface ReadOptions {
  /**
   * Cut the received string at the first occurrence of this terminator,
   * excluding it. Absent means the whole string.
   */
  readUntil?: string;
  /** Remove leading and trailing whitespace and newlines. */
  strip?: boolean;
}

export interface ReceiveOptions extends ReadOptions {
  /** 0 is the most recent record, 1 the one before it, and so on. */
  numBefore?: number;
}

export type SendReadOptions = SendOptions & ReadOptions;

export interface Connection {
  /**
   * Transmit the fragments joined by `concatenate` and terminated by `ending`.
   * Resolves false when the write did not go through.
   */
  send(data: readonly string[], options?: SendOptions): Promise<boolean>;

  /**
   * A record from the receive history, or null when nothing has been received
   * (or the history is shorter than `numBefore + 1`).
   */
  receiveStr(options?: ReceiveOptions): Promise<ReceiveRecord | null>;

  /** Every record in the receive history, oldest first. */
  getAllReceivedStr(options?: ReadOptions): Promise<ReceiveRecord[]>;

  /** The first string received after the call, or null on timeout. */
  get(options?: ReadOptions): Promise<string | null>;

  /** Send, then resolve with the first string received afterwards, or null on timeout. */
  getFirstResponse(data: readonly string[], options?: SendReadOptions): Promise<string | null>;

  /** Resolve true once `response` is received, false on timeout. */
  waitForResponse(response: string, options?: ReadOptions): Promise<boolean>;

  /** Keep sending until `response` is received. Resolves false on timeout. */
  sendForResponse(response: string, data: readonly string[], options?: SendReadOptions): Promise<boolean>;
}

import { applyReadOptions, formatPayload } from '../connection/payload.js';
import type {
  Connection,
  ReadOptions,
  ReceiveOptions,
  ReceiveRecord,
  SendOptions,
  SendReadOptions,
} from '../connection/types.js';

/**
 * In-memory Connection for handler tests.
 *
 * `history` is what has already been received. `incoming` holds strings the
 * "device" will emit after a request starts waiting; an empty queue behaves
 * like a timeout.
 */
export class FakeConnection implements Connection {
  readonly history: ReceiveRecord[] = [];
  readonly incoming: string[] = [];
  readonly written: string[] = [];

  sendSucceeds = true;

  private clock: number;

  constructor(startTime = 1_700_000_000) {
    this.clock = startTime;
  }

  /** Record a string as already received. */
  receive(data: string, timestamp?: number): this {
    this.history.push({ data, timestamp: timestamp ?? this.tick() });
    return this;
  }

  /** Queue a string the device will emit once something waits for it. */
  willReceive(...data: string[]): this {
    this.incoming.push(...data);
    return this;
  }

  async send(data: readonly string[], options?: SendOptions): Promise<boolean> {
    if (!this.sendSucceeds) {
      return false;
    }
    this.written.push(formatPayload(data, options));
    return true;
  }

  async receiveStr(options: ReceiveOptions = {}): Promise<ReceiveRecord | null> {
    const index = this.history.length - 1 - (options.numBefore ?? 0);
    const record = this.history[index];
    if (!record) {
      return null;
    }
    return { timestamp: record.timestamp, data: applyReadOptions(record.data, options) };
  }

  async getAllReceivedStr(options: ReadOptions = {}): Promise<ReceiveRecord[]> {
    return this.history.map((record) => ({
      timestamp: record.timestamp,
      data: applyReadOptions(record.data, options),
    }));
  }

  async get(options: ReadOptions = {}): Promise<string | null> {
    const next = this.incoming.shift();
    if (next === undefined) {
      return null;
    }
    this.receive(next);
    return applyReadOptions(next, options);
  }

  async getFirstResponse(data: readonly string[], options: SendReadOptions = {}): Promise<string | null> {
    if (!(await this.send(data, options))) {
      return null;
    }
    return this.get(options);
  }

  async waitForResponse(response: string, options: ReadOptions = {}): Promise<boolean> {
    for (let next = await this.get(options); next !== null; next = await this.get(options)) {
      if (next === response) {
        return true;
      }
    }
    return false;
  }

  async sendForResponse(
    response: string,
    data: readonly string[],
    options: SendReadOptions = {},
  ): Promise<boolean> {
    while (this.incoming.length > 0) {
      if (!(await this.send(data, options))) {
        return false;
      }
      const next = await this.get(options);
      if (next === response) {
        return true;
      }
    }
    return false;
  }

  private tick(): number {
    this.clock += 1;
    return this.clock;
  }
}

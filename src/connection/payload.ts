import type { ReadOptions, SendOptions } from './types.js';

export const DEFAULT_ENDING = '\r\n';
export const DEFAULT_CONCATENATE = ' ';

/**
 * The exact string a Connection writes for a send call: fragments joined by
 * `concatenate`, followed by `ending`.
 */
export function formatPayload(data: readonly string[], options: SendOptions = {}): string {
  const ending = options.ending ?? DEFAULT_ENDING;
  const concatenate = options.concatenate ?? DEFAULT_CONCATENATE;

  return data.join(concatenate) + ending;
}

/**
 * Apply read-until and strip to a received string, in that order.
 * Stripping only touches the ends, interior whitespace stays.
 */
export function applyReadOptions(text: string, options: ReadOptions = {}): string {
  let result = text;

  if (options.readUntil !== undefined && options.readUntil.length > 0) {
    const index = result.indexOf(options.readUntil);
    if (index >= 0) {
      result = result.slice(0, index);
    }
  }

  return options.strip ? result.trim() : result;
}

import type { ReceiveRecord } from '../../connection/types.js';
import { ok, type ResourceResult, type Resource } from '../resource.js';
import { parseArguments } from '../validation.js';
import { readArguments, receiveArguments, toReadOptions } from './arguments.js';

function recordResult(record: ReceiveRecord | null): ResourceResult {
  return ok({
    timestamp: record ? record.timestamp : null,
    data: record ? record.data : null,
  });
}

function historyResult(records: ReceiveRecord[]): ResourceResult {
  return ok({
    timestamps: records.map((record) => record.timestamp),
    data: records.map((record) => record.data),
  });
}

/**
 * `/receive` (GET, POST): a record from the receive history.
 *
 * GET returns the most recent record, stripped. POST accepts `num_before`,
 * `read_until` and `strip`. Either way the body is
 * `{"message": "OK", "timestamp": ..., "data": ...}` with both fields null when
 * nothing has been received.
 */
export const receiveResource: Resource = {
  get: async (conn) => recordResult(await conn.receiveStr({ strip: true })),

  post: async (conn, request) => {
    const args = parseArguments(receiveArguments, request.args);

    const record = await conn.receiveStr({
      numBefore: args.num_before,
      ...toReadOptions(args),
    });

    return recordResult(record);
  },
};

/**
 * `/receive/all` (GET, POST): the whole receive history, oldest first, as
 * `{"message": "OK", "timestamps": [...], "data": [...]}`.
 */
export const receiveAllResource: Resource = {
  get: async (conn) => historyResult(await conn.getAllReceivedStr({ strip: true })),

  post: async (conn, request) => {
    const args = parseArguments(readArguments, request.args);
    return historyResult(await conn.getAllReceivedStr(toReadOptions(args)));
  },
};

import { failure, ok, type Resource } from '../resource.js';
import { parseArguments } from '../validation.js';
import { readArguments, toReadOptions, waitArguments } from './arguments.js';

const NOTHING_RECEIVED = 'Nothing received';

/**
 * `/get` (GET, POST): the first string received after the request arrived.
 * GET strips it; POST takes `read_until` and `strip`.
 *
 * 502 `{"message": "Nothing received"}` when the connection times out.
 */
export const getResource: Resource = {
  get: async (conn) => {
    const data = await conn.get({ strip: true });
    return data === null ? failure(NOTHING_RECEIVED) : ok({ data });
  },

  post: async (conn, request) => {
    const args = parseArguments(readArguments, request.args);

    const data = await conn.get(toReadOptions(args));
    return data === null ? failure(NOTHING_RECEIVED) : ok({ data });
  },
};

/**
 * `/get/wait` (POST): block until `response` is received.
 */
export const waitResource: Resource = {
  post: async (conn, request) => {
    const args = parseArguments(waitArguments, request.args);

    const received = await conn.waitForResponse(args.response, toReadOptions(args));
    if (!received) {
      return failure('Did not receive response');
    }

    return ok();
  },
};

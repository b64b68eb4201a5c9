import { failure, ok, type Resource } from '../resource.js';
import { parseArguments } from '../validation.js';
import {
  sendArguments,
  sendForResponseArguments,
  sendReadArguments,
  toReadOptions,
  toSendOptions,
} from './arguments.js';

/**
 * `/send` (POST): write data to the serial port.
 *
 * Responses:
 * - `200 {"message": "OK"}` once the connection accepted the data
 * - `502 {"message": "Failed to send"}` when the connection reports the write failed
 */
export const sendResource: Resource = {
  post: async (conn, request) => {
    const args = parseArguments(sendArguments, request.args);

    const sent = await conn.send(args.data, toSendOptions(args));
    if (!sent) {
      return failure('Failed to send');
    }

    return ok();
  },
};

/**
 * `/send/get_first` (POST): write data, then respond with the first string
 * received afterwards.
 *
 * Responses:
 * - `200 {"message": "OK", "data": "..."}`
 * - `502 {"message": "Nothing received"}` when the connection timed out
 */
export const sendGetFirstResource: Resource = {
  post: async (conn, request) => {
    const args = parseArguments(sendReadArguments, request.args);

    const response = await conn.getFirstResponse(args.data, {
      ...toSendOptions(args),
      ...toReadOptions(args),
    });
    if (response === null) {
      return failure('Nothing received');
    }

    return ok({ data: response });
  },
};

/**
 * `/send/get` (POST): keep writing data until the expected response arrives.
 *
 * Responses:
 * - `200 {"message": "OK"}`
 * - `502 {"message": "Did not receive response"}` when the connection gave up
 */
export const sendForResponseResource: Resource = {
  post: async (conn, request) => {
    const args = parseArguments(sendForResponseArguments, request.args);

    const received = await conn.sendForResponse(args.response, args.data, {
      ...toSendOptions(args),
      ...toReadOptions(args),
    });
    if (!received) {
      return failure('Did not receive response');
    }

    return ok();
  },
};

import type { Connection } from '../../connection/types.js';
import type { Resource } from '../resource.js';
import type { RestApiHandler } from '../RestApiHandler.js';
import { getResource, waitResource } from './get.js';
import { receiveAllResource, receiveResource } from './receive.js';
import { sendForResponseResource, sendGetFirstResource, sendResource } from './send.js';

/**
 * Built-in endpoints, each wrapping one Connection method:
 *
 * - `/send` (POST): `Connection.send()`
 * - `/receive` (GET, POST): `Connection.receiveStr()`
 * - `/receive/all` (GET, POST): `Connection.getAllReceivedStr()`
 * - `/get` (GET, POST): `Connection.get()`
 * - `/send/get_first` (POST): `Connection.getFirstResponse()`
 * - `/get/wait` (POST): `Connection.waitForResponse()`
 * - `/send/get` (POST): `Connection.sendForResponse()`
 */
export const BUILTIN_ENDPOINTS: ReadonlyArray<readonly [path: string, resource: Resource]> = [
  ['/send', sendResource],
  ['/receive', receiveResource],
  ['/receive/all', receiveAllResource],
  ['/get', getResource],
  ['/send/get_first', sendGetFirstResource],
  ['/get/wait', waitResource],
  ['/send/get', sendForResponseResource],
];

/**
 * Attaches the built-in endpoints to a handler.
 *
 * Throws EndpointExistsError if any of the paths is already taken on the
 * handler, so a handler can only receive the built-ins once.
 *
 * ```ts
 * const handler = new RestApiHandler(conn);
 * new Builtins(handler);
 * ```
 */
export class Builtins<C extends Connection = Connection> {
  public readonly handler: RestApiHandler<C>;

  constructor(handler: RestApiHandler<C>) {
    this.handler = handler;

    for (const [path, resource] of BUILTIN_ENDPOINTS) {
      this.handler.addEndpoint(path, resource);
    }
  }
}

export { getResource, waitResource } from './get.js';
export { receiveAllResource, receiveResource } from './receive.js';
export { sendForResponseResource, sendGetFirstResource, sendResource } from './send.js';

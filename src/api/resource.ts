import type { Connection } from '../connection/types.js';

export const RESOURCE_METHODS = ['get', 'post', 'put', 'patch', 'delete'] as const;

export type ResourceMethod = (typeof RESOURCE_METHODS)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Every response body carries a `message`; the rest depends on the endpoint.
 */
export interface ResponseBody {
  message: string;
  [key: string]: JsonValue;
}

export interface ResourceResult {
  status: number;
  body: ResponseBody;
}

/**
 * What a handler sees of the HTTP request: the merged query string and body
 * arguments, not yet validated.
 */
export interface ResourceRequest {
  method: string;
  path: string;
  args: Record<string, unknown>;
}

export type ResourceHandler<C extends Connection = Connection> = (
  conn: C,
  request: ResourceRequest,
) => Promise<ResourceResult>;

/**
 * One path's handlers, keyed by HTTP method. The connection is handed to each
 * call by the RestApiHandler that owns it.
 */
export type Resource<C extends Connection = Connection> = Partial<Record<ResourceMethod, ResourceHandler<C>>>;

/**
 * Create a standardized success response
 */
export function ok(fields: Record<string, JsonValue> & { message?: never } = {}): ResourceResult {
  return { status: 200, body: { message: 'OK', ...fields } };
}

/**
 * Create a failure response for a collaborator that reported it could not do the work
 */
export function failure(message: string, status: number = 502): ResourceResult {
  return { status, body: { message } };
}

export function allowedMethods<C extends Connection>(resource: Resource<C>): ResourceMethod[] {
  return RESOURCE_METHODS.filter((method) => resource[method] !== undefined);
}

export { RestApiHandler } from './api/RestApiHandler.js';
export {
  BUILTIN_ENDPOINTS,
  Builtins,
  getResource,
  receiveAllResource,
  receiveResource,
  sendForResponseResource,
  sendGetFirstResource,
  sendResource,
  waitResource,
} from './api/builtins/index.js';
export {
  failure,
  ok,
  type JsonValue,
  type Resource,
  type ResourceHandler,
  type ResourceMethod,
  type ResourceRequest,
  type ResourceResult,
  type ResponseBody,
} from './api/resource.js';
export {
  countArgument,
  defineArguments,
  flagArgument,
  fragmentsArgument,
  parseArguments,
  terminatorArgument,
  textArgument,
  type ArgumentSchema,
} from './api/validation.js';
export {
  applyReadOptions,
  DEFAULT_CONCATENATE,
  DEFAULT_ENDING,
  formatPayload,
} from './connection/payload.js';
export type {
  Connection,
  ReadOptions,
  ReceiveOptions,
  ReceiveRecord,
  SendOptions,
  SendReadOptions,
} from './connection/types.js';
export {
  LOG_LEVELS,
  loadConfig,
  loadLogLevel,
  resolveConfig,
  type HandlerConfig,
  type LogLevel,
} from './config.js';
export {
  AppError,
  EndpointExistsError,
  RequestValidationError,
  type ValidationMessage,
} from './errors.js';
export { default as logger } from './logger.js';

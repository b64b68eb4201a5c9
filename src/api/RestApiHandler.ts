import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import cors from 'cors';
import { resolveConfig, type HandlerConfig } from '../config.js';
import type { Connection } from '../connection/types.js';
import { EndpointExistsError, RequestValidationError } from '../errors.js';
import logger from '../logger.js';
import {
  allowedMethods,
  type Resource,
  type ResourceHandler,
  type ResourceRequest,
} from './resource.js';

const NOT_FOUND_MESSAGE = 'The requested URL was not found on the server.';
const METHOD_NOT_ALLOWED_MESSAGE = 'The method is not allowed for the requested URL.';

interface HttpLikeError {
  status: number;
  type?: string;
}

function isHttpLikeError(error: unknown): error is HttpLikeError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Hosts REST endpoints for a single shared connection.
 *
 * Endpoints are added with `addEndpoint`; each resource handler receives the
 * connection explicitly on every call. The Express application is exposed as
 * `app` so the embedding program decides how it is served.
 *
 * ```ts
 * const handler = new RestApiHandler(conn);
 * new Builtins(handler);
 * http.createServer(handler.app).listen(8080);
 * ```
 */
export class RestApiHandler<C extends Connection = Connection> {
  public readonly app: express.Express;
  public readonly conn: C;
  public readonly config: HandlerConfig;

  private readonly router: Router;
  private readonly endpoints = new Map<string, Resource<C>>();

  constructor(conn: C, overrides: Partial<HandlerConfig> = {}) {
    this.conn = conn;
    this.config = resolveConfig(overrides);
    logger.level = this.config.logLevel;
    this.app = express();
    this.router = express.Router();

    this.setupMiddleware();
    this.app.use(this.config.basePath || '/', this.router);
    this.setupFallbacks();
  }

  /**
   * Register a resource under a path, relative to the configured base path
   */
  addEndpoint(path: string, resource: Resource<C>): this {
    if (this.endpoints.has(path)) {
      throw new EndpointExistsError(path);
    }
    this.endpoints.set(path, resource);

    const methods = allowedMethods(resource);
    this.router.all(path, (req: Request, res: Response, next: NextFunction) => {
      const method = this.resolveMethod(req.method, resource);

      if (!method) {
        res
          .status(405)
          .set('Allow', methods.map((name) => name.toUpperCase()).join(', '))
          .json({ message: METHOD_NOT_ALLOWED_MESSAGE });
        return;
      }

      this.dispatch(method, req, res).catch(next);
    });

    logger.debug('Registered endpoint', {
      path: `${this.config.basePath}${path}`,
      methods,
    });

    return this;
  }

  /** Paths registered so far, in registration order. */
  listEndpoints(): string[] {
    return Array.from(this.endpoints.keys());
  }

  private resolveMethod(httpMethod: string, resource: Resource<C>): ResourceHandler<C> | undefined {
    const name = httpMethod.toLowerCase();
    if (name === 'head') {
      return resource.get;
    }

    const method = allowedMethods(resource).find((candidate) => candidate === name);
    return method ? resource[method] : undefined;
  }

  private async dispatch(handler: ResourceHandler<C>, req: Request, res: Response): Promise<void> {
    if (req.body !== undefined && !isRecord(req.body)) {
      throw new RequestValidationError('Request body must be a JSON object');
    }

    const request: ResourceRequest = {
      method: req.method,
      path: req.path,
      args: {
        ...(isRecord(req.query) ? req.query : {}),
        ...(isRecord(req.body) ? req.body : {}),
      },
    };

    const result = await handler(this.conn, request);

    if (result.status >= 500) {
      logger.warn('Connection reported failure', {
        method: req.method,
        path: req.originalUrl,
        status: result.status,
        message: result.body.message,
      });
    }

    res.status(result.status).json(result.body);
  }

  private setupMiddleware(): void {
    if (this.config.corsOrigins.length > 0) {
      const origins = this.config.corsOrigins;
      this.app.use(
        cors({
          origin: origins.includes('*') ? '*' : origins,
          methods: ['GET', 'POST'],
        }),
      );
    }

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();
      res.on('finish', () => {
        logger.http('Request completed', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - startTime,
        });
      });
      next();
    });

    this.app.use(express.json({ limit: this.config.bodyLimit }));
    this.app.use(express.urlencoded({ extended: true, limit: this.config.bodyLimit }));
  }

  private setupFallbacks(): void {
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ message: NOT_FOUND_MESSAGE });
    });

    // Express recognises error middleware by its four parameters
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof RequestValidationError) {
        res.status(400).json({ message: error.validationMessage });
        return;
      }

      if (isHttpLikeError(error) && error.type === 'entity.parse.failed') {
        res.status(400).json({ message: 'Failed to decode JSON object' });
        return;
      }

      if (isHttpLikeError(error) && error.type === 'entity.too.large') {
        res.status(413).json({ message: 'Request entity too large' });
        return;
      }

      logger.error('API Error', {
        method: req.method,
        url: req.originalUrl,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });

      res.status(500).json({ message: 'Internal server error' });
    });
  }
}

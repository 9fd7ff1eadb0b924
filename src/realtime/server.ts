/**
 * Express-based HTTP server exposing the realtime database REST API:
 * `/{path}.json` for data, `/__fm_rules__/{path}.json` for index rules.
 */

import express, { NextFunction, Request, Response } from 'express';
import { DEFAULT_SERVER, HttpServerConfig } from '../config';
import { getLogger } from '../logger';
import { RealtimeDatabase } from './database';
import {
  RealtimeCall,
  RealtimeReply,
  ReplyCallback,
  toErrorReply,
} from './handlers/call';
import { handleDeleteData } from './handlers/deleteData';
import { handleGetData } from './handlers/getData';
import { handlePatchData } from './handlers/patchData';
import { handlePostData } from './handlers/postData';
import { handlePutData } from './handlers/putData';
import {
  handleDeleteRules,
  handleGetRules,
  handlePutRules,
} from './handlers/rules';
import { toRulesPath } from './path';

export type RealtimeServerConfig = Pick<HttpServerConfig, 'port' | 'host'> &
  Partial<Pick<HttpServerConfig, 'bodyLimit'>>;

function stripJsonSuffix(path: string): string {
  return path.endsWith('.json') ? path.slice(0, -'.json'.length) : path;
}

function singleParams(query: Request['query']): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [name, value] of Object.entries(query)) {
    if (typeof value === 'string') {
      params[name] = value;
    }
  }
  return params;
}

const METHOD_NOT_ALLOWED: RealtimeReply = {
  status: 405,
  value: { error: { message: 'Method not allowed', code: 'METHOD_NOT_ALLOWED' } },
};

export class RealtimeServer {
  readonly database: RealtimeDatabase;
  readonly logger = getLogger();
  private readonly config: RealtimeServerConfig;
  private server?: ReturnType<express.Application['listen']>;
  private readonly app = express();

  constructor(database: RealtimeDatabase, config: RealtimeServerConfig) {
    this.database = database;
    this.config = config;
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.disable('x-powered-by');
    // Bodies are JSON whatever their content type
    this.app.use(
      express.text({
        type: () => true,
        limit: this.config.bodyLimit ?? DEFAULT_SERVER.bodyLimit,
      }),
    );

    this.app.use((req: Request, res: Response) => {
      void this.dispatch(req, res);
    });

    this.app.use(
      (err: Error, _req: Request, res: Response, _next: NextFunction) => {
        const status =
          'status' in err && typeof err.status === 'number' ? err.status : 500;
        this.logger.error('error', `Unhandled error: ${err.message}`);
        const code = status === 413 ? 'PAYLOAD_TOO_LARGE' : 'INTERNAL';
        res.status(status).json({ error: { message: err.message, code } });
      },
    );
  }

  private toCall(req: Request): RealtimeCall {
    return {
      path: stripJsonSuffix(req.path),
      params: singleParams(req.query),
      body: typeof req.body === 'string' ? req.body : '',
    };
  }

  private async dispatch(req: Request, res: Response): Promise<void> {
    const call = this.toCall(req);
    const callback: ReplyCallback = (error, reply) => {
      this.send(res, call, error, reply);
    };
    this.logger.log('http', `${req.method} ${req.originalUrl}`);

    let rulesPath: string | undefined;
    try {
      rulesPath = toRulesPath(call.path);
    } catch (error: unknown) {
      callback(error);
      return;
    }

    if (rulesPath !== undefined) {
      switch (req.method) {
        case 'GET':
          return handleGetRules(this, rulesPath, callback);
        case 'PUT':
          return handlePutRules(this, rulesPath, call, callback);
        case 'DELETE':
          return handleDeleteRules(this, rulesPath, callback);
        default:
          callback(null, METHOD_NOT_ALLOWED);
          return;
      }
    }

    switch (req.method) {
      case 'GET':
        return handleGetData(this, call, callback);
      case 'PUT':
        return handlePutData(this, call, callback);
      case 'PATCH':
        return handlePatchData(this, call, callback);
      case 'POST':
        return handlePostData(this, call, callback);
      case 'DELETE':
        return handleDeleteData(this, call, callback);
      default:
        callback(null, METHOD_NOT_ALLOWED);
    }
  }

  private send(
    res: Response,
    call: RealtimeCall,
    error: unknown,
    reply: RealtimeReply | undefined,
  ): void {
    let answer: RealtimeReply;
    if (error) {
      answer = toErrorReply(error);
      if (answer.status >= 500) {
        this.logger.error(
          'error',
          `Error handling ${call.path}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    } else {
      answer = reply ?? { status: 204 };
    }

    const print = call.params.print;
    if ((print === 'silent' && answer.status < 300) || answer.status === 204) {
      res.status(204).end();
      return;
    }
    const indent = print === 'pretty' ? 2 : undefined;
    res
      .status(answer.status)
      .type('application/json')
      .send(JSON.stringify(answer.value ?? null, null, indent));
  }

  /**
   * Port the server listens on (the actual one when configured with port 0)
   */
  getPort(): number {
    const address = this.server?.address();
    return address && typeof address === 'object'
      ? address.port
      : this.config.port;
  }

  getUrl(): string {
    return `http://${this.config.host}:${this.getPort()}`;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info(
          'server',
          `Realtime database REST server running on ${this.getUrl()}`,
        );
        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      server.close(() => {
        this.logger.info('server', 'Realtime database REST server stopped');
        this.server = undefined;
        resolve();
      });
      server.closeAllConnections();
    });
  }
}

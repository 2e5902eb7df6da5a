/**
 * HTTP Server
 *
 * Wraps node:http around the dispatcher. This is the only layer that
 * touches sockets: it splits the request target into path and query
 * string, dispatches, and writes the rendered JSON back.
 */

import {
  createServer,
  type IncomingMessage,
  type Server as NodeServer,
  type ServerResponse,
} from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Dispatcher } from '../api/dispatcher.ts';
import {
  apiError,
  HttpStatus,
  jsonResponse,
  renderResponse,
  type DispatchRequest,
  type JsonResponse,
} from '../api/response.ts';
import { ErrorCodes, toError } from '../errors/errors.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

export interface ServerOptions {
  port?: number;
  hostname?: string;
  logger?: Logger;
  onListen?: (addr: AddressInfo) => void;
}

/**
 * Split a request target into path and raw query string
 * e.g., '/users/42?verbose=true' -> { path: '/users/42', queryString: 'verbose=true' }
 */
export function parseRequestTarget(target: string): Pick<DispatchRequest, 'path' | 'queryString'> {
  const index = target.indexOf('?');
  if (index === -1) {
    return { path: target, queryString: '' };
  }
  return { path: target.slice(0, index), queryString: target.slice(index + 1) };
}

/**
 * Build a dispatch request from what node:http hands us
 */
export function toDispatchRequest(method: string | undefined, target: string | undefined): DispatchRequest {
  return {
    method: method ?? 'GET',
    ...parseRequestTarget(target ?? '/'),
  };
}

/**
 * HTTP server for a dispatcher
 */
export class Server {
  private server?: NodeServer;
  private logger: Logger;
  private options: Required<Pick<ServerOptions, 'port' | 'hostname'>> & ServerOptions;

  constructor(
    private readonly dispatcher: Dispatcher,
    options: ServerOptions = {}
  ) {
    this.logger = options.logger ?? getLogger();
    this.options = {
      ...options,
      port: options.port ?? 8080,
      hostname: options.hostname ?? '0.0.0.0',
    };
  }

  /**
   * Start listening; resolves with the bound address
   */
  listen(): Promise<AddressInfo> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.logger.error('Failed to write response', toError(error));
        res.destroy();
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.hostname, () => {
        server.off('error', reject);
        const addr = server.address();
        if (addr === null || typeof addr === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }
        this.options.onListen?.(addr);
        resolve(addr);
      });
    });
  }

  /**
   * Stop accepting connections
   */
  close(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();

    this.server = undefined;
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const request = toDispatchRequest(req.method, req.url);

    let response: JsonResponse;
    try {
      response = await this.dispatcher.dispatch(request);
    } catch (error) {
      this.logger.error('Dispatch failed', toError(error), {
        method: request.method,
        path: request.path,
      });
      response = jsonResponse(
        HttpStatus.INTERNAL_SERVER_ERROR,
        apiError(ErrorCodes.HANDLER_FAILED, 'Internal Server Error')
      );
    }

    const rendered = renderResponse(response);
    res.writeHead(rendered.status, {
      ...rendered.headers,
      'Content-Length': Buffer.byteLength(rendered.text).toString(),
    });
    res.end(rendered.text);
  }
}

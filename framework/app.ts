/**
 * Application
 *
 * Ties configuration, logging, routes, dispatcher and HTTP server
 * together. Routes are registered up front; the route table is
 * frozen the first time the application dispatches or listens.
 */

import type { AddressInfo } from 'node:net';
import { Dispatcher } from './api/dispatcher.ts';
import type { DispatchRequest, JsonResponse } from './api/response.ts';
import { Config } from './config/config.ts';
import { Server, type ServerOptions } from './http/server.ts';
import type { RouteGroup } from './router/group.ts';
import { Router, type RouteTable } from './router/router.ts';
import { Logger } from './telemetry/logger.ts';

export interface ApplicationOptions {
  config?: Config;
  logger?: Logger;
}

export class Application {
  private config: Config;
  private logger: Logger;
  private router: Router;
  private dispatcher?: Dispatcher;
  private server?: Server;

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config ?? new Config();
    this.logger =
      options.logger ??
      new Logger({ level: this.config.logLevel, format: this.config.logFormat });
    this.router = new Router({ logger: this.logger });
  }

  /**
   * Register routes under a base path
   */
  controller(basePath: string, callback: (group: RouteGroup) => void): this {
    this.assertNotStarted();
    this.router.group(basePath, callback);
    return this;
  }

  /**
   * Direct access to the route builder
   */
  routes(callback: (router: Router) => void): this {
    this.assertNotStarted();
    callback(this.router);
    return this;
  }

  /**
   * Dispatch one request in-process
   */
  dispatch(request: DispatchRequest): Promise<JsonResponse> {
    return this.getDispatcher().dispatch(request);
  }

  /**
   * Start the HTTP server
   */
  async listen(options: Partial<ServerOptions> = {}): Promise<AddressInfo> {
    const server = new Server(this.getDispatcher(), {
      port: this.config.getNumber('port', 8080),
      hostname: this.config.getString('host', '0.0.0.0'),
      logger: this.logger,
      ...options,
    });
    this.server = server;

    const addr = await server.listen();
    this.logger.info('Server listening', { host: addr.address, port: addr.port });
    return addr;
  }

  async stop(): Promise<void> {
    await this.server?.close();
    this.server = undefined;
  }

  getConfig(): Config {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  getRouteTable(): RouteTable {
    return this.getDispatcher().table;
  }

  private getDispatcher(): Dispatcher {
    if (!this.dispatcher) {
      const table = this.router.build();
      this.logger.debug('Route table built', { routes: table.size });
      this.dispatcher = new Dispatcher(table, { logger: this.logger });
    }
    return this.dispatcher;
  }

  private assertNotStarted(): void {
    if (this.dispatcher) {
      throw new Error('Routes cannot be added after the application has started');
    }
  }
}

export function createApp(options?: ApplicationOptions): Application {
  return new Application(options);
}

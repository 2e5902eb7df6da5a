/**
 * Route Table
 *
 * Routes are registered once at startup on a `Router`, then frozen into a
 * `RouteTable` by `build()`. Lookup is a linear scan in registration order;
 * the first template that fits the path wins.
 */

import type { BoundValue, ParamBinding } from '../binding/params.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { RouteGroup } from './group.ts';
import {
  buildPath,
  joinTemplate,
  matchTemplate,
  parsePathParams,
  templatesOverlap,
  type PatternParams,
} from './patterns.ts';

/**
 * Handler invoked with the bound arguments, in declaration order
 *
 * Declared as a method so handlers may name the narrower types their
 * bindings produce, e.g. `(id: number) => ...` for an `int` binding.
 */
export type RouteHandler = {
  bivarianceHack(...args: BoundValue[]): unknown;
}['bivarianceHack'];

export interface RouteDefinition {
  readonly template: string;
  readonly handler: RouteHandler;
  readonly bindings: readonly ParamBinding[];
  readonly name?: string;
}

export interface RouteMatch {
  route: RouteDefinition;
  /** Request path segments, aligned with the template */
  segments: string[];
}

export interface RouteOptions {
  name?: string;
}

export interface RouterOptions {
  logger?: Logger;
}

/**
 * Collects route registrations
 */
export class Router {
  private routes: RouteDefinition[] = [];
  private logger: Logger;

  constructor(options: RouterOptions = {}) {
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Register a handler under `basePath` + `relativePath`
   */
  register(
    basePath: string,
    handler: RouteHandler,
    relativePath = '',
    bindings: readonly ParamBinding[] = [],
    options: RouteOptions = {}
  ): this {
    const route: RouteDefinition = Object.freeze({
      template: joinTemplate(basePath, relativePath),
      handler,
      bindings: Object.freeze([...bindings]),
      name: options.name,
    });

    this.routes.push(route);
    return this;
  }

  /**
   * Register several routes sharing a base path
   */
  group(basePath: string, callback: (group: RouteGroup) => void): this {
    callback(new RouteGroup(basePath, this));
    return this;
  }

  /**
   * Freeze the registrations into a lookup table
   */
  build(): RouteTable {
    const routes = [...this.routes];
    this.warnOnOverlaps(routes);
    return new RouteTable(routes);
  }

  /**
   * Overlapping templates are resolved by registration order, which is
   * easy to get wrong, so say so at startup.
   */
  private warnOnOverlaps(routes: RouteDefinition[]): void {
    for (let i = 0; i < routes.length; i++) {
      for (let j = i + 1; j < routes.length; j++) {
        if (templatesOverlap(routes[i].template, routes[j].template)) {
          this.logger.warn('Overlapping route templates; the first registered wins', {
            winner: routes[i].template,
            shadowed: routes[j].template,
          });
        }
      }
    }
  }
}

/**
 * Immutable set of routes
 */
export class RouteTable {
  private readonly routes: readonly RouteDefinition[];
  private readonly namedRoutes: ReadonlyMap<string, RouteDefinition>;

  constructor(routes: readonly RouteDefinition[]) {
    this.routes = Object.freeze([...routes]);

    const named = new Map<string, RouteDefinition>();
    for (const route of this.routes) {
      if (route.name && !named.has(route.name)) {
        named.set(route.name, route);
      }
    }
    this.namedRoutes = named;
  }

  get size(): number {
    return this.routes.length;
  }

  /**
   * Find the first route whose template fits the path
   */
  match(path: string): RouteMatch | null {
    for (const route of this.routes) {
      const segments = matchTemplate(route.template, path);
      if (segments) {
        return { route, segments };
      }
    }

    return null;
  }

  /**
   * Generate a path for a named route
   */
  url(name: string, params: PatternParams = {}, query?: Record<string, string>): string | null {
    const route = this.namedRoutes.get(name);
    if (!route) return null;
    return buildPath(route.template, params, query);
  }

  /**
   * Placeholder names of a named route
   */
  paramsOf(name: string): string[] | null {
    const route = this.namedRoutes.get(name);
    return route ? parsePathParams(route.template) : null;
  }

  /**
   * Get all registered routes (for debugging/admin)
   */
  getRoutes(): RouteDefinition[] {
    return [...this.routes];
  }
}

/**
 * Route Group
 *
 * Controller-style registration: every route in the group shares a base
 * path, and only read (GET) routes exist.
 */

import type { ParamBinding } from '../binding/params.ts';
import { joinTemplate } from './patterns.ts';
import type { RouteHandler, RouteOptions, Router } from './router.ts';

/**
 * Route group for organizing related routes
 */
export class RouteGroup {
  constructor(
    private readonly basePath: string,
    private readonly router: Router
  ) {}

  /**
   * Register a GET route relative to the group's base path
   */
  get(
    relativePath: string,
    handler: RouteHandler,
    bindings: readonly ParamBinding[] = [],
    options: RouteOptions = {}
  ): this {
    this.router.register(this.basePath, handler, relativePath, bindings, options);
    return this;
  }

  /**
   * Create a nested group
   */
  group(prefix: string, callback: (group: RouteGroup) => void): this {
    const nestedGroup = new RouteGroup(joinTemplate(this.basePath, prefix), this.router);
    callback(nestedGroup);
    return this;
  }
}

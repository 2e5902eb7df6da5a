/**
 * Health Routes
 */

import type { Application } from '../../framework/mod.ts';

export function registerHealthRoutes(app: Application): void {
  app.controller('health', (health) => {
    health.get('/', () => ({
      status: 'healthy',
      uptime: Math.round(process.uptime()),
    }));
  });
}

/**
 * Route Registration
 */

import type { Application } from '../../framework/mod.ts';
import { createSampleCatalog, type CourseCatalog } from '../catalog/course_catalog.ts';
import { registerCourseRoutes } from './courses.ts';
import { registerHealthRoutes } from './health.ts';

export function registerRoutes(app: Application, catalog: CourseCatalog = createSampleCatalog()): void {
  registerHealthRoutes(app);
  registerCourseRoutes(app, catalog);
}

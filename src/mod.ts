/**
 * Application Source
 *
 * Example course catalog served over the framework.
 */

export { registerRoutes } from './routes/mod.ts';
export { CourseCatalog, createSampleCatalog } from './catalog/course_catalog.ts';
export { Course, EvalItem, EvalType } from './models/course.ts';

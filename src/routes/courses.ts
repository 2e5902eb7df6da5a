/**
 * Course Routes
 */

import {
  inferJson,
  JsonValidator,
  pathParam,
  queryParam,
  type Application,
} from '../../framework/mod.ts';
import type { CourseCatalog } from '../catalog/course_catalog.ts';

export function registerCourseRoutes(app: Application, catalog: CourseCatalog): void {
  app.controller('courses', (courses) => {
    courses
      .get('/', () => catalog.list(), [], { name: 'courses.index' })
      .get('search', (q: string) => catalog.search(q), [queryParam('q', 'string')])
      .get('min-credits', (credits: number) => catalog.withMinCredits(credits), [
        queryParam('credits', 'int'),
      ])
      .get('(id)', (id: number) => catalog.find(id), [pathParam('id', 'int')], {
        name: 'courses.show',
      })
      .get(
        '(id)/evaluation',
        (id: number) => catalog.find(id)?.evaluation ?? [],
        [pathParam('id', 'int')]
      )
      .get(
        '(id)/validate',
        (id: number) => {
          const course = catalog.find(id);
          const issues = course ? JsonValidator.validate(inferJson(course)) : [];
          return {
            found: course !== null,
            valid: issues.length === 0,
            errors: issues.map((issue) => issue.message),
          };
        },
        [pathParam('id', 'int')]
      );
  });
}

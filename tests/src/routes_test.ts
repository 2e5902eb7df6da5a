/**
 * Course Route Tests
 */

import { expect, test } from 'vitest';
import { createApp, renderResponse, type Application } from '../../framework/mod.ts';
import { CourseCatalog, createSampleCatalog } from '../../src/catalog/course_catalog.ts';
import { Course, EvalItem, EvalType } from '../../src/models/course.ts';
import { registerRoutes } from '../../src/routes/mod.ts';
import { silentLogger } from '../framework/helpers.ts';

function createCourseApp(catalog?: CourseCatalog): Application {
  const app = createApp({ logger: silentLogger() });
  registerRoutes(app, catalog);
  return app;
}

async function fetchText(app: Application, path: string, queryString = '') {
  const rendered = renderResponse(await app.dispatch({ method: 'GET', path, queryString }));
  return { status: rendered.status, text: rendered.text };
}

test('Courses - show renders a course with its evaluation', async () => {
  expect(await fetchText(createCourseApp(), '/courses/2')).toEqual({
    status: 200,
    text: '{"id":2,"name":"Data Structures","credits":5,"evaluation":[{"name":"Final Exam","percentage":1,"mandatory":true,"type":"EXAM"}]}',
  });
});

test('Courses - unknown id renders null', async () => {
  expect(await fetchText(createCourseApp(), '/courses/99')).toEqual({ status: 200, text: 'null' });
});

test('Courses - non-numeric id is a bad request', async () => {
  expect((await fetchText(createCourseApp(), '/courses/abc')).status).toBe(400);
});

test('Courses - index lists every course', async () => {
  const { status, text } = await fetchText(createCourseApp(), '/courses');
  const parsed: unknown = JSON.parse(text);

  expect(status).toBe(200);
  expect(Array.isArray(parsed) ? parsed.length : -1).toBe(3);
});

test('Courses - search matches names case-insensitively', async () => {
  const { text } = await fetchText(createCourseApp(), '/courses/search', 'q=PROGRAMMING');
  expect(JSON.parse(text)).toEqual([
    expect.objectContaining({ id: 1 }),
    expect.objectContaining({ id: 3 }),
  ]);
});

test('Courses - search without a term is a bad request', async () => {
  expect(await fetchText(createCourseApp(), '/courses/search')).toEqual({
    status: 400,
    text: `{"error":{"code":"MISSING_QUERY_PARAMETER","message":"Query parameter 'q' is required"}}`,
  });
});

test('Courses - min-credits filters by credits', async () => {
  const { text } = await fetchText(createCourseApp(), '/courses/min-credits', 'credits=5');
  expect(JSON.parse(text)).toEqual([
    expect.objectContaining({ id: 1 }),
    expect.objectContaining({ id: 2 }),
  ]);
});

test('Courses - evaluation of a course', async () => {
  expect(await fetchText(createCourseApp(), '/courses/3/evaluation')).toEqual({
    status: 200,
    text: '[{"name":"Participation","percentage":1,"mandatory":false,"type":null}]',
  });
});

test('Courses - validate reports a clean course', async () => {
  expect(await fetchText(createCourseApp(), '/courses/1/validate')).toEqual({
    status: 200,
    text: '{"found":true,"valid":true,"errors":[]}',
  });
});

test('Courses - validate reports empty keys', async () => {
  class BrokenItem extends EvalItem {
    describeJson(): Iterable<readonly [string, unknown]> {
      return [
        ['', this.name],
        ['percentage', this.percentage],
      ];
    }
  }
  const catalog = new CourseCatalog([
    new Course(5, 'Broken', 1, [new BrokenItem('Quiz', 1, true, EvalType.TEST)]),
  ]);

  expect(await fetchText(createCourseApp(catalog), '/courses/5/validate')).toEqual({
    status: 200,
    text: '{"found":true,"valid":false,"errors":["Empty key found at $.evaluation[0]"]}',
  });
});

test('Courses - named routes generate paths', () => {
  const table = createCourseApp().getRouteTable();
  expect(table.url('courses.show', { id: '2' })).toBe('/courses/2');
  expect(table.url('courses.index')).toBe('/courses');
});

test('Health - reports status', async () => {
  const { status, text } = await fetchText(createCourseApp(), '/health');
  expect(status).toBe(200);
  expect(JSON.parse(text)).toEqual(expect.objectContaining({ status: 'healthy' }));
});

test('CourseCatalog - totals evaluation weights', () => {
  const course = createSampleCatalog().find(1);
  expect(course?.totalWeight).toBeCloseTo(1);
});

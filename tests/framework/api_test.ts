/**
 * Dispatcher and Response Tests
 */

import { expect, test } from 'vitest';
import { Dispatcher } from '../../framework/api/dispatcher.ts';
import {
  apiError,
  errorResponse,
  jsonResponse,
  renderResponse,
  type DispatchRequest,
} from '../../framework/api/response.ts';
import { pathParam, queryParam } from '../../framework/binding/params.ts';
import {
  HandlerInvocationError,
  MethodNotSupportedError,
  RouteNotFoundError,
} from '../../framework/errors/errors.ts';
import { JsonNumber, JsonString } from '../../framework/json/value.ts';
import { Router } from '../../framework/router/router.ts';
import { captureLogger } from './helpers.ts';

class Opaque {}

function createDispatcher() {
  const { logger, entries } = captureLogger('debug');
  const table = new Router({ logger })
    .group('test', (group) => {
      group
        .get('hello', () => 'Hello')
        .get('user/(id)', (id: number) => ({ id, name: `User${id}` }), [pathParam('id', 'int')])
        .get('search', (q: string) => [q, [...q].reverse().join('')], [queryParam('q', 'string')])
        .get(
          'range/(from)',
          (from: bigint, to: bigint) => ({ from, to }),
          [pathParam('from', 'long'), queryParam('to', 'long')]
        )
        .get('async', async () => ({ ok: true }))
        .get('boom', () => {
          throw new Error('kaboom');
        })
        .get('opaque', () => new Opaque())
        .get('nothing', () => undefined);
    })
    .build();

  return { dispatcher: new Dispatcher(table, { logger }), entries };
}

function get(target: string): DispatchRequest {
  const index = target.indexOf('?');
  return index === -1
    ? { method: 'GET', path: target, queryString: '' }
    : { method: 'GET', path: target.slice(0, index), queryString: target.slice(index + 1) };
}

async function dispatchText(target: string): Promise<{ status: number; text: string }> {
  const { dispatcher } = createDispatcher();
  const rendered = renderResponse(await dispatcher.dispatch(get(target)));
  return { status: rendered.status, text: rendered.text };
}

test('Dispatcher - binds a path parameter and renders the result', async () => {
  expect(await dispatchText('/test/user/42')).toEqual({
    status: 200,
    text: '{"id":42,"name":"User42"}',
  });
});

test('Dispatcher - renders a string result', async () => {
  expect(await dispatchText('/test/hello')).toEqual({ status: 200, text: '"Hello"' });
});

test('Dispatcher - binds a query parameter', async () => {
  expect(await dispatchText('/test/search?q=abc')).toEqual({
    status: 200,
    text: '["abc","cba"]',
  });
});

test('Dispatcher - binds long parameters from path and query', async () => {
  expect(await dispatchText('/test/range/9007199254740993?to=9223372036854775807')).toEqual({
    status: 200,
    text: '{"from":9007199254740993,"to":9223372036854775807}',
  });
});

test('Dispatcher - awaits asynchronous handlers', async () => {
  expect(await dispatchText('/test/async')).toEqual({ status: 200, text: '{"ok":true}' });
});

test('Dispatcher - undefined result renders as null', async () => {
  expect(await dispatchText('/test/nothing')).toEqual({ status: 200, text: 'null' });
});

test('Dispatcher - sets the JSON content type', async () => {
  const { dispatcher } = createDispatcher();
  const response = await dispatcher.dispatch(get('/test/hello'));
  expect(response.headers).toEqual({ 'Content-Type': 'application/json' });
});

test('Dispatcher - non-GET methods get 405', async () => {
  const { dispatcher } = createDispatcher();
  const response = await dispatcher.dispatch({
    method: 'POST',
    path: '/test/hello',
    queryString: '',
  });

  expect(response.statusCode).toBe(405);
  expect(response.body.toJsonString()).toBe(
    '{"error":{"code":"METHOD_NOT_SUPPORTED","message":"Method POST is not supported"}}'
  );
});

test('Dispatcher - unknown paths get 404', async () => {
  expect(await dispatchText('/nope')).toEqual({
    status: 404,
    text: '{"error":{"code":"ROUTE_NOT_FOUND","message":"No route matches /nope"}}',
  });
});

test('Dispatcher - trailing slash does not match', async () => {
  expect((await dispatchText('/test/hello/')).status).toBe(404);
});

test('Dispatcher - empty placeholder segment does not match', async () => {
  expect((await dispatchText('/test/user/')).status).toBe(404);
});

test('Dispatcher - malformed path parameter gets 400', async () => {
  expect(await dispatchText('/test/user/abc')).toEqual({
    status: 400,
    text: `{"error":{"code":"INVALID_PARAMETER_FORMAT","message":"Invalid int value for parameter 'id'"}}`,
  });
});

test('Dispatcher - missing query parameter gets 400', async () => {
  expect(await dispatchText('/test/search')).toEqual({
    status: 400,
    text: `{"error":{"code":"MISSING_QUERY_PARAMETER","message":"Query parameter 'q' is required"}}`,
  });
});

test('Dispatcher - throwing handler gets 500 with a generic message', async () => {
  expect(await dispatchText('/test/boom')).toEqual({
    status: 500,
    text: '{"error":{"code":"HANDLER_FAILED","message":"Internal Server Error"}}',
  });
});

test('Dispatcher - unconvertible result gets 500', async () => {
  expect(await dispatchText('/test/opaque')).toEqual({
    status: 500,
    text: '{"error":{"code":"UNSUPPORTED_TYPE","message":"Internal Server Error"}}',
  });
});

test('Dispatcher - handler failures are logged with their cause', async () => {
  const { dispatcher, entries } = createDispatcher();
  await dispatcher.dispatch(get('/test/boom'));

  const failure = entries.find((entry) => entry.level === 'error');
  expect(failure?.message).toBe('Request failed');
  expect(failure?.error?.message).toBe('kaboom');
  expect(failure?.context?.code).toBe('HANDLER_FAILED');
  expect(failure?.context?.path).toBe('/test/boom');
});

test('Dispatcher - client errors are logged as warnings', async () => {
  const { dispatcher, entries } = createDispatcher();
  await dispatcher.dispatch(get('/test/user/abc'));

  const warnings = entries.filter((entry) => entry.level === 'warn');
  expect(warnings.map((entry) => entry.message)).toEqual([
    "Invalid int value for parameter 'id'",
  ]);
  expect(warnings[0].context?.status).toBe(400);
});

test('Dispatcher - only the configured method is accepted', async () => {
  const { logger } = captureLogger('error');
  const table = new Router({ logger }).register('items', () => [], '/').build();
  const dispatcher = new Dispatcher(table, { logger, method: 'HEAD' });

  expect((await dispatcher.dispatch({ method: 'HEAD', path: '/items', queryString: '' })).statusCode).toBe(200);
  expect((await dispatcher.dispatch(get('/items'))).statusCode).toBe(405);
});

test('Response - apiError builds the error envelope', () => {
  expect(apiError('SOME_CODE', 'Something "quoted"').toJsonString()).toBe(
    '{"error":{"code":"SOME_CODE","message":"Something \\"quoted\\""}}'
  );
});

test('Response - errorResponse keeps client error messages', () => {
  const response = errorResponse(new RouteNotFoundError('/x'));
  expect(response.statusCode).toBe(404);
  expect(response.body.toJsonString()).toBe(
    '{"error":{"code":"ROUTE_NOT_FOUND","message":"No route matches /x"}}'
  );
});

test('Response - errorResponse hides server error details', () => {
  const response = errorResponse(new HandlerInvocationError('a/b', new Error('secret')));
  expect(response.statusCode).toBe(500);
  expect(response.body.toJsonString()).toBe(
    '{"error":{"code":"HANDLER_FAILED","message":"Internal Server Error"}}'
  );
});

test('Response - errorResponse uses the error status', () => {
  expect(errorResponse(new MethodNotSupportedError('PUT')).statusCode).toBe(405);
});

test('Response - renderResponse renders compact text', () => {
  const rendered = renderResponse(jsonResponse(200, new JsonNumber(7)));
  expect(rendered).toEqual({
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    text: '7',
  });
});

test('Response - renderResponse copies headers', () => {
  const response = jsonResponse(200, new JsonString('x'));
  const rendered = renderResponse(response);
  rendered.headers['X-Extra'] = '1';
  expect(response.headers).toEqual({ 'Content-Type': 'application/json' });
});

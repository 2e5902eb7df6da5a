/**
 * HTTP Tests
 */

import { expect, test } from 'vitest';
import { createApp } from '../../framework/app.ts';
import { pathParam } from '../../framework/binding/params.ts';
import { parseRequestTarget, toDispatchRequest } from '../../framework/http/server.ts';
import { silentLogger } from './helpers.ts';

test('parseRequestTarget - path only', () => {
  expect(parseRequestTarget('/test/user/42')).toEqual({ path: '/test/user/42', queryString: '' });
});

test('parseRequestTarget - splits on the first question mark', () => {
  expect(parseRequestTarget('/search?q=a?b&n=1')).toEqual({
    path: '/search',
    queryString: 'q=a?b&n=1',
  });
});

test('parseRequestTarget - empty query string', () => {
  expect(parseRequestTarget('/search?')).toEqual({ path: '/search', queryString: '' });
});

test('toDispatchRequest - fills in missing method and target', () => {
  expect(toDispatchRequest(undefined, undefined)).toEqual({
    method: 'GET',
    path: '/',
    queryString: '',
  });
  expect(toDispatchRequest('DELETE', '/items/1')).toEqual({
    method: 'DELETE',
    path: '/items/1',
    queryString: '',
  });
});

test('Server - serves dispatch results over HTTP', async () => {
  const app = createApp({ logger: silentLogger() }).controller('test', (group) => {
    group.get('user/(id)', (id: number) => ({ id }), [pathParam('id', 'int')]);
  });
  const addr = await app.listen({ port: 0, hostname: '127.0.0.1' });
  const base = `http://127.0.0.1:${addr.port}`;

  try {
    const ok = await fetch(`${base}/test/user/42?trace=a?b`);
    const okText = await ok.text();
    expect(ok.status).toBe(200);
    expect(okText).toBe('{"id":42}');
    expect(ok.headers.get('content-type')).toBe('application/json');
    expect(ok.headers.get('content-length')).toBe(String(okText.length));

    const bad = await fetch(`${base}/test/user/abc`);
    expect(bad.status).toBe(400);
    expect(bad.headers.get('content-type')).toBe('application/json');
    expect(await bad.text()).toBe(
      `{"error":{"code":"INVALID_PARAMETER_FORMAT","message":"Invalid int value for parameter 'id'"}}`
    );

    const post = await fetch(`${base}/test/user/42`, { method: 'POST' });
    expect(post.status).toBe(405);
    expect(await post.text()).toBe(
      '{"error":{"code":"METHOD_NOT_SUPPORTED","message":"Method POST is not supported"}}'
    );
  } finally {
    await app.stop();
  }
});

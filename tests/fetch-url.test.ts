import assert from 'node:assert/strict';
import { after, before, describe, it } from 'node:test';

import { MockAgent } from 'undici';

import { fetchUrlTool, parseMethod } from '../src/tools/fetch-url.js';
import { createDefaultRegistry, type ToolContext } from '../src/tools.js';

import { ScriptedConfirm } from './helpers.js';

const ORIGIN = 'http://example.test';

let mock: MockAgent;
let ctx: ToolContext;

before(() => {
  mock = new MockAgent();
  mock.disableNetConnect();
  ctx = { root: process.cwd(), confirm: new ScriptedConfirm(), dispatcher: mock };
});

after(async () => {
  await mock.close();
});

describe('fetch_url', () => {
  it('returns status, headers and body', async () => {
    mock
      .get(ORIGIN)
      .intercept({ path: '/hello', method: 'GET' })
      .reply(200, 'hi there', { headers: { 'content-type': 'text/plain' } });
    const r = await fetchUrlTool(ctx, { url: `${ORIGIN}/hello` });
    assert.equal(r.url, `${ORIGIN}/hello`);
    assert.equal(r.final_url, `${ORIGIN}/hello`);
    assert.equal(r.status, 200);
    assert.equal(r.truncated, false);
    assert.equal(r.text, 'hi there');
    assert.ok(r.headers && typeof r.headers === 'object' && !Array.isArray(r.headers));
    assert.equal(r.headers['content-type'], 'text/plain');
  });

  it('sends the body for POST and keeps non-2xx statuses as data', async () => {
    mock
      .get(ORIGIN)
      .intercept({ path: '/submit', method: 'POST', body: 'payload' })
      .reply(422, 'rejected');
    const r = await fetchUrlTool(ctx, {
      url: `${ORIGIN}/submit`,
      method: 'post',
      body: 'payload',
      headers: { 'x-test': 'yes', 'x-ignored': 5 },
    });
    assert.equal(r.status, 422);
    assert.equal(r.text, 'rejected');
  });

  it('truncates the body at max_bytes', async () => {
    mock.get(ORIGIN).intercept({ path: '/big', method: 'GET' }).reply(200, 'abcdef');
    const r = await fetchUrlTool(ctx, { url: `${ORIGIN}/big`, max_bytes: 3 });
    assert.equal(r.text, 'abc');
    assert.equal(r.truncated, true);
  });

  it('wraps transport failures in a network error', async () => {
    await assert.rejects(
      () => fetchUrlTool(ctx, { url: `${ORIGIN}/missing` }),
      /^NetworkError: Request failed for http:\/\/example\.test\/missing: /
    );
  });

  it('rejects other schemes before any request', async () => {
    const registry = createDefaultRegistry(ctx);
    const res = await registry.dispatch({
      id: 'c1',
      type: 'function',
      function: { name: 'fetch_url', arguments: '{"url":"file:///etc/passwd"}' },
    });
    assert.deepEqual(res.payload, { error: 'Only http/https URLs are allowed' });
  });

  it('rejects unsupported methods with a hint', async () => {
    const registry = createDefaultRegistry(ctx);
    const res = await registry.dispatch({
      id: 'c2',
      type: 'function',
      function: { name: 'fetch_url', arguments: `{"url":"${ORIGIN}/","method":"TRACE"}` },
    });
    assert.deepEqual(res.payload, {
      error: 'Unsupported method: TRACE (hint: use one of GET, POST, PUT, PATCH, DELETE, HEAD)',
    });
  });
});

describe('parseMethod', () => {
  it('defaults to GET and normalizes case', () => {
    assert.equal(parseMethod(undefined), 'GET');
    assert.equal(parseMethod('delete'), 'DELETE');
  });
});

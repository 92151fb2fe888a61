import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { parseJsonBodyWithLimit, parsePositiveInt } from '../lib/http-body-guard.js';

function createApp(maxBytes: number) {
  const app = new Hono();
  app.post('/parse', async (c) => {
    const parsed = await parseJsonBodyWithLimit(c, maxBytes);
    if (!parsed.ok) return parsed.response;
    return c.json({ data: parsed.data });
  });
  return app;
}

describe('parsePositiveInt', () => {
  it('returns parsed positive values', () => {
    expect(parsePositiveInt('42', 5)).toBe(42);
  });

  it('falls back for invalid, empty, and non-positive values', () => {
    expect(parsePositiveInt(undefined, 5)).toBe(5);
    expect(parsePositiveInt('abc', 5)).toBe(5);
    expect(parsePositiveInt('0', 5)).toBe(5);
    expect(parsePositiveInt('-2', 5)).toBe(5);
  });
});

describe('parseJsonBodyWithLimit', () => {
  it('returns the decoded body', async () => {
    const res = await createApp(200).request('http://test/parse', {
      method: 'POST',
      body: JSON.stringify({ markup: 'x' }),
      headers: { 'Content-Type': 'application/json' },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { markup: 'x' } });
  });

  it('treats an empty body as an empty object', async () => {
    const res = await createApp(200).request('http://test/parse', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
    });

    expect(await res.json()).toEqual({ data: {} });
  });

  it('blocks oversized bodies even when content-length is absent', async () => {
    const res = await createApp(20).request('http://test/parse', {
      method: 'POST',
      body: JSON.stringify({ payload: 'x'.repeat(200) }),
      headers: { 'Content-Type': 'application/json' },
    });

    expect(res.status).toBe(413);
  });

  it('blocks oversized streamed bodies', async () => {
    const encoder = new TextEncoder();
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('{"payload":"'));
        controller.enqueue(encoder.encode('x'.repeat(120)));
        controller.enqueue(encoder.encode('"}'));
        controller.close();
      },
    });
    const init: RequestInit & { duplex: 'half' } = {
      method: 'POST',
      body: stream,
      headers: { 'Content-Type': 'application/json' },
      duplex: 'half',
    };

    const res = await createApp(30).request(new Request('http://test/parse', init));

    expect(res.status).toBe(413);
  });

  it('returns 400 for invalid JSON', async () => {
    const res = await createApp(200).request('http://test/parse', {
      method: 'POST',
      body: '{invalid-json',
      headers: { 'Content-Type': 'application/json' },
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON' });
  });

  it('rejects non-JSON content types with 415', async () => {
    const res = await createApp(200).request('http://test/parse', {
      method: 'POST',
      body: 'name=alice',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });

    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({ error: 'Unsupported content type. Use application/json.' });
  });
});

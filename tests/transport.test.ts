import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { HttpTransport } from '../src/device/transport.js';
import { NetworkError } from '../src/errors.js';

type FetchInput = Parameters<typeof fetch>[0];
type FetchInit = Parameters<typeof fetch>[1];

function fakeFetch(respond: (url: string) => Response | Promise<Response>) {
  const requests: Array<{ url: string; init: FetchInit }> = [];
  const fetchImpl = async (input: FetchInput, init?: FetchInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    requests.push({ url, init });
    return respond(url);
  };
  return { requests, fetchImpl };
}

const endpoint = { host: '192.168.1.55' };

describe('HttpTransport', () => {
  it('returns the raw body of a successful request', async () => {
    const { requests, fetchImpl } = fakeFetch(() => new Response('{"vol":"20"}', { status: 200 }));
    const transport = new HttpTransport({ fetch: fetchImpl });

    const body = await transport.send(endpoint, 'getPlayerStatus');

    assert.equal(body, '{"vol":"20"}');
    assert.equal(requests.length, 1);
    assert.equal(requests[0].url, 'http://192.168.1.55/httpapi.asp?command=getPlayerStatus');
    assert.ok(requests[0].init?.signal instanceof AbortSignal);
  });

  it('treats a non-2xx status as a network error', async () => {
    const { fetchImpl } = fakeFetch(() => new Response('nope', { status: 500 }));
    const transport = new HttpTransport({ fetch: fetchImpl });

    await assert.rejects(transport.send(endpoint, 'reboot'), (error: unknown) => {
      assert.ok(error instanceof NetworkError);
      assert.equal(error.message, "Device '192.168.1.55' answered 'reboot' with HTTP 500");
      return true;
    });
  });

  it('wraps connection failures', async () => {
    const { fetchImpl } = fakeFetch(() => {
      throw new TypeError('fetch failed');
    });
    const transport = new HttpTransport({ fetch: fetchImpl });

    await assert.rejects(transport.send(endpoint, 'getStatus'), (error: unknown) => {
      assert.ok(error instanceof NetworkError);
      assert.equal(error.message, "Could not connect to '192.168.1.55': fetch failed");
      assert.ok(error.cause instanceof TypeError);
      return true;
    });
  });

  it('reports timeouts with the configured limit', async () => {
    const { fetchImpl } = fakeFetch(() => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    });
    const transport = new HttpTransport({ fetch: fetchImpl, timeoutMs: 5000 });

    await assert.rejects(transport.send({ host: '10.0.0.9', port: 8080 }, 'getStatus'), (error: unknown) => {
      assert.ok(error instanceof NetworkError);
      assert.equal(error.message, "Timed out after 5000ms waiting for '10.0.0.9:8080'");
      return true;
    });
  });
});

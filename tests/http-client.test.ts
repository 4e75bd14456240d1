import { describe, it, expect, vi } from 'vitest';
import { NetworkError } from '../src/errors.js';
import { createFetchHttpClient, type FetchLike } from '../src/http/http-client.js';

describe('createFetchHttpClient', () => {
  it('passes method, headers and body through and returns status and text', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => ({
      status: 201,
      text: async () => '{"ok":true}',
    }));
    const client = createFetchHttpClient(fetchImpl);

    const response = await client.send({
      method: 'PUT',
      url: 'https://orca.example.test/orcabase/change_instances/X/',
      headers: { Authorization: 'Token t' },
      body: '{"state":"COMPLETED"}',
    });

    expect(response).toEqual({ status: 201, body: '{"ok":true}' });
    expect(fetchImpl).toHaveBeenCalledWith('https://orca.example.test/orcabase/change_instances/X/', {
      method: 'PUT',
      headers: { Authorization: 'Token t' },
      body: '{"state":"COMPLETED"}',
    });
  });

  it('resolves non-success statuses instead of rejecting', async () => {
    const client = createFetchHttpClient(async () => ({ status: 500, text: async () => 'oops' }));

    await expect(
      client.send({ method: 'GET', url: 'https://orca.example.test/', headers: {} }),
    ).resolves.toEqual({ status: 500, body: 'oops' });
  });

  it('wraps transport rejections in NetworkError with the cause', async () => {
    const cause = new TypeError('fetch failed');
    const client = createFetchHttpClient(async () => {
      throw cause;
    });

    const error = await client
      .send({ method: 'GET', url: 'https://orca.example.test/x/', headers: {} })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({
      message: 'GET https://orca.example.test/x/ failed: fetch failed',
      cause,
    });
  });
});

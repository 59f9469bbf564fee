import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { cloudflare, CloudflareApiError } from '../../src/providers/cloudflare.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

function cfResponse<T>(result: T) {
  return {
    ok: true,
    status: 200,
    json: () => Promise.resolve({ success: true, errors: [], result }),
    text: () => Promise.resolve(''),
  };
}

function cfError(status: number, body: string) {
  return {
    ok: false,
    status,
    text: () => Promise.resolve(body),
  };
}

describe('cloudflare', () => {
  it('throws if apiToken is missing', () => {
    expect(() => cloudflare({ apiToken: '', zoneId: 'z1' })).toThrow(
      'apiToken is required'
    );
  });

  it('throws if zoneId is missing', () => {
    expect(() => cloudflare({ apiToken: 'tok', zoneId: '' })).toThrow(
      'zoneId is required'
    );
  });

  it('getRecords fetches records by type and name', async () => {
    mockFetch.mockResolvedValueOnce(
      cfResponse([
        {
          id: 'r1',
          type: 'A',
          name: 'cdn.example.com',
          content: '192.0.2.1',
          ttl: 60,
          proxied: false,
        },
      ])
    );

    const provider = cloudflare({ apiToken: 'tok', zoneId: 'z1' });
    const records = await provider.getRecords('cdn.example.com', 'A');

    expect(records).toEqual([
      {
        id: 'r1',
        type: 'A',
        name: 'cdn.example.com',
        value: '192.0.2.1',
        ttl: 60,
        proxied: false,
      },
    ]);

    const [, callInit] = mockFetch.mock.calls[0]!;
    const headers = callInit.headers as Headers;
    expect(headers.get('Authorization')).toBe('Bearer tok');
    expect(headers.get('Content-Type')).toBe('application/json');
    expect(callInit.signal).toBeInstanceOf(AbortSignal);
    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.cloudflare.com/client/v4/zones/z1/dns_records?type=A&name=cdn.example.com',
      expect.anything()
    );
  });

  it('createRecord posts the record with ttl and proxied', async () => {
    mockFetch.mockResolvedValueOnce(
      cfResponse({
        id: 'new-1',
        type: 'A',
        name: 'cdn.example.com',
        content: '198.51.100.1',
        ttl: 60,
        proxied: false,
      })
    );

    const provider = cloudflare({ apiToken: 'tok', zoneId: 'z1' });
    const result = await provider.createRecord({
      type: 'A',
      name: 'cdn.example.com',
      value: '198.51.100.1',
      ttl: 60,
      proxied: false,
    });

    expect(result).toEqual({
      id: 'new-1',
      type: 'A',
      name: 'cdn.example.com',
      value: '198.51.100.1',
      ttl: 60,
      proxied: false,
    });

    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.cloudflare.com/client/v4/zones/z1/dns_records',
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({
          type: 'A',
          name: 'cdn.example.com',
          content: '198.51.100.1',
          ttl: 60,
          proxied: false,
        }),
      })
    );
  });

  it('deleteRecord sends DELETE request', async () => {
    mockFetch.mockResolvedValueOnce(cfResponse({ id: 'r1' }));

    const provider = cloudflare({ apiToken: 'tok', zoneId: 'z1' });
    await provider.deleteRecord('r1');

    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.cloudflare.com/client/v4/zones/z1/dns_records/r1',
      expect.objectContaining({ method: 'DELETE' })
    );
  });

  it('throws on API error with the raw body', async () => {
    mockFetch.mockResolvedValueOnce(cfError(403, 'Forbidden'));

    const provider = cloudflare({ apiToken: 'bad-tok', zoneId: 'z1' });
    await expect(provider.getRecords('cdn.example.com', 'A')).rejects.toThrow(
      'Cloudflare API error 403: Forbidden'
    );
  });

  it('reports the Cloudflare error list of a failed request', async () => {
    mockFetch.mockResolvedValueOnce(
      cfError(
        400,
        JSON.stringify({
          success: false,
          errors: [{ code: 81057, message: 'Record already exists.' }],
          result: null,
        })
      )
    );

    const provider = cloudflare({ apiToken: 'tok', zoneId: 'z1' });
    const error = await provider
      .createRecord({
        type: 'A',
        name: 'cdn.example.com',
        value: '198.51.100.1',
        ttl: 60,
        proxied: false,
      })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CloudflareApiError);
    expect(error).toHaveProperty('message', 'Cloudflare API error 400: 81057: Record already exists.');
    expect(error).toHaveProperty('status', 400);
    expect(error).toHaveProperty('errors', [{ code: 81057, message: 'Record already exists.' }]);
  });

  it('throws on success: false with error details', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: () =>
        Promise.resolve({
          success: false,
          errors: [{ code: 1001, message: 'Invalid zone' }],
          result: null,
        }),
    });

    const provider = cloudflare({ apiToken: 'tok', zoneId: 'z1' });
    await expect(provider.getRecords('cdn.example.com', 'A')).rejects.toThrow(
      'Cloudflare API error: 1001: Invalid zone'
    );
  });

  it('throws on a body that is not JSON', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: () => Promise.reject(new SyntaxError('Unexpected token <')),
    });

    const provider = cloudflare({ apiToken: 'tok', zoneId: 'z1' });
    await expect(provider.getRecords('cdn.example.com', 'A')).rejects.toThrow(
      'Cloudflare API error: malformed response'
    );
  });

  it('throws when the record list is malformed', async () => {
    mockFetch.mockResolvedValueOnce(cfResponse({ records: [] }));

    const provider = cloudflare({ apiToken: 'tok', zoneId: 'z1' });
    await expect(provider.getRecords('cdn.example.com', 'A')).rejects.toThrow(
      'Cloudflare API error: malformed response'
    );
  });
});

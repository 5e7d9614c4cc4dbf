import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ErpClient } from '../services/erpClient.js';
import type { PayloadBatch } from '../types.js';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function batch(): PayloadBatch {
  return {
    id: 'b-1',
    sourceTable: 'staff',
    endpoint: '/v1/employees',
    method: 'PUT',
    index: 0,
    records: [
      { rowIndex: 0, data: { first_name: 'Carla', last_name: 'Dias' } },
      { rowIndex: 3, data: { first_name: 'Davi', last_name: 'Rocha' } },
    ],
    errors: [],
  };
}

function lastCall(): [string, RequestInit] {
  const call = fetchMock.mock.calls.at(-1);
  if (!call) throw new Error('fetch was not called');
  const [url, init] = call;
  return [String(url), init ?? {}];
}

describe('ErpClient', () => {
  const client = new ErpClient({ baseUrl: 'http://erp.test/', apiToken: 'test-secret' });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reads the target schema from the OpenAPI document', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        paths: {
          '/v1/employees': {
            put: {
              requestBody: {
                content: {
                  'application/json': {
                    schema: { type: 'object', required: ['first_name'], properties: { first_name: { type: 'string' } } },
                  },
                },
              },
            },
          },
        },
      }),
    );

    const schema = await client.fetchTargetSchema();
    expect(schema.endpoints).toEqual([
      {
        path: '/v1/employees',
        method: 'PUT',
        entity: 'employees',
        fields: [{ name: 'first_name', type: 'string', required: true }],
      },
    ]);
    const [url, init] = lastCall();
    expect(url).toBe('http://erp.test/openapi.json');
    expect(init.headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-secret' });
  });

  it('fails when the schema request fails', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 503, statusText: 'Service Unavailable' }));
    await expect(client.fetchTargetSchema()).rejects.toThrow('ERP schema request failed: 503 Service Unavailable');
  });

  it('sends the records of a batch with the endpoint method', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 200 }));

    await expect(client.submitBatch(batch())).resolves.toEqual({ ok: true, failedIndices: [] });
    const [url, init] = lastCall();
    expect(url).toBe('http://erp.test/v1/employees');
    expect(init.method).toBe('PUT');
    expect(init.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
    expect(JSON.parse(String(init.body))).toEqual({
      records: [
        { first_name: 'Carla', last_name: 'Dias' },
        { first_name: 'Davi', last_name: 'Rocha' },
      ],
    });
  });

  it('reports the records the endpoint refused', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ failedIndices: [0, 7], errors: [{ index: 1, message: 'duplicate' }] }));
    await expect(client.submitBatch(batch())).resolves.toEqual({
      ok: false,
      failedIndices: [0, 1],
      message: '2 of 2 records rejected by /v1/employees',
    });
  });

  it('treats a success body without outcomes as full acceptance', async () => {
    fetchMock.mockResolvedValueOnce(new Response('accepted', { status: 200 }));
    await expect(client.submitBatch(batch())).resolves.toEqual({ ok: true, failedIndices: [] });
  });

  it('fails every record on an error status', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad payload', { status: 422 }));
    await expect(client.submitBatch(batch())).resolves.toEqual({
      ok: false,
      failedIndices: [0, 1],
      message: 'PUT /v1/employees returned 422: bad payload',
    });
  });

  it('omits the token header without a token', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 200 }));
    await new ErpClient({ baseUrl: 'http://erp.test', timeoutMs: 1000 }).submitBatch(batch());
    expect(lastCall()[1].headers).toEqual({ Accept: 'application/json', 'Content-Type': 'application/json' });
  });
});

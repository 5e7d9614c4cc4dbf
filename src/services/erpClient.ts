import { z } from 'zod';
import type { PayloadBatch, TargetSchema } from '../types.js';
import type { PayloadSink, SubmitResult } from './migrationSession.js';
import { parseOpenApiTargetSchema } from './openApiParser.js';
import type { TargetSchemaSource } from './targetSchemaCache.js';

export interface ErpClientOptions {
  baseUrl: string;
  apiToken?: string;
  /** Path of the OpenAPI document, relative to `baseUrl`. */
  schemaPath?: string;
  timeoutMs?: number;
}

const DEFAULT_SCHEMA_PATH = '/openapi.json';
const DEFAULT_TIMEOUT_MS = 30000;

// The ERP answers a batch with the positions it refused, in one of two shapes.
const BatchResponseSchema = z
  .object({
    failedIndices: z.array(z.number().int().min(0)).optional(),
    errors: z.array(z.object({ index: z.number().int().min(0), message: z.string().optional() })).optional(),
  })
  .passthrough();

/**
 * HTTP client for the ERP import API. Reads the OpenAPI document for schema
 * sync and POSTs each batch as `{ records: [...] }` to its endpoint path.
 */
export class ErpClient implements PayloadSink, TargetSchemaSource {
  private readonly baseUrl: string;
  private readonly schemaPath: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: ErpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.schemaPath = options.schemaPath ?? DEFAULT_SCHEMA_PATH;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetchTargetSchema(): Promise<TargetSchema> {
    const response = await fetch(this.url(this.schemaPath), {
      headers: this.headers(),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`ERP schema request failed: ${response.status} ${response.statusText}`);
    }
    const document: unknown = await response.json();
    return parseOpenApiTargetSchema(document);
  }

  async submitBatch(batch: PayloadBatch): Promise<SubmitResult> {
    const response = await fetch(this.url(batch.endpoint), {
      method: batch.method,
      headers: { ...this.headers(), 'Content-Type': 'application/json' },
      body: JSON.stringify({ records: batch.records.map((record) => record.data) }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const text = await response.text();
    if (!response.ok) {
      return {
        ok: false,
        failedIndices: batch.records.map((_, i) => i),
        message: `${batch.method} ${batch.endpoint} returned ${response.status}${text ? `: ${text.slice(0, 500)}` : ''}`,
      };
    }

    const failed = failedIndicesFrom(text, batch.records.length);
    return failed.length === 0
      ? { ok: true, failedIndices: [] }
      : {
          ok: false,
          failedIndices: failed,
          message: `${failed.length} of ${batch.records.length} records rejected by ${batch.endpoint}`,
        };
  }

  private url(path: string): string {
    return `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.options.apiToken) headers.Authorization = `Bearer ${this.options.apiToken}`;
    return headers;
  }
}

function failedIndicesFrom(text: string, recordCount: number): number[] {
  if (!text.trim()) return [];
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    // Non-JSON success bodies carry no per-record outcome.
    return [];
  }
  const parsed = BatchResponseSchema.safeParse(body);
  if (!parsed.success) return [];
  const indices = new Set([
    ...(parsed.data.failedIndices ?? []),
    ...(parsed.data.errors ?? []).map((e) => e.index),
  ]);
  return [...indices].filter((i) => i < recordCount).sort((a, b) => a - b);
}

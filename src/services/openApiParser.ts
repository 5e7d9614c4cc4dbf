import { z } from 'zod';
import type { TargetEndpoint, TargetField, TargetSchema } from '../types.js';
import { InvalidSchemaError } from '../utils/errors.js';
import { normalizeOpenApiType } from '../utils/typeUtils.js';
import { lastStaticSegment } from './fuzzyMatcher.js';
import type { TargetSchemaSource } from './targetSchemaCache.js';

const OpenApiDocumentSchema = z.object({
  openapi: z.string().optional(),
  info: z.object({ title: z.string().optional(), version: z.string().optional() }).passthrough().optional(),
  paths: z.record(z.record(z.unknown())),
  components: z.object({ schemas: z.record(z.unknown()).optional() }).passthrough().optional(),
});

type SchemaNode = Record<string, unknown>;

const WRITE_METHODS = ['post', 'put', 'patch'] as const;

function isRecord(value: unknown): value is SchemaNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOf(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Reads an OpenAPI 3 document into a TargetSchema. One endpoint per path:
 * the POST operation when there is one, otherwise PUT, then PATCH. Fields
 * come from the JSON request body, following `$ref` and `allOf`.
 */
export function parseOpenApiTargetSchema(document: unknown): TargetSchema {
  const parsed = OpenApiDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new InvalidSchemaError('Not an OpenAPI document: expected a "paths" object', {
      issues: parsed.error.issues,
    });
  }

  const resolver = new RefResolver(parsed.data.components?.schemas ?? {});
  const endpoints: TargetEndpoint[] = [];

  for (const [path, pathItem] of Object.entries(parsed.data.paths)) {
    const method = WRITE_METHODS.find((m) => isRecord(pathItem[m]));
    if (!method) continue;
    const operation = pathItem[method];
    if (!isRecord(operation)) continue;

    const body = jsonBodySchema(operation);
    if (!body) continue;

    const fields = resolver.fields(body);
    if (fields.length === 0) continue;

    endpoints.push({
      path,
      method: method === 'post' ? 'POST' : method === 'put' ? 'PUT' : 'PATCH',
      entity: entityName(path, operation, body),
      fields,
      ...(stringOf(operation.summary) ? { description: stringOf(operation.summary) } : {}),
    });
  }

  return {
    title: parsed.data.info?.title,
    version: parsed.data.info?.version,
    endpoints,
  };
}

/** Adapts an already loaded OpenAPI document to the cache's sync interface. */
export class OpenApiDocumentSource implements TargetSchemaSource {
  constructor(private readonly document: unknown) {}

  async fetchTargetSchema(): Promise<TargetSchema> {
    return parseOpenApiTargetSchema(this.document);
  }
}

function jsonBodySchema(operation: SchemaNode): SchemaNode | undefined {
  const requestBody = operation.requestBody;
  if (!isRecord(requestBody) || !isRecord(requestBody.content)) return undefined;
  const json = requestBody.content['application/json'];
  if (!isRecord(json) || !isRecord(json.schema)) return undefined;
  return json.schema;
}

function entityName(path: string, operation: SchemaNode, body: SchemaNode): string {
  const ref = stringOf(body.$ref);
  if (ref) return ref.slice(ref.lastIndexOf('/') + 1);
  const explicit = stringOf(operation['x-entity']);
  if (explicit) return explicit;
  const tags = operation.tags;
  if (Array.isArray(tags) && typeof tags[0] === 'string') return tags[0];
  return lastStaticSegment(path) ?? path;
}

class RefResolver {
  constructor(private readonly definitions: Record<string, unknown>) {}

  resolve(node: SchemaNode, seen: Set<string> = new Set()): SchemaNode | undefined {
    const ref = stringOf(node.$ref);
    if (!ref) return node;
    if (seen.has(ref)) {
      console.warn(`[OpenApiParser] circular reference ${ref}`);
      return undefined;
    }
    const name = ref.startsWith('#/components/schemas/') ? ref.slice('#/components/schemas/'.length) : undefined;
    const target = name === undefined ? undefined : this.definitions[name];
    if (!isRecord(target)) return undefined;
    seen.add(ref);
    return this.resolve(target, seen);
  }

  fields(node: SchemaNode, seen: Set<string> = new Set()): TargetField[] {
    const schema = this.resolve(node, seen);
    if (!schema) return [];

    const out = new Map<string, TargetField>();
    if (Array.isArray(schema.allOf)) {
      for (const part of schema.allOf) {
        if (!isRecord(part)) continue;
        for (const field of this.fields(part, new Set(seen))) out.set(field.name, field);
      }
    }

    const required = new Set(
      Array.isArray(schema.required) ? schema.required.filter((r): r is string => typeof r === 'string') : [],
    );
    const properties = isRecord(schema.properties) ? schema.properties : {};
    for (const [name, raw] of Object.entries(properties)) {
      if (!isRecord(raw)) continue;
      const property = this.resolve(raw, new Set(seen)) ?? {};
      if (property.readOnly === true) continue;
      const format = stringOf(property.format);
      const description = stringOf(property.description);
      out.set(name, {
        name,
        type: normalizeOpenApiType(stringOf(property.type) ?? (isRecord(property.properties) ? 'object' : undefined), format),
        required: required.has(name),
        ...(description ? { description } : {}),
        ...(format ? { format } : {}),
      });
    }

    // `required` on an allOf wrapper may name fields declared in its parts.
    for (const name of required) {
      const field = out.get(name);
      if (field) field.required = true;
    }
    return [...out.values()];
  }
}

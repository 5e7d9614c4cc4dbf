import { describe, expect, it } from 'vitest';
import { OpenApiDocumentSource, parseOpenApiTargetSchema } from '../services/openApiParser.js';
import { InvalidSchemaError } from '../utils/errors.js';

function jsonBody(schema: Record<string, unknown>) {
  return { content: { 'application/json': { schema } } };
}

const document = {
  openapi: '3.0.3',
  info: { title: 'Test ERP', version: '2.1.0' },
  paths: {
    '/api/v1/customers': {
      get: { summary: 'List customers' },
      post: { summary: 'Create customer', requestBody: jsonBody({ $ref: '#/components/schemas/Customer' }) },
    },
    '/api/v1/customers/{id}': {
      put: { tags: ['Customers'], requestBody: jsonBody({ type: 'object', properties: { name: { type: 'string' } } }) },
    },
    '/v1/reports': { get: {} },
    '/v1/uploads': {
      post: { requestBody: { content: { 'multipart/form-data': { schema: { type: 'object' } } } } },
    },
    '/v1/orders': {
      patch: {
        requestBody: jsonBody({
          allOf: [
            { $ref: '#/components/schemas/Base' },
            {
              type: 'object',
              required: ['code'],
              properties: { code: { type: 'string' }, total: { type: 'number', format: 'decimal' } },
            },
          ],
          required: ['external_id'],
        }),
      },
    },
  },
  components: {
    schemas: {
      Customer: {
        type: 'object',
        required: ['name', 'document'],
        properties: {
          id: { type: 'string', readOnly: true },
          name: { type: 'string', description: 'Full name' },
          document: { type: 'string' },
          email: { type: 'string', format: 'email' },
          birthdate: { type: 'string', format: 'date' },
          address: { $ref: '#/components/schemas/Address' },
        },
      },
      Address: { type: 'object', properties: { street: { type: 'string' } } },
      Base: { type: 'object', properties: { external_id: { type: 'string', format: 'uuid' } } },
    },
  },
};

describe('parseOpenApiTargetSchema', () => {
  it('reads one write endpoint per path from JSON request bodies', () => {
    const schema = parseOpenApiTargetSchema(document);
    expect(schema.title).toBe('Test ERP');
    expect(schema.version).toBe('2.1.0');
    expect(schema.endpoints.map((e) => [e.path, e.method, e.entity])).toEqual([
      ['/api/v1/customers', 'POST', 'Customer'],
      ['/api/v1/customers/{id}', 'PUT', 'Customers'],
      ['/v1/orders', 'PATCH', 'orders'],
    ]);
  });

  it('follows references and skips read-only properties', () => {
    const [customers] = parseOpenApiTargetSchema(document).endpoints;
    expect(customers.description).toBe('Create customer');
    expect(customers.fields).toEqual([
      { name: 'name', type: 'string', required: true, description: 'Full name' },
      { name: 'document', type: 'string', required: true },
      { name: 'email', type: 'email', required: false, format: 'email' },
      { name: 'birthdate', type: 'date', required: false, format: 'date' },
      { name: 'address', type: 'object', required: false },
    ]);
  });

  it('merges allOf parts and applies an outer required list', () => {
    const orders = parseOpenApiTargetSchema(document).endpoints[2];
    expect(orders.fields).toEqual([
      { name: 'external_id', type: 'id', required: true, format: 'uuid' },
      { name: 'code', type: 'string', required: true },
      { name: 'total', type: 'decimal', required: false, format: 'decimal' },
    ]);
  });

  it('drops endpoints whose body is a reference loop', () => {
    const schema = parseOpenApiTargetSchema({
      paths: { '/v1/loops': { post: { requestBody: jsonBody({ $ref: '#/components/schemas/Loop' }) } } },
      components: { schemas: { Loop: { $ref: '#/components/schemas/Loop' } } },
    });
    expect(schema.endpoints).toEqual([]);
  });

  it('rejects documents without paths', () => {
    expect(() => parseOpenApiTargetSchema({ openapi: '3.0.0' })).toThrow(InvalidSchemaError);
    expect(() => parseOpenApiTargetSchema('nope')).toThrow('Not an OpenAPI document: expected a "paths" object');
  });
});

describe('OpenApiDocumentSource', () => {
  it('serves the parsed document as a target schema source', async () => {
    const schema = await new OpenApiDocumentSource(document).fetchTargetSchema();
    expect(schema.endpoints).toHaveLength(3);
  });
});

import { z } from 'zod';

export const DataTypeSchema = z.enum([
  'string',
  'text',
  'email',
  'phone',
  'id',
  'integer',
  'decimal',
  'number',
  'boolean',
  'date',
  'datetime',
  'time',
  'object',
  'array',
  'unknown',
]);

export const TargetFieldSchema = z.object({
  name: z.string().min(1),
  type: DataTypeSchema,
  required: z.boolean(),
  description: z.string().optional(),
  format: z.string().optional(),
});

export const TargetEndpointSchema = z.object({
  path: z.string().min(1),
  method: z.enum(['POST', 'PUT', 'PATCH']),
  entity: z.string().min(1),
  fields: z.array(TargetFieldSchema),
  description: z.string().optional(),
});

export const TargetSchemaSchema = z.object({
  title: z.string().optional(),
  version: z.string().optional(),
  endpoints: z.array(TargetEndpointSchema),
});

export const CachedTargetSchemaSchema = z.object({
  connectionId: z.string().min(1),
  syncedAt: z.string(),
  schema: TargetSchemaSchema,
});

const SplitRuleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('whitespace') }),
  z.object({ kind: z.literal('delimiter'), delimiter: z.string().min(1) }),
]);

export const ColumnMappingDraftSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('one_to_one'),
    sourceColumn: z.string().min(1),
    targetField: z.string().min(1),
    transformer: z.string().min(1).optional(),
  }),
  z.object({
    type: z.literal('many_to_one'),
    sourceColumns: z.array(z.string().min(1)).min(2),
    targetField: z.string().min(1),
    combine: z.object({ kind: z.literal('concat'), separator: z.string() }).default({ kind: 'concat', separator: ' ' }),
    transformer: z.string().min(1).optional(),
  }),
  z.object({
    type: z.literal('one_to_many'),
    sourceColumn: z.string().min(1),
    targetFields: z.array(z.string().min(1)).min(2),
    split: SplitRuleSchema.default({ kind: 'whitespace' }),
    transformers: z.record(z.string().min(1)).optional(),
    confirmed: z.boolean().optional(),
  }),
]);

export const MappingEditSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('set'), mapping: ColumnMappingDraftSchema }),
  z.object({ action: z.literal('remove'), sourceColumn: z.string().min(1) }),
]);

export const SkipTableSchema = z.object({
  reason: z.string().min(1).max(500).optional(),
});

export const AssignEndpointSchema = z.object({
  endpoint: z.string().min(1),
});

export const ConfirmSplitSchema = z.object({
  sourceColumn: z.string().min(1),
});

export const CreateSessionSchema = z.object({
  connectionId: z.string().min(1).max(255),
});

export const SubmitSessionSchema = z.object({
  dryRun: z.boolean().default(true),
});

export type TargetSchemaInput = z.infer<typeof TargetSchemaSchema>;
export type MappingEditInput = z.infer<typeof MappingEditSchema>;

/**
 * Parameter schemas for every tool.
 * @module dispatcher/schemas
 */

import { z } from 'zod';
import type { BatchLimitsConfig } from '../config/index.js';
import type { ToolName } from '../types.js';

export const tableNameSchema = z
  .string()
  .min(3, 'Table name must be between 3 and 255 characters')
  .max(255, 'Table name must be between 3 and 255 characters')
  .regex(/^[A-Za-z0-9_.-]+$/, 'Table name may contain only letters, digits, underscores, hyphens and periods');

const scalarSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const itemSchema = z.record(z.string(), scalarSchema);

const billingModeSchema = z.enum(['ON_DEMAND', 'PROVISIONED']);

const expressionBindings = {
  expressionAttributeNames: z.record(z.string(), z.string()).optional(),
  expressionAttributeValues: z.record(z.string(), scalarSchema).optional(),
};

const conditionalWrite = {
  ...expressionBindings,
  conditionExpression: z.string().optional(),
  returnStreamEvent: z.boolean().optional(),
};

const tableOnly = z.object({ tableName: tableNameSchema });

/**
 * Builds the schema of every tool; batch sizes come from configuration.
 */
export function createToolSchemas(limits: BatchLimitsConfig) {
  return {
    create_table: z.object({
      tableName: tableNameSchema,
      keySchema: z.object({
        partitionKey: z.string().optional(),
        sortKey: z.string().optional(),
      }),
      billingMode: billingModeSchema.default('ON_DEMAND'),
    }),
    describe_table: tableOnly,
    delete_table: tableOnly,
    list_tables: z
      .object({
        limit: z.number().int().positive().optional(),
        exclusiveStartTableName: z.string().optional(),
      })
      .default({}),
    update_table: z.object({
      tableName: tableNameSchema,
      billingMode: billingModeSchema,
    }),
    put_item: z.object({
      tableName: tableNameSchema,
      item: itemSchema,
      ...conditionalWrite,
    }),
    get_item: z.object({
      tableName: tableNameSchema,
      key: itemSchema,
    }),
    update_item: z.object({
      tableName: tableNameSchema,
      key: itemSchema,
      updateExpression: z.string(),
      ...conditionalWrite,
    }),
    delete_item: z.object({
      tableName: tableNameSchema,
      key: itemSchema,
      ...conditionalWrite,
    }),
    query: z.object({
      tableName: tableNameSchema,
      keyConditionExpression: z.string(),
      filterExpression: z.string().optional(),
      ...expressionBindings,
      limit: z.number().int().positive().optional(),
      scanIndexForward: z.boolean().optional(),
    }),
    scan: z.object({
      tableName: tableNameSchema,
      filterExpression: z.string().optional(),
      ...expressionBindings,
      limit: z.number().int().positive().optional(),
    }),
    // Entries are validated one by one so that a bad entry fails alone.
    batch_write_item: z.object({
      tableName: tableNameSchema,
      items: z
        .array(z.unknown())
        .min(1, 'items must not be empty')
        .max(limits.maxWriteItems, `at most ${limits.maxWriteItems} items per batch`),
      returnStreamEvent: z.boolean().optional(),
    }),
    batch_get_item: z.object({
      tableName: tableNameSchema,
      keys: z
        .array(z.unknown())
        .min(1, 'keys must not be empty')
        .max(limits.maxGetKeys, `at most ${limits.maxGetKeys} keys per batch`),
    }),
  } satisfies Record<ToolName, z.ZodTypeAny>;
}

type ToolSchemaSet = ReturnType<typeof createToolSchemas>;

/**
 * Validated parameters of each tool.
 */
export type ToolParameters = { [K in ToolName]: z.output<ToolSchemaSet[K]> };

/**
 * Parameters as callers may write them, before defaults apply.
 */
export type ToolInput = { [K in ToolName]: z.input<ToolSchemaSet[K]> };

export type ToolSchemas = { [K in ToolName]: z.ZodType<ToolParameters[K], z.ZodTypeDef, unknown> };

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'parameters'}: ${issue.message}`)
    .join('; ');
}

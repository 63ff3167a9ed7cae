/**
 * Zod schemas for every document the engine reads: persisted attack graphs,
 * compiled language specifications and instance models.
 */

import { z } from 'zod';
import { ATTACK_STEP_TYPES } from '../core/types.js';
import type { JsonObject, JsonValue, StepExpression } from '../core/types.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const attackStepTypeSchema = z.enum(ATTACK_STEP_TYPES);

// Attack graph documents

export const serializedAttackStepSchema = z.object({
  id: z.number().int().nonnegative(),
  type: attackStepTypeSchema,
  name: z.string(),
  ttc: jsonObjectSchema.nullable(),
  children: z.array(z.string()),
  parents: z.array(z.string()),
  compromised_by: z.array(z.string()),
  asset: z.string().optional(),
  defense_status: z.number().optional(),
  existence_status: z.boolean().optional(),
  is_viable: z.boolean().optional(),
  is_necessary: z.boolean().optional(),
  mitre_info: z.string().optional(),
  tags: z.array(z.string()).optional(),
  extras: jsonObjectSchema.optional(),
});

export type SerializedAttackStep = z.infer<typeof serializedAttackStepSchema>;

export const serializedAttackerSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string(),
  entry_points: z.array(z.string()),
  reached_attack_steps: z.array(z.string()),
});

export type SerializedAttacker = z.infer<typeof serializedAttackerSchema>;

export const serializedAttackGraphSchema = z.object({
  attack_steps: z.array(serializedAttackStepSchema),
  attackers: z.array(serializedAttackerSchema).default([]),
});

export type SerializedAttackGraph = z.infer<typeof serializedAttackGraphSchema>;

// Language specification documents

export const stepExpressionSchema: z.ZodType<StepExpression> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('attackStep'), name: z.string() }),
    z.object({
      type: z.enum(['union', 'intersection', 'difference']),
      lhs: stepExpressionSchema,
      rhs: stepExpressionSchema,
    }),
    z.object({
      type: z.literal('collect'),
      lhs: stepExpressionSchema,
      rhs: stepExpressionSchema,
    }),
    z.object({ type: z.literal('variable'), name: z.string() }),
    z.object({ type: z.literal('field'), name: z.string() }),
    z.object({ type: z.literal('transitive'), stepExpression: stepExpressionSchema }),
    z.object({
      type: z.literal('subType'),
      subType: z.string(),
      stepExpression: stepExpressionSchema,
    }),
  ])
);

const stepExpressionListSchema = z
  .object({
    overrides: z.boolean().default(false),
    stepExpressions: z.array(stepExpressionSchema),
  })
  .nullable()
  .default(null);

export const attackStepSpecSchema = z.object({
  name: z.string(),
  type: attackStepTypeSchema,
  ttc: jsonObjectSchema.nullable().default(null),
  tags: z.array(z.string()).default([]),
  meta: jsonObjectSchema.default({}),
  requires: stepExpressionListSchema,
  reaches: stepExpressionListSchema,
});

export const languageDocumentSchema = z.object({
  defines: z.record(z.string()).default({}),
  assets: z.array(
    z.object({
      name: z.string(),
      superAsset: z.string().nullable().default(null),
      variables: z
        .array(z.object({ name: z.string(), stepExpression: stepExpressionSchema }))
        .default([]),
      attackSteps: z.array(attackStepSpecSchema).default([]),
    })
  ),
  associations: z
    .array(
      z.object({
        name: z.string(),
        leftAsset: z.string(),
        leftField: z.string(),
        rightAsset: z.string(),
        rightField: z.string(),
      })
    )
    .default([]),
});

export type LanguageDocument = z.infer<typeof languageDocumentSchema>;

// Instance model documents

export const modelDocumentSchema = z.object({
  name: z.string().default('model'),
  assets: z.array(
    z.object({
      id: z.number().int().nonnegative(),
      name: z.string(),
      type: z.string(),
      properties: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
    })
  ),
  associations: z
    .array(
      z.object({
        name: z.string(),
        leftField: z.string(),
        left: z.array(z.string()),
        rightField: z.string(),
        right: z.array(z.string()),
      })
    )
    .default([]),
  attackers: z
    .array(
      z.object({
        id: z.number().int().nonnegative(),
        name: z.string(),
        entryPoints: z
          .array(z.object({ asset: z.string(), attackSteps: z.array(z.string()) }))
          .default([]),
      })
    )
    .default([]),
});

export type ModelDocument = z.infer<typeof modelDocumentSchema>;

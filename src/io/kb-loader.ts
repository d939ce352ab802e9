/**
 * YAML knowledge-base loader.
 *
 * Reads documents with `spaces`, `objects` and `actions` sections, checks
 * their shape with zod, converts them to the domain model and builds a
 * knowledge base (which runs the semantic validation).
 *
 * Scalars that YAML reads as booleans or numbers are turned into level
 * names: true -> on, false -> off.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import type {
  Action,
  AttributeDefinition,
  AttributeTable,
  Condition,
  Effect,
  KnowledgeBase,
  KnowledgeBaseDefinition,
  ObjectBehavior,
  ObjectType,
  Operator,
  ParameterRef,
  QualitativeSpace,
  Trend,
} from '../domain/model.js';
import { KnowledgeBaseError, type KnowledgeBaseIssue } from '../domain/errors.js';
import { createKnowledgeBase } from '../kb/catalog.js';

// ============================================================================
// Raw document shapes
// ============================================================================

type RawLevels = string | string[];
type RawValue = RawLevels | ParameterRef;

type RawCondition =
  | { type: 'attribute_check'; target: string; operator: Operator; value: RawValue }
  | { type: 'parameter_valid'; parameter: string; valid_values: string[] }
  | { type: 'parameter_equals'; parameter: string; value: string }
  | { type: 'and'; conditions: RawCondition[] }
  | { type: 'or'; conditions: RawCondition[] }
  | { type: 'not'; condition: RawCondition }
  | { type: 'implication'; if: RawCondition; then: RawCondition };

type RawEffect =
  | { type: 'set_attribute'; target: string; value: string | ParameterRef }
  | { type: 'set_trend'; target: string; direction: Trend }
  | { type: 'conditional'; condition: RawCondition; then: RawEffect[]; else?: RawEffect[] };

// ============================================================================
// Schemas
// ============================================================================

const levelSchema = z
  .union([z.string(), z.boolean(), z.number()])
  .transform((value) => {
    if (value === true) return 'on';
    if (value === false) return 'off';
    return String(value);
  });

const parameterRefSchema = z.object({
  type: z.literal('parameter_ref'),
  name: z.string().min(1),
});

const levelsSchema = z.union([levelSchema, z.array(levelSchema)]);

const operatorSchema = z.enum([
  'equals',
  'not_equals',
  'lt',
  'lte',
  'gt',
  'gte',
  'in',
  'not_in',
]);

const conditionSchema: z.ZodType<RawCondition, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({
      type: z.literal('attribute_check'),
      target: z.string().min(1),
      operator: operatorSchema,
      value: z.union([parameterRefSchema, levelsSchema]),
    }),
    z.object({
      type: z.literal('parameter_valid'),
      parameter: z.string().min(1),
      valid_values: z.array(levelSchema),
    }),
    z.object({
      type: z.literal('parameter_equals'),
      parameter: z.string().min(1),
      value: levelSchema,
    }),
    z.object({ type: z.literal('and'), conditions: z.array(conditionSchema).min(1) }),
    z.object({ type: z.literal('or'), conditions: z.array(conditionSchema).min(1) }),
    z.object({ type: z.literal('not'), condition: conditionSchema }),
    z.object({
      type: z.literal('implication'),
      if: conditionSchema,
      then: conditionSchema,
    }),
  ])
);

const effectSchema: z.ZodType<RawEffect, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({
      type: z.literal('set_attribute'),
      target: z.string().min(1),
      value: z.union([parameterRefSchema, levelSchema]),
    }),
    z.object({
      type: z.literal('set_trend'),
      target: z.string().min(1),
      direction: z.enum(['up', 'down', 'none']),
    }),
    z.object({
      type: z.literal('conditional'),
      condition: conditionSchema,
      then: z.array(effectSchema),
      else: z.array(effectSchema).optional(),
    }),
  ])
);

const attributeSchema = z.object({
  space: z.string().min(1),
  default: levelsSchema.default('unknown'),
  mutable: z.boolean().default(true),
});

const attributeTableSchema = z.record(attributeSchema);

const behaviorSchema = z.object({
  preconditions: z.array(conditionSchema).default([]),
  effects: z.array(effectSchema).default([]),
});

const documentSchema = z.object({
  spaces: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string().optional(),
        levels: z.array(levelSchema).min(1),
      })
    )
    .default([]),
  objects: z
    .array(
      z.object({
        name: z.string().min(1),
        parts: z.record(attributeTableSchema).default({}),
        globals: attributeTableSchema.optional(),
        constraints: z
          .array(
            z.object({
              name: z.string().optional(),
              condition: conditionSchema,
              requires: conditionSchema,
            })
          )
          .default([]),
        behaviors: z.record(behaviorSchema).optional(),
      })
    )
    .default([]),
  actions: z
    .array(
      z.object({
        name: z.string().min(1),
        object_type: z.string().min(1),
        description: z.string().optional(),
        parameters: z
          .array(
            z.object({
              name: z.string().min(1),
              choices: z.array(levelSchema).optional(),
              required: z.boolean().default(true),
              default: levelSchema.optional(),
            })
          )
          .default([]),
        preconditions: z.array(conditionSchema).default([]),
        effects: z.array(effectSchema).default([]),
      })
    )
    .default([]),
});

type RawDocument = z.infer<typeof documentSchema>;

// ============================================================================
// Conversion
// ============================================================================

function toCondition(raw: RawCondition): Condition {
  switch (raw.type) {
    case 'attribute_check':
      return {
        type: 'attribute_check',
        target: raw.target,
        operator: raw.operator,
        value: raw.value,
      };
    case 'parameter_valid':
      return { type: 'parameter_check', parameter: raw.parameter, validValues: raw.valid_values };
    case 'parameter_equals':
      return { type: 'parameter_check', parameter: raw.parameter, expectedValue: raw.value };
    case 'and':
      return { type: 'and', items: raw.conditions.map(toCondition) };
    case 'or':
      return { type: 'or', items: raw.conditions.map(toCondition) };
    case 'not':
      return { type: 'not', item: toCondition(raw.condition) };
    case 'implication':
      return { type: 'implication', if: toCondition(raw.if), then: toCondition(raw.then) };
  }
}

function toEffect(raw: RawEffect): Effect {
  switch (raw.type) {
    case 'set_attribute':
    case 'set_trend':
      return raw;
    case 'conditional':
      return {
        type: 'conditional',
        condition: toCondition(raw.condition),
        then: raw.then.map(toEffect),
        ...(raw.else === undefined ? {} : { else: raw.else.map(toEffect) }),
      };
  }
}

function toAttributeTable(
  raw: Record<string, { space: string; default: RawLevels; mutable: boolean }>
): AttributeTable {
  const table: Record<string, AttributeDefinition> = {};
  for (const [name, attribute] of Object.entries(raw)) {
    table[name] = {
      space: attribute.space,
      default: attribute.default,
      mutable: attribute.mutable,
    };
  }
  return table;
}

function toBehaviors(
  raw: Record<string, { preconditions: RawCondition[]; effects: RawEffect[] }>
): Record<string, ObjectBehavior> {
  const behaviors: Record<string, ObjectBehavior> = {};
  for (const [name, behavior] of Object.entries(raw)) {
    behaviors[name] = {
      preconditions: behavior.preconditions.map(toCondition),
      effects: behavior.effects.map(toEffect),
    };
  }
  return behaviors;
}

function toDefinition(document: RawDocument): KnowledgeBaseDefinition {
  const spaces: QualitativeSpace[] = document.spaces.map((space) => ({
    id: space.id,
    name: space.name ?? space.id,
    levels: space.levels,
  }));

  const objectTypes: ObjectType[] = document.objects.map((object) => {
    const parts: Record<string, AttributeTable> = {};
    for (const [part, table] of Object.entries(object.parts)) {
      parts[part] = toAttributeTable(table);
    }
    return {
      name: object.name,
      parts,
      ...(object.globals === undefined ? {} : { globals: toAttributeTable(object.globals) }),
      constraints: object.constraints.map((constraint) => ({
        type: 'dependency' as const,
        ...(constraint.name === undefined ? {} : { name: constraint.name }),
        condition: toCondition(constraint.condition),
        requires: toCondition(constraint.requires),
      })),
      ...(object.behaviors === undefined ? {} : { behaviors: toBehaviors(object.behaviors) }),
    };
  });

  const actions: Action[] = document.actions.map((action) => ({
    name: action.name,
    objectType: action.object_type,
    ...(action.description === undefined ? {} : { description: action.description }),
    parameters: action.parameters,
    preconditions: action.preconditions.map(toCondition),
    effects: action.effects.map(toEffect),
  }));

  return { spaces, objectTypes, actions };
}

// ============================================================================
// Loader Functions
// ============================================================================

/**
 * Parses one YAML document into definitions.
 *
 * @throws KnowledgeBaseError on YAML syntax errors or schema mismatches
 */
export function parseKnowledgeBaseDocument(
  content: string,
  file?: string
): KnowledgeBaseDefinition {
  const where = file === undefined ? {} : { file };
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new KnowledgeBaseError([
      { ...where, subject: 'document', rule: 'yaml-syntax', message },
    ]);
  }

  const result = documentSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues: KnowledgeBaseIssue[] = result.error.issues.map((issue) => ({
      ...where,
      subject: 'document',
      rule: 'schema',
      message: `${issue.path.join('.') || '<root>'}: ${issue.message}`,
    }));
    throw new KnowledgeBaseError(issues);
  }
  return toDefinition(result.data);
}

export function mergeDefinitions(
  definitions: readonly KnowledgeBaseDefinition[]
): KnowledgeBaseDefinition {
  return {
    spaces: definitions.flatMap((definition) => definition.spaces),
    objectTypes: definitions.flatMap((definition) => definition.objectTypes),
    actions: definitions.flatMap((definition) => definition.actions),
  };
}

export function parseKnowledgeBaseYaml(content: string): KnowledgeBase {
  return createKnowledgeBase(parseKnowledgeBaseDocument(content));
}

/**
 * Loads and merges several files into one knowledge base. A definition in
 * one file may refer to spaces or object types from another.
 */
export function loadKnowledgeBaseFiles(paths: readonly string[]): KnowledgeBase {
  const definitions = paths.map((file) =>
    parseKnowledgeBaseDocument(fs.readFileSync(file, 'utf-8'), file)
  );
  return createKnowledgeBase(mergeDefinitions(definitions));
}

/**
 * Recursively finds YAML files under a directory, sorted by path.
 */
export function findKnowledgeBaseFiles(dir: string): string[] {
  const found: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...findKnowledgeBaseFiles(full));
    } else if (/\.ya?ml$/.test(entry.name)) {
      found.push(full);
    }
  }
  return found.sort();
}

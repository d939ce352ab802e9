/**
 * History serialization.
 *
 * A history stores the root snapshot in full and, for every other node in
 * id order, the delta against its primary parent (the first parent id)
 * plus its branch metadata. Replaying applies the deltas in order; a step
 * whose parent has not been replayed yet is rejected.
 */

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';

import type { Level, ParameterValues, Trend } from '../domain/model.js';
import type { BranchCondition } from '../domain/branching.js';
import type { ConstraintViolation } from '../domain/constraints.js';
import type { SimulationErrorCode } from '../domain/errors.js';
import type { GraphStatistics, HaltRecord, SimulationGraph } from '../domain/graph.js';
import type { Change, NodeStatus } from '../domain/transitions.js';
import { sameMembers } from '../domain/space.js';
import type { AttributeValue, WorldSnapshot } from '../domain/state.js';

export interface StoredValue {
  values: readonly Level[];
  trend: Trend;
}

export interface StoredEdge {
  parentId: string;
  branchConditions: readonly BranchCondition[];
  changes: readonly Change[];
}

export interface HistoryStep {
  id: string;
  layer: number;
  parentIds: readonly string[];
  action: string;
  parameters: ParameterValues;
  status: NodeStatus;
  error?: string;
  violations: readonly ConstraintViolation[];
  edges: readonly StoredEdge[];
  /** Attributes that differ from the primary parent */
  delta: Readonly<Record<string, StoredValue>>;
}

export interface HistoryDocument {
  version: 1;
  simulationId: string;
  objectType: string;
  root: {
    id: string;
    attributes: Readonly<Record<string, StoredValue>>;
  };
  steps: readonly HistoryStep[];
  halted: HaltRecord | null;
  statistics: GraphStatistics;
}

// ============================================================================
// Serialization
// ============================================================================

function store(value: AttributeValue): StoredValue {
  return { values: [...value.values], trend: value.trend };
}

function delta(parent: WorldSnapshot, child: WorldSnapshot): Record<string, StoredValue> {
  const changed: Record<string, StoredValue> = {};
  for (const [key, value] of child.attributes) {
    const previous = parent.attributes.get(key);
    if (
      !previous ||
      previous.trend !== value.trend ||
      !sameMembers(previous.values, value.values)
    ) {
      changed[key] = store(value);
    }
  }
  return changed;
}

export function serializeHistory(graph: SimulationGraph): HistoryDocument {
  const root = graph.nodes.get(graph.rootId);
  if (!root) {
    throw new Error(`Graph root ${graph.rootId} is missing`);
  }

  const attributes: Record<string, StoredValue> = {};
  for (const [key, value] of root.snapshot.attributes) {
    attributes[key] = store(value);
  }

  const steps: HistoryStep[] = [];
  for (const node of graph.nodes.values()) {
    if (node.actionName === null) {
      continue;
    }
    const primary = graph.nodes.get(node.parentIds[0] ?? '');
    if (!primary) {
      throw new Error(`Node ${node.id} has no primary parent`);
    }
    steps.push({
      id: node.id,
      layer: node.layer,
      parentIds: [...node.parentIds],
      action: node.actionName,
      parameters: { ...node.parameters },
      status: node.status,
      ...(node.error === undefined ? {} : { error: node.error }),
      violations: node.violations,
      edges: node.edges,
      delta: delta(primary.snapshot, node.snapshot),
    });
  }

  return {
    version: 1,
    simulationId: graph.simulationId,
    objectType: graph.objectType,
    root: { id: root.id, attributes },
    steps,
    halted: graph.halted,
    statistics: graph.statistics,
  };
}

// ============================================================================
// Replay
// ============================================================================

function toMap(record: Readonly<Record<string, StoredValue>>): Map<string, AttributeValue> {
  return new Map(
    Object.entries(record).map(([key, value]) => [
      key,
      { values: value.values, trend: value.trend },
    ])
  );
}

/**
 * Rebuilds every node's snapshot from the root and the ordered deltas.
 */
export function replayHistory(document: HistoryDocument): Map<string, WorldSnapshot> {
  const snapshots = new Map<string, WorldSnapshot>();
  snapshots.set(document.root.id, {
    objectType: document.objectType,
    sequence: 0,
    attributes: toMap(document.root.attributes),
  });

  for (const step of document.steps) {
    const parentId = step.parentIds[0];
    const parent = parentId === undefined ? undefined : snapshots.get(parentId);
    if (!parent) {
      throw new Error(
        `Step ${step.id} refers to parent ${parentId ?? '<none>'} before it was replayed`
      );
    }
    const attributes = new Map(parent.attributes);
    for (const [key, value] of toMap(step.delta)) {
      attributes.set(key, value);
    }
    snapshots.set(step.id, { objectType: parent.objectType, sequence: step.layer, attributes });
  }

  return snapshots;
}

// ============================================================================
// YAML
// ============================================================================

const trendSchema = z.enum(['up', 'down', 'none']);
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
const storedValueSchema = z.object({ values: z.array(z.string()).min(1), trend: trendSchema });
const clauseShape = {
  attribute: z.string(),
  operator: operatorSchema,
  value: z.union([z.string(), z.array(z.string())]),
};
const branchShape = {
  source: z.enum(['precondition', 'postcondition']),
  branchType: z.enum(['success', 'fail', 'if', 'elif', 'else']),
};

const branchConditionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('simple'), ...branchShape, ...clauseShape }),
  z.object({
    kind: z.literal('compound'),
    ...branchShape,
    compoundType: z.enum(['and', 'or']),
    subConditions: z.array(z.object(clauseShape)),
  }),
]);

const changeSchema = z.union([
  z.object({
    attribute: z.string(),
    kind: z.enum(['value', 'narrowing']),
    before: z.array(z.string()),
    after: z.array(z.string()),
  }),
  z.object({
    attribute: z.string(),
    kind: z.literal('trend'),
    before: trendSchema,
    after: trendSchema,
  }),
  z.object({
    attribute: z.string(),
    kind: z.literal('constraint'),
    constraint: z.string(),
    outcome: z.enum(['violated', 'unknown']),
    before: z.array(z.string()),
    after: z.array(z.string()),
  }),
]);

const errorCodes: [SimulationErrorCode, ...SimulationErrorCode[]] = [
  'validation',
  'unknown_level',
  'immutable_write',
  'domain',
  'required_postcondition',
  'knowledge_base',
];

const historySchema: z.ZodType<HistoryDocument> = z.object({
  version: z.literal(1),
  simulationId: z.string(),
  objectType: z.string(),
  root: z.object({ id: z.string(), attributes: z.record(storedValueSchema) }),
  steps: z.array(
    z.object({
      id: z.string(),
      layer: z.number().int().nonnegative(),
      parentIds: z.array(z.string()).min(1),
      action: z.string(),
      parameters: z.record(z.string()),
      status: z.enum(['ok', 'rejected', 'constraint_violated', 'error']),
      error: z.string().optional(),
      violations: z.array(
        z.object({
          constraint: z.string(),
          outcome: z.enum(['violated', 'unknown']),
          witnesses: z.array(z.string()),
        })
      ),
      edges: z.array(
        z.object({
          parentId: z.string(),
          branchConditions: z.array(branchConditionSchema),
          changes: z.array(changeSchema),
        })
      ),
      delta: z.record(storedValueSchema),
    })
  ),
  halted: z
    .object({
      layer: z.number(),
      nodeId: z.string(),
      action: z.string(),
      code: z.enum(errorCodes),
      message: z.string(),
    })
    .nullable(),
  statistics: z.object({
    totalNodes: z.number(),
    depth: z.number(),
    width: z.number(),
    leaves: z.number(),
    branchPoints: z.number(),
    successCount: z.number(),
    failCount: z.number(),
    mergedNodes: z.number(),
    edges: z.number(),
  }),
});

export function historyToYaml(document: HistoryDocument): string {
  return stringifyYaml(document, { aliasDuplicateObjects: false });
}

/**
 * @throws ZodError when the document does not have the history shape
 */
export function historyFromYaml(content: string): HistoryDocument {
  return historySchema.parse(parseYaml(content));
}

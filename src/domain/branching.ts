/**
 * Branch generation for unknown conditions.
 *
 * When a condition evaluates unknown, the snapshot is split into children
 * that each decide it. A child is described by a narrowing (attribute ->
 * allowed levels) and the clauses that produced it.
 *
 * Splitting follows De Morgan:
 * - AND: one success child narrowing every item, one fail child per item
 * - OR: one success child per item, one fail child narrowing every item
 * - NOT swaps success and fail
 *
 * Non-goals (not included):
 * - Applying effects (belongs in transitions.ts)
 * - Branching on constraints
 */

import type {
  AttributeCheck,
  Condition,
  Level,
  Operator,
} from './model.js';
import {
  asDisjunction,
  evaluate,
  resolveCheckValue,
  satisfyingSet,
  type EvaluationContext,
} from './rules.js';
import { intersect, subtract } from './space.js';
import {
  readValue,
  resolveAttribute,
  withValues,
  type AttributeValue,
  type WorldSnapshot,
} from './state.js';

// ============================================================================
// Branch Conditions
// ============================================================================

export type BranchSource = 'precondition' | 'postcondition';

export type BranchType = 'success' | 'fail' | 'if' | 'elif' | 'else';

/**
 * One attribute restriction that holds in a branch.
 */
export interface BranchClause {
  attribute: string;
  operator: Operator;
  value: Level | readonly Level[];
}

export interface SimpleBranchCondition extends BranchClause {
  kind: 'simple';
  source: BranchSource;
  branchType: BranchType;
}

/**
 * Provenance of a branch decided by a compound condition.
 *
 * `compoundType` names the condition that was decided; every entry of
 * `subConditions` holds in the branch.
 */
export interface CompoundBranchCondition {
  kind: 'compound';
  source: BranchSource;
  branchType: BranchType;
  compoundType: 'and' | 'or';
  subConditions: readonly BranchClause[];
}

export type BranchCondition = SimpleBranchCondition | CompoundBranchCondition;

// ============================================================================
// Narrowings
// ============================================================================

export type Narrowing = ReadonlyMap<string, readonly Level[]>;

export interface Branch {
  narrowing: Narrowing;
  clauses: readonly BranchClause[];
}

export interface SplitResult {
  success: readonly Branch[];
  fail: readonly Branch[];
}

const UNCONSTRAINED: Branch = { narrowing: new Map(), clauses: [] };

const NEGATED: Record<Operator, Operator> = {
  equals: 'not_equals',
  not_equals: 'equals',
  lt: 'gte',
  gte: 'lt',
  lte: 'gt',
  gt: 'lte',
  in: 'not_in',
  not_in: 'in',
};

/**
 * Conjunction of two branches, or null when some attribute ends up with
 * no level left.
 */
function conjoin(
  a: Branch,
  b: Branch,
  context: EvaluationContext
): Branch | null {
  const narrowing = new Map(a.narrowing);
  for (const [key, levels] of b.narrowing) {
    const existing = narrowing.get(key);
    if (existing === undefined) {
      narrowing.set(key, levels);
      continue;
    }
    const { space } = resolveAttribute(context.kb, context.objectType, key);
    const combined = intersect(space, existing, levels);
    if (combined.length === 0) {
      return null;
    }
    narrowing.set(key, combined);
  }
  return { narrowing, clauses: [...a.clauses, ...b.clauses] };
}

/** Every combination taking one branch from each list. */
function product(
  lists: readonly (readonly Branch[])[],
  context: EvaluationContext
): Branch[] {
  let combined: Branch[] = [UNCONSTRAINED];
  for (const list of lists) {
    const next: Branch[] = [];
    for (const left of combined) {
      for (const right of list) {
        const joined = conjoin(left, right, context);
        if (joined) {
          next.push(joined);
        }
      }
    }
    combined = next;
  }
  return combined;
}

function splitAttributeCheck(
  check: AttributeCheck,
  snapshot: WorldSnapshot,
  context: EvaluationContext
): SplitResult {
  const { space } = resolveAttribute(context.kb, context.objectType, check.target);
  const current = readValue(snapshot, check.target).values;
  const satisfying = satisfyingSet(check, context);
  const pivot = resolveCheckValue(check, context.parameters);
  const inside = intersect(space, current, satisfying);
  const outside = subtract(space, current, satisfying);

  if (outside.length === 0) {
    return { success: [UNCONSTRAINED], fail: [] };
  }
  if (inside.length === 0) {
    return { success: [], fail: [UNCONSTRAINED] };
  }
  return {
    success: [
      {
        narrowing: new Map([[check.target, inside]]),
        clauses: [{ attribute: check.target, operator: check.operator, value: pivot }],
      },
    ],
    fail: [
      {
        narrowing: new Map([[check.target, outside]]),
        clauses: [
          { attribute: check.target, operator: NEGATED[check.operator], value: pivot },
        ],
      },
    ],
  };
}

/**
 * Splits a condition into the branches where it holds and the branches
 * where it does not. Decided conditions give one unconstrained branch on
 * the side they fall on.
 */
export function splitCondition(
  condition: Condition,
  snapshot: WorldSnapshot,
  context: EvaluationContext
): SplitResult {
  switch (condition.type) {
    case 'attribute_check':
      return splitAttributeCheck(condition, snapshot, context);

    case 'parameter_check': {
      const decided = evaluate(condition, snapshot, context).truth === 'true';
      return decided
        ? { success: [UNCONSTRAINED], fail: [] }
        : { success: [], fail: [UNCONSTRAINED] };
    }

    case 'and': {
      const parts = condition.items.map((item) => splitCondition(item, snapshot, context));
      return {
        success: product(parts.map((part) => part.success), context),
        fail: parts.flatMap((part) => part.fail),
      };
    }

    case 'or': {
      const parts = condition.items.map((item) => splitCondition(item, snapshot, context));
      return {
        success: parts.flatMap((part) => part.success),
        fail: product(parts.map((part) => part.fail), context),
      };
    }

    case 'not': {
      const inner = splitCondition(condition.item, snapshot, context);
      return { success: inner.fail, fail: inner.success };
    }

    case 'implication':
      return splitCondition(asDisjunction(condition.if, condition.then), snapshot, context);
  }
}

// ============================================================================
// Applying branches
// ============================================================================

/**
 * Copies the snapshot with the branch's narrowed attributes. Trends are
 * kept; nothing outside the narrowing is touched.
 */
export function narrowSnapshot(
  snapshot: WorldSnapshot,
  narrowing: Narrowing
): WorldSnapshot {
  const overrides = new Map<string, AttributeValue>();
  for (const [key, levels] of narrowing) {
    const current = readValue(snapshot, key);
    overrides.set(key, { values: levels, trend: current.trend });
  }
  return withValues(snapshot, overrides);
}

function compoundTypeOf(condition: Condition): 'and' | 'or' {
  switch (condition.type) {
    case 'or':
    case 'implication':
      return 'or';
    case 'not':
      return compoundTypeOf(condition.item) === 'and' ? 'or' : 'and';
    default:
      return 'and';
  }
}

/**
 * Describes a branch of `condition` for the node that records it.
 */
export function describeBranch(
  condition: Condition,
  branch: Branch,
  source: BranchSource,
  branchType: BranchType
): BranchCondition {
  const only = branch.clauses.length === 1 ? branch.clauses[0] : undefined;
  if (only) {
    return { kind: 'simple', source, branchType, ...only };
  }
  return {
    kind: 'compound',
    source,
    branchType,
    compoundType: compoundTypeOf(condition),
    subConditions: branch.clauses,
  };
}

/**
 * Pure state transitions: effect application and single-action apply.
 *
 * `applyAction` takes one snapshot and one action request and returns one
 * result per branch. It never mutates its input and never logs.
 *
 * Non-goals (not included):
 * - Node identity or merging (belongs in graph.ts)
 * - Multi-action runs (belongs in engine.ts)
 */

import type {
  Action,
  ActionRequest,
  AttributeCheck,
  ConditionalEffect,
  Effect,
  KnowledgeBase,
  Level,
  ObjectType,
  ParameterValues,
  Trend,
} from './model.js';
import {
  DomainError,
  ImmutableWriteError,
  RequiredPostconditionError,
  ValidationError,
} from './errors.js';
import {
  evaluate,
  evaluateAll,
  isParameterRef,
  resolveCheckValue,
  resolveParameterRef,
  satisfyingSet,
  type EvaluationContext,
} from './rules.js';
import {
  describeBranch,
  narrowSnapshot,
  splitCondition,
  type BranchCondition,
  type BranchType,
} from './branching.js';
import {
  checkConstraints,
  constraintChanges,
  hasViolation,
  type ConstraintChange,
  type ConstraintViolation,
} from './constraints.js';
import { hasLevel, intersect, isSubset, sameMembers, subtract, union } from './space.js';
import {
  readValue,
  resolveAttribute,
  resolveTrends,
  withValues,
  type WorldSnapshot,
} from './state.js';
import { describeCondition } from './describe.js';

// ============================================================================
// Results
// ============================================================================

export type NodeStatus = 'ok' | 'rejected' | 'constraint_violated' | 'error';

export interface ValueChange {
  attribute: string;
  kind: 'value' | 'narrowing';
  before: readonly Level[];
  after: readonly Level[];
}

export interface TrendChange {
  attribute: string;
  kind: 'trend';
  before: Trend;
  after: Trend;
}

export type Change = ValueChange | TrendChange | ConstraintChange;

/**
 * TransitionResult: one branch of one action application.
 *
 * `state` is the snapshot the resulting node holds. `after` is the
 * post-effect snapshot, or null when no effects ran (rejected, or an
 * unsatisfied required postcondition).
 */
export interface TransitionResult {
  status: NodeStatus;
  before: WorldSnapshot;
  after: WorldSnapshot | null;
  state: WorldSnapshot;
  changes: readonly Change[];
  violations: readonly ConstraintViolation[];
  branchConditions: readonly BranchCondition[];
  error?: string;
}

// ============================================================================
// Effect application
// ============================================================================

/**
 * An effect outcome in progress. Effects run against `snapshot`; `written`
 * collects the attributes that set_attribute touched. `error` marks an
 * outcome whose required postcondition does not hold.
 */
export interface EffectOutcome {
  snapshot: WorldSnapshot;
  written: ReadonlySet<string>;
  branchConditions: readonly BranchCondition[];
  error?: string;
}

function extend(
  outcome: EffectOutcome,
  snapshot: WorldSnapshot,
  branchCondition?: BranchCondition
): EffectOutcome {
  return {
    snapshot,
    written: outcome.written,
    branchConditions: branchCondition
      ? [...outcome.branchConditions, branchCondition]
      : outcome.branchConditions,
  };
}

function setAttribute(
  outcome: EffectOutcome,
  target: string,
  value: Level,
  context: EvaluationContext
): EffectOutcome {
  const { definition, space } = resolveAttribute(context.kb, context.objectType, target);
  if (!definition.mutable) {
    throw new ImmutableWriteError(target);
  }
  if (!hasLevel(space, value)) {
    throw new DomainError(target, value, space.id);
  }
  const current = readValue(outcome.snapshot, target);
  const snapshot = withValues(
    outcome.snapshot,
    new Map([[target, { values: [value], trend: current.trend }]])
  );
  return {
    snapshot,
    written: new Set([...outcome.written, target]),
    branchConditions: outcome.branchConditions,
  };
}

function setTrend(
  outcome: EffectOutcome,
  target: string,
  direction: Trend,
  context: EvaluationContext
): EffectOutcome {
  resolveAttribute(context.kb, context.objectType, target);
  const current = readValue(outcome.snapshot, target);
  const snapshot = withValues(
    outcome.snapshot,
    new Map([[target, { values: current.values, trend: direction }]])
  );
  return extend(outcome, snapshot);
}

/**
 * Applies effects in order to one snapshot. Unknown conditionals fan out
 * into one outcome per branch.
 */
export function applyEffects(
  snapshot: WorldSnapshot,
  effects: readonly Effect[],
  context: EvaluationContext
): EffectOutcome[] {
  return applyEffectList(
    effects,
    [{ snapshot, written: new Set(), branchConditions: [] }],
    context
  );
}

/**
 * Outcomes that already failed are carried through unchanged.
 */
function applyEffectList(
  effects: readonly Effect[],
  outcomes: readonly EffectOutcome[],
  context: EvaluationContext
): EffectOutcome[] {
  let current: EffectOutcome[] = [...outcomes];
  for (const effect of effects) {
    current = current.flatMap((outcome) =>
      outcome.error === undefined ? applyEffect(effect, outcome, context) : [outcome]
    );
  }
  return current;
}

function applyEffect(
  effect: Effect,
  outcome: EffectOutcome,
  context: EvaluationContext
): EffectOutcome[] {
  switch (effect.type) {
    case 'set_attribute': {
      const value = isParameterRef(effect.value)
        ? resolveParameterRef(effect.value, context.parameters)
        : effect.value;
      return [setAttribute(outcome, effect.target, value, context)];
    }

    case 'set_trend':
      return [setTrend(outcome, effect.target, effect.direction, context)];

    case 'conditional':
      return applyConditional(effect, outcome, context);
  }
}

function unsatisfied(
  effect: ConditionalEffect,
  outcome: EffectOutcome,
  snapshot: WorldSnapshot
): EffectOutcome {
  const error = new RequiredPostconditionError(describeCondition(effect.condition));
  return { ...extend(outcome, snapshot), error: error.message };
}

function applyConditional(
  effect: ConditionalEffect,
  outcome: EffectOutcome,
  context: EvaluationContext
): EffectOutcome[] {
  const result = evaluate(effect.condition, outcome.snapshot, context);
  if (result.truth === 'true') {
    return applyEffectList(effect.then, [outcome], context);
  }
  if (result.truth === 'false') {
    return effect.else
      ? applyEffectList(effect.else, [outcome], context)
      : [unsatisfied(effect, outcome, outcome.snapshot)];
  }

  const chain = collectChain(effect);
  return chain
    ? branchOnChain(chain, outcome, context)
    : branchOnCompound(effect, outcome, context);
}

// ============================================================================
// Postcondition branching
// ============================================================================

interface ChainCase {
  check: AttributeCheck;
  then: readonly Effect[];
}

interface Chain {
  attribute: string;
  cases: readonly ChainCase[];
  otherwise: readonly Effect[] | undefined;
}

/**
 * Reads an if/elif/else chain over one attribute: a conditional on a plain
 * attribute check whose `else` is, repeatedly, a single conditional on the
 * same attribute. Returns undefined when the head is compound.
 */
function collectChain(effect: ConditionalEffect): Chain | undefined {
  if (effect.condition.type !== 'attribute_check') {
    return undefined;
  }
  const attribute = effect.condition.target;
  const cases: ChainCase[] = [{ check: effect.condition, then: effect.then }];
  let otherwise = effect.else;

  while (otherwise && otherwise.length === 1) {
    const next = otherwise[0];
    if (
      next === undefined ||
      next.type !== 'conditional' ||
      next.condition.type !== 'attribute_check' ||
      next.condition.target !== attribute
    ) {
      break;
    }
    cases.push({ check: next.condition, then: next.then });
    otherwise = next.else;
  }

  return { attribute, cases, otherwise };
}

function branchOnChain(
  chain: Chain,
  outcome: EffectOutcome,
  context: EvaluationContext
): EffectOutcome[] {
  const { space } = resolveAttribute(context.kb, context.objectType, chain.attribute);
  const current = readValue(outcome.snapshot, chain.attribute).values;
  const results: EffectOutcome[] = [];
  let covered: Level[] = [];

  chain.cases.forEach((chainCase, index) => {
    const satisfying = intersect(space, current, satisfyingSet(chainCase.check, context));
    const region = subtract(space, satisfying, covered);
    covered = union(space, covered, satisfying);
    if (region.length === 0) {
      return;
    }
    const branchType: BranchType = index === 0 ? 'if' : 'elif';
    const narrowed = narrowSnapshot(outcome.snapshot, new Map([[chain.attribute, region]]));
    const branched = extend(outcome, narrowed, {
      kind: 'simple',
      source: 'postcondition',
      branchType,
      attribute: chain.attribute,
      operator: chainCase.check.operator,
      value: resolveCheckValue(chainCase.check, context.parameters),
    });
    results.push(...applyEffectList(chainCase.then, [branched], context));
  });

  const remainder = subtract(space, current, covered);
  if (remainder.length > 0) {
    const narrowed = narrowSnapshot(outcome.snapshot, new Map([[chain.attribute, remainder]]));
    const branched = extend(outcome, narrowed, {
      kind: 'simple',
      source: 'postcondition',
      branchType: 'else',
      attribute: chain.attribute,
      operator: 'in',
      value: remainder,
    });
    if (chain.otherwise) {
      results.push(...applyEffectList(chain.otherwise, [branched], context));
    } else {
      const head = chain.cases[0];
      const description = head ? describeCondition(head.check) : chain.attribute;
      results.push({
        ...branched,
        error: new RequiredPostconditionError(description).message,
      });
    }
  }

  return results;
}

function branchOnCompound(
  effect: ConditionalEffect,
  outcome: EffectOutcome,
  context: EvaluationContext
): EffectOutcome[] {
  const split = splitCondition(effect.condition, outcome.snapshot, context);
  const results: EffectOutcome[] = [];

  for (const branch of split.success) {
    const narrowed = narrowSnapshot(outcome.snapshot, branch.narrowing);
    const described = describeBranch(effect.condition, branch, 'postcondition', 'if');
    results.push(...applyEffectList(effect.then, [extend(outcome, narrowed, described)], context));
  }
  for (const branch of split.fail) {
    const narrowed = narrowSnapshot(outcome.snapshot, branch.narrowing);
    const described = describeBranch(effect.condition, branch, 'postcondition', 'else');
    const branched = extend(outcome, narrowed, described);
    results.push(
      ...(effect.else
        ? applyEffectList(effect.else, [branched], context)
        : [unsatisfied(effect, branched, narrowed)])
    );
  }

  return results;
}

// ============================================================================
// Change log
// ============================================================================

/**
 * Differences between two snapshots. Attributes an effect wrote are value
 * changes; other shrunk sets are narrowings.
 */
export function diffSnapshots(
  before: WorldSnapshot,
  after: WorldSnapshot,
  written: ReadonlySet<string> = new Set()
): Change[] {
  const changes: Change[] = [];
  for (const [attribute, next] of after.attributes) {
    const previous = before.attributes.get(attribute);
    if (!previous) {
      continue;
    }
    if (!sameMembers(previous.values, next.values)) {
      const kind =
        !written.has(attribute) && isSubset(next.values, previous.values)
          ? 'narrowing'
          : 'value';
      changes.push({ attribute, kind, before: previous.values, after: next.values });
    }
    if (previous.trend !== next.trend) {
      changes.push({ attribute, kind: 'trend', before: previous.trend, after: next.trend });
    }
  }
  return changes;
}

// ============================================================================
// Action application
// ============================================================================

/**
 * Checks request parameters against the action's declarations and fills
 * in defaults. Throws ValidationError before anything is evaluated.
 */
export function validateParameters(
  action: Action,
  supplied: ParameterValues = {}
): Record<string, string> {
  const declared = new Set(action.parameters.map((parameter) => parameter.name));
  for (const name of Object.keys(supplied)) {
    if (!declared.has(name)) {
      throw new ValidationError(`Unknown parameter: ${name}`);
    }
  }

  const resolved: Record<string, string> = {};
  for (const parameter of action.parameters) {
    const value = supplied[parameter.name] ?? parameter.default;
    if (value === undefined) {
      if (parameter.required) {
        throw new ValidationError(`Missing required parameter: ${parameter.name}`);
      }
      continue;
    }
    if (parameter.choices && !parameter.choices.includes(value)) {
      throw new ValidationError(
        `Parameter ${parameter.name} must be one of [${parameter.choices.join(', ')}]`
      );
    }
    resolved[parameter.name] = value;
  }
  return resolved;
}

/** Object type of actions every object type may take. */
export const GENERIC_OBJECT_TYPE = 'generic';

/**
 * Specializes a generic action for one object type. Behavior preconditions
 * and effects follow the action's own.
 */
export function mergeBehavior(action: Action, objectType: ObjectType): Action {
  const behavior = objectType.behaviors?.[action.name];
  return {
    ...action,
    objectType: objectType.name,
    preconditions: behavior
      ? [...action.preconditions, ...behavior.preconditions]
      : action.preconditions,
    effects: behavior ? [...action.effects, ...behavior.effects] : action.effects,
  };
}

export interface ResolvedAction {
  action: Action;
  objectType: ObjectType;
  parameters: Record<string, string>;
}

export function resolveAction(
  kb: KnowledgeBase,
  snapshot: WorldSnapshot,
  request: ActionRequest
): ResolvedAction {
  const action = kb.getAction(request.action);
  if (!action) {
    throw new ValidationError(`Unknown action: ${request.action}`);
  }
  const generic = action.objectType === GENERIC_OBJECT_TYPE;
  if (!generic && action.objectType !== snapshot.objectType) {
    throw new ValidationError(
      `Action ${action.name} applies to '${action.objectType}', not '${snapshot.objectType}'`
    );
  }
  const objectType = kb.getObjectType(snapshot.objectType);
  if (!objectType) {
    throw new ValidationError(`Unknown object type: ${snapshot.objectType}`);
  }
  return {
    action: generic ? mergeBehavior(action, objectType) : action,
    objectType,
    parameters: validateParameters(action, request.parameters),
  };
}

/**
 * Applies one action to one snapshot and returns every branch outcome.
 *
 * Trends are resolved first, so a trending attribute is read as the set of
 * levels it may have reached.
 */
export function applyAction(
  kb: KnowledgeBase,
  snapshot: WorldSnapshot,
  request: ActionRequest
): TransitionResult[] {
  const { action, objectType, parameters } = resolveAction(kb, snapshot, request);
  const context: EvaluationContext = { kb, objectType, parameters };
  const resolved = resolveTrends(kb, objectType, snapshot);

  const rejected = (state: WorldSnapshot, branchConditions: readonly BranchCondition[]): TransitionResult => ({
    status: 'rejected',
    before: snapshot,
    after: null,
    state,
    changes: diffSnapshots(snapshot, state),
    violations: [],
    branchConditions,
  });

  const start: EffectOutcome = { snapshot: resolved, written: new Set(), branchConditions: [] };
  const precondition = evaluateAll(action.preconditions, resolved, context);
  const results: TransitionResult[] = [];
  let admitted: EffectOutcome[] = [];

  if (precondition.truth === 'true') {
    admitted = [start];
  } else if (precondition.truth === 'false') {
    results.push(rejected(resolved, []));
  } else {
    const condition =
      action.preconditions.length === 1 && action.preconditions[0]
        ? action.preconditions[0]
        : { type: 'and' as const, items: action.preconditions };
    const split = splitCondition(condition, resolved, context);
    admitted = split.success.map((branch) =>
      extend(
        start,
        narrowSnapshot(resolved, branch.narrowing),
        describeBranch(condition, branch, 'precondition', 'success')
      )
    );
    for (const branch of split.fail) {
      const state = narrowSnapshot(resolved, branch.narrowing);
      results.push(
        rejected(state, [describeBranch(condition, branch, 'precondition', 'fail')])
      );
    }
  }

  const outcomes = applyEffectList(action.effects, admitted, context);
  const effected = outcomes.map((outcome): TransitionResult => {
    const changes = diffSnapshots(snapshot, outcome.snapshot, outcome.written);
    if (outcome.error !== undefined) {
      return {
        status: 'error',
        before: snapshot,
        after: null,
        state: outcome.snapshot,
        changes,
        violations: [],
        branchConditions: outcome.branchConditions,
        error: outcome.error,
      };
    }
    const violations = checkConstraints(objectType, outcome.snapshot, context);
    return {
      status: hasViolation(violations) ? 'constraint_violated' : 'ok',
      before: snapshot,
      after: outcome.snapshot,
      state: outcome.snapshot,
      changes: [
        ...changes,
        ...constraintChanges(objectType, violations, snapshot, outcome.snapshot),
      ],
      violations,
      branchConditions: outcome.branchConditions,
    };
  });

  return [...effected, ...results];
}

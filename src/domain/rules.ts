/**
 * Ternary condition evaluation.
 *
 * Conditions are evaluated against a snapshot whose attributes may hold
 * several candidate levels. A check is true only when every candidate
 * satisfies it and false only when none does; anything else is unknown,
 * and the unknown result names the attributes (witnesses) that would have
 * to be narrowed to decide it.
 *
 * Non-goals (not included):
 * - Branch generation (belongs in branching.ts)
 * - Side effects of any kind
 */

import type {
  AttributeCheck,
  CheckValue,
  Condition,
  KnowledgeBase,
  Level,
  ObjectType,
  ParameterCheck,
  ParameterRef,
  ParameterValues,
} from './model.js';
import { ValidationError } from './errors.js';
import { expand, intersect } from './space.js';
import { readValue, resolveAttribute, type WorldSnapshot } from './state.js';

export type Truth = 'true' | 'false' | 'unknown';

export interface Evaluation {
  truth: Truth;
  /** Attributes an unknown result depends on; empty otherwise */
  witnesses: readonly string[];
}

export interface EvaluationContext {
  kb: KnowledgeBase;
  objectType: ObjectType;
  parameters: ParameterValues;
}

const TRUE: Evaluation = { truth: 'true', witnesses: [] };
const FALSE: Evaluation = { truth: 'false', witnesses: [] };

function unknown(witnesses: Iterable<string>): Evaluation {
  return { truth: 'unknown', witnesses: [...new Set(witnesses)] };
}

// ============================================================================
// Attribute checks
// ============================================================================

export function isParameterRef(value: CheckValue): value is ParameterRef {
  return typeof value === 'object' && 'type' in value && value.type === 'parameter_ref';
}

export function resolveParameterRef(
  ref: ParameterRef,
  parameters: ParameterValues
): string {
  const supplied = parameters[ref.name];
  if (supplied === undefined) {
    throw new ValidationError(`Missing required parameter: ${ref.name}`);
  }
  return supplied;
}

/**
 * The pivot of an attribute check, with parameter references replaced by
 * the request's parameter values.
 */
export function resolveCheckValue(
  check: AttributeCheck,
  parameters: ParameterValues
): Level | readonly Level[] {
  return isParameterRef(check.value)
    ? resolveParameterRef(check.value, parameters)
    : check.value;
}

/**
 * Levels of the target's space that satisfy the check.
 */
export function satisfyingSet(
  check: AttributeCheck,
  context: EvaluationContext
): Level[] {
  const { space } = resolveAttribute(context.kb, context.objectType, check.target);
  return expand(space, check.operator, resolveCheckValue(check, context.parameters));
}

function evaluateAttributeCheck(
  check: AttributeCheck,
  snapshot: WorldSnapshot,
  context: EvaluationContext
): Evaluation {
  const { space } = resolveAttribute(context.kb, context.objectType, check.target);
  const current = readValue(snapshot, check.target).values;
  const satisfying = satisfyingSet(check, context);
  const overlap = intersect(space, current, satisfying);

  if (overlap.length === current.length) {
    return TRUE;
  }
  if (overlap.length === 0) {
    return FALSE;
  }
  return unknown([check.target]);
}

// ============================================================================
// Parameter checks
// ============================================================================

function evaluateParameterCheck(
  check: ParameterCheck,
  parameters: ParameterValues
): Evaluation {
  const hasValid = check.validValues !== undefined;
  const hasExpected = check.expectedValue !== undefined;
  if (hasValid === hasExpected) {
    throw new ValidationError(
      `Parameter check on '${check.parameter}' needs exactly one of validValues or expectedValue`
    );
  }

  const supplied = parameters[check.parameter];
  if (supplied === undefined) {
    return FALSE;
  }
  if (check.validValues !== undefined) {
    return check.validValues.includes(supplied) ? TRUE : FALSE;
  }
  return supplied === check.expectedValue ? TRUE : FALSE;
}

// ============================================================================
// Evaluation
// ============================================================================

export function evaluate(
  condition: Condition,
  snapshot: WorldSnapshot,
  context: EvaluationContext
): Evaluation {
  switch (condition.type) {
    case 'attribute_check':
      return evaluateAttributeCheck(condition, snapshot, context);

    case 'parameter_check':
      return evaluateParameterCheck(condition, context.parameters);

    case 'and': {
      const witnesses: string[] = [];
      for (const item of condition.items) {
        const result = evaluate(item, snapshot, context);
        if (result.truth === 'false') {
          return FALSE;
        }
        witnesses.push(...result.witnesses);
      }
      return witnesses.length > 0 ? unknown(witnesses) : TRUE;
    }

    case 'or': {
      const witnesses: string[] = [];
      for (const item of condition.items) {
        const result = evaluate(item, snapshot, context);
        if (result.truth === 'true') {
          return TRUE;
        }
        witnesses.push(...result.witnesses);
      }
      return witnesses.length > 0 ? unknown(witnesses) : FALSE;
    }

    case 'not': {
      const result = evaluate(condition.item, snapshot, context);
      if (result.truth === 'true') return FALSE;
      if (result.truth === 'false') return TRUE;
      return result;
    }

    case 'implication':
      return evaluate(asDisjunction(condition.if, condition.then), snapshot, context);
  }
}

/** `if -> then` as `not(if) or then`. */
export function asDisjunction(antecedent: Condition, consequent: Condition): Condition {
  return { type: 'or', items: [{ type: 'not', item: antecedent }, consequent] };
}

/**
 * Evaluates a list of conditions as an implicit AND.
 */
export function evaluateAll(
  conditions: readonly Condition[],
  snapshot: WorldSnapshot,
  context: EvaluationContext
): Evaluation {
  return evaluate({ type: 'and', items: conditions }, snapshot, context);
}

/**
 * Attribute paths a condition reads, in first-seen order.
 */
export function conditionTargets(condition: Condition): string[] {
  const targets = new Set<string>();
  const visit = (current: Condition): void => {
    switch (current.type) {
      case 'attribute_check':
        targets.add(current.target);
        return;
      case 'parameter_check':
        return;
      case 'and':
      case 'or':
        current.items.forEach(visit);
        return;
      case 'not':
        visit(current.item);
        return;
      case 'implication':
        visit(current.if);
        visit(current.then);
        return;
    }
  };
  visit(condition);
  return [...targets];
}

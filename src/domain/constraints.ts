/**
 * Dependency constraints checked after effects are applied.
 *
 * A violated constraint leaves the effects in place and marks the node
 * `constraint_violated`. Constraints never branch: an unknown result is
 * recorded as a deferred violation and the status is left alone.
 */

import type { DependencyConstraint, Level, ObjectType } from './model.js';
import { conditionTargets, evaluate, type EvaluationContext } from './rules.js';
import { readValue, type WorldSnapshot } from './state.js';

export type ViolationOutcome = 'violated' | 'unknown';

export interface ConstraintViolation {
  constraint: string;
  outcome: ViolationOutcome;
  /** Attributes an unknown outcome depends on */
  witnesses: readonly string[];
}

/**
 * Change-log entry for an attribute a failing or undecided constraint is
 * triggered by. Values are never rewritten, so `after` is the post-effect
 * set the constraint was checked against.
 */
export interface ConstraintChange {
  attribute: string;
  kind: 'constraint';
  constraint: string;
  outcome: ViolationOutcome;
  before: readonly Level[];
  after: readonly Level[];
}

export function constraintName(constraint: DependencyConstraint, index: number): string {
  return constraint.name ?? `dependency_${index}`;
}

export function checkConstraints(
  objectType: ObjectType,
  snapshot: WorldSnapshot,
  context: EvaluationContext
): ConstraintViolation[] {
  const violations: ConstraintViolation[] = [];

  objectType.constraints.forEach((constraint, index) => {
    const name = constraintName(constraint, index);
    const trigger = evaluate(constraint.condition, snapshot, context);
    if (trigger.truth === 'false') {
      return;
    }
    const required = evaluate(constraint.requires, snapshot, context);
    if (required.truth === 'true') {
      return;
    }

    if (trigger.truth === 'true' && required.truth === 'false') {
      violations.push({ constraint: name, outcome: 'violated', witnesses: [] });
      return;
    }
    violations.push({
      constraint: name,
      outcome: 'unknown',
      witnesses: [...new Set([...trigger.witnesses, ...required.witnesses])],
    });
  });

  return violations;
}

export function hasViolation(violations: readonly ConstraintViolation[]): boolean {
  return violations.some((violation) => violation.outcome === 'violated');
}

/**
 * One entry per trigger attribute of every reported constraint, in
 * constraint order.
 */
export function constraintChanges(
  objectType: ObjectType,
  violations: readonly ConstraintViolation[],
  before: WorldSnapshot,
  after: WorldSnapshot
): ConstraintChange[] {
  const changes: ConstraintChange[] = [];
  objectType.constraints.forEach((constraint, index) => {
    const name = constraintName(constraint, index);
    const violation = violations.find((candidate) => candidate.constraint === name);
    if (!violation) {
      return;
    }
    for (const attribute of conditionTargets(constraint.condition)) {
      changes.push({
        attribute,
        kind: 'constraint',
        constraint: name,
        outcome: violation.outcome,
        before: readValue(before, attribute).values,
        after: readValue(after, attribute).values,
      });
    }
  });
  return changes;
}

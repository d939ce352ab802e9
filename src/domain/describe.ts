/**
 * Plain-text descriptions of conditions, branches, nodes and events.
 *
 * Used by the developer scripts and error messages. Output is terse and
 * stable so tests can assert it.
 */

import type {
  CheckValue,
  Condition,
  Level,
  Operator,
} from './model.js';
import type { BranchClause, BranchCondition } from './branching.js';
import type { SimulationEvent } from './events.js';
import type { TreeNode } from './graph.js';
import type { AttributeValue } from './state.js';

const SYMBOLS: Record<Operator, string> = {
  equals: '==',
  not_equals: '!=',
  lt: '<',
  lte: '<=',
  gt: '>',
  gte: '>=',
  in: 'in',
  not_in: 'not in',
};

export function describeLevels(levels: readonly Level[]): string {
  return levels.length === 1 && levels[0] !== undefined
    ? levels[0]
    : `{${levels.join(', ')}}`;
}

function describeCheckValue(value: CheckValue): string {
  if (typeof value === 'string') {
    return value;
  }
  if ('type' in value) {
    return `$${value.name}`;
  }
  return `{${value.join(', ')}}`;
}

function nested(condition: Condition): string {
  const text = describeCondition(condition);
  return condition.type === 'and' ||
    condition.type === 'or' ||
    condition.type === 'implication'
    ? `(${text})`
    : text;
}

export function describeCondition(condition: Condition): string {
  switch (condition.type) {
    case 'attribute_check':
      return `${condition.target} ${SYMBOLS[condition.operator]} ${describeCheckValue(condition.value)}`;
    case 'parameter_check':
      return condition.validValues !== undefined
        ? `${condition.parameter} in {${condition.validValues.join(', ')}}`
        : `${condition.parameter} == ${condition.expectedValue ?? ''}`;
    case 'and':
      return condition.items.map(nested).join(' and ');
    case 'or':
      return condition.items.map(nested).join(' or ');
    case 'not':
      return `not ${nested(condition.item)}`;
    case 'implication':
      return `${nested(condition.if)} implies ${nested(condition.then)}`;
  }
}

export function describeClause(clause: BranchClause): string {
  const value = typeof clause.value === 'string' ? clause.value : `{${clause.value.join(', ')}}`;
  return `${clause.attribute} ${SYMBOLS[clause.operator]} ${value}`;
}

/**
 * e.g. "precondition/fail: battery.level == empty"
 */
export function describeBranchCondition(condition: BranchCondition): string {
  const prefix = `${condition.source}/${condition.branchType}`;
  if (condition.kind === 'simple') {
    return `${prefix}: ${describeClause(condition)}`;
  }
  const clauses = condition.subConditions.map(describeClause).join('; ');
  return `${prefix} (${condition.compoundType}): ${clauses}`;
}

export function describeValue(value: AttributeValue): string {
  const levels = describeLevels(value.values);
  return value.trend === 'none' ? levels : `${levels} (${value.trend})`;
}

export function describeNode(node: TreeNode): string {
  const head = `${node.id} ${node.actionName ?? 'root'} [${node.status}]`;
  const branches = node.edges
    .flatMap((edge) => edge.branchConditions)
    .map(describeBranchCondition);
  const parts = [head, ...branches];
  if (node.error !== undefined) {
    parts.push(`error: ${node.error}`);
  }
  return parts.join(' | ');
}

export function describeSnapshotLines(node: TreeNode): string[] {
  return [...node.snapshot.attributes.entries()].map(
    ([key, value]) => `${key} = ${describeValue(value)}`
  );
}

export function describeEvent(event: SimulationEvent): string {
  switch (event.type) {
    case 'layer_started':
      return `layer ${event.layer}: ${event.action} on ${event.frontier} node(s)`;
    case 'branch_split':
      return `${event.parentId} split into ${event.childIds.join(', ')}`;
    case 'node_merged':
      return `${event.parentId} merged into ${event.nodeId}`;
    case 'action_rejected':
      return `${event.action} rejected at ${event.nodeId}`;
    case 'constraint_violated':
      return `${event.nodeId} violates ${event.constraints.join(', ')}`;
    case 'constraint_deferred':
      return `${event.nodeId} cannot decide ${event.constraints.join(', ')}`;
    case 'postcondition_unsatisfied':
      return `${event.nodeId}: ${event.message}`;
    case 'run_halted':
      return `halted at ${event.nodeId} (${event.code}): ${event.message}`;
  }
}

/**
 * Knowledge-base validation.
 *
 * Checks definitions before any simulation runs, so malformed actions are
 * reported with their rule name instead of failing mid-run. Each rule
 * pushes an issue and validation continues; nothing throws here.
 */

import type {
  Action,
  AttributeCheck,
  AttributeDefinition,
  CheckValue,
  Condition,
  Effect,
  KnowledgeBaseDefinition,
  ObjectType,
  QualitativeSpace,
} from './model.js';
import type { KnowledgeBaseIssue } from './errors.js';
import { conditionTargets, isParameterRef } from './rules.js';
import { parsePath } from './state.js';
import { GENERIC_OBJECT_TYPE } from './transitions.js';

const ORDERING_OPERATORS = new Set(['lt', 'lte', 'gt', 'gte']);

interface Scope {
  subject: string;
  objectType: ObjectType;
  spaces: ReadonlyMap<string, QualitativeSpace>;
  /** Declared parameter names; null outside an action */
  parameters: ReadonlySet<string> | null;
  issues: KnowledgeBaseIssue[];
}

function report(scope: Scope, rule: string, message: string): void {
  scope.issues.push({ subject: scope.subject, rule, message });
}

function lookup(objectType: ObjectType, key: string): AttributeDefinition | undefined {
  const path = parsePath(key);
  return path.part === null
    ? objectType.globals?.[path.attribute]
    : objectType.parts[path.part]?.[path.attribute];
}

function targetSpace(scope: Scope, target: string): QualitativeSpace | undefined {
  const definition = lookup(scope.objectType, target);
  if (!definition) {
    report(scope, 'target-exists', `unknown attribute '${target}' on '${scope.objectType.name}'`);
    return undefined;
  }
  return scope.spaces.get(definition.space);
}

function checkParameterRef(scope: Scope, name: string): void {
  if (scope.parameters === null) {
    report(scope, 'parameter-ref-context', `parameter '${name}' referenced outside an action`);
  } else if (!scope.parameters.has(name)) {
    report(scope, 'parameter-ref-declared', `parameter '${name}' is not declared`);
  }
}

function checkLevels(
  scope: Scope,
  space: QualitativeSpace,
  target: string,
  value: CheckValue
): void {
  if (isParameterRef(value)) {
    checkParameterRef(scope, value.name);
    return;
  }
  const levels = typeof value === 'string' ? [value] : value;
  for (const level of levels) {
    if (!space.levels.includes(level)) {
      report(scope, 'level-in-space', `'${level}' is not a level of '${space.id}' (${target})`);
    }
  }
}

function checkAttributeCheck(scope: Scope, check: AttributeCheck): void {
  const space = targetSpace(scope, check.target);
  if (!space) {
    return;
  }
  if (ORDERING_OPERATORS.has(check.operator) && Array.isArray(check.value)) {
    report(
      scope,
      'ordering-pivot',
      `operator '${check.operator}' on '${check.target}' needs a single level`
    );
  }
  checkLevels(scope, space, check.target, check.value);
}

function checkCondition(scope: Scope, condition: Condition): void {
  switch (condition.type) {
    case 'attribute_check':
      checkAttributeCheck(scope, condition);
      return;
    case 'parameter_check':
      if ((condition.validValues === undefined) === (condition.expectedValue === undefined)) {
        report(
          scope,
          'parameter-check-shape',
          `check on '${condition.parameter}' needs exactly one of validValues or expectedValue`
        );
      }
      checkParameterRef(scope, condition.parameter);
      return;
    case 'and':
    case 'or':
      if (condition.items.length === 0) {
        report(scope, 'compound-non-empty', `'${condition.type}' has no items`);
      }
      condition.items.forEach((item) => checkCondition(scope, item));
      return;
    case 'not':
      checkCondition(scope, condition.item);
      return;
    case 'implication':
      checkCondition(scope, condition.if);
      checkCondition(scope, condition.then);
      return;
  }
}

function checkEffects(
  scope: Scope,
  effects: readonly Effect[],
  ancestorTargets: ReadonlySet<string>
): void {
  for (const effect of effects) {
    switch (effect.type) {
      case 'set_attribute': {
        const definition = lookup(scope.objectType, effect.target);
        const space = targetSpace(scope, effect.target);
        if (definition && !definition.mutable) {
          report(scope, 'target-mutable', `'${effect.target}' is not mutable`);
        }
        if (space) {
          checkLevels(scope, space, effect.target, effect.value);
        }
        break;
      }
      case 'set_trend':
        targetSpace(scope, effect.target);
        break;
      case 'conditional': {
        checkCondition(scope, effect.condition);
        const targets = conditionTargets(effect.condition);
        if (
          ancestorTargets.size > 0 &&
          targets.some((target) => !ancestorTargets.has(target))
        ) {
          report(
            scope,
            'flat-branching',
            `nested conditional on '${targets.join(', ')}' branches on an attribute its parent does not`
          );
        }
        const inherited = new Set([...ancestorTargets, ...targets]);
        checkEffects(scope, effect.then, inherited);
        checkEffects(scope, effect.else ?? [], inherited);
        break;
      }
    }
  }
}

function validateSpaces(
  spaces: readonly QualitativeSpace[],
  issues: KnowledgeBaseIssue[]
): Map<string, QualitativeSpace> {
  const byId = new Map<string, QualitativeSpace>();
  for (const space of spaces) {
    const subject = `space ${space.id}`;
    if (byId.has(space.id)) {
      issues.push({ subject, rule: 'space-unique', message: 'space id is defined twice' });
    }
    if (space.levels.length === 0) {
      issues.push({ subject, rule: 'levels-non-empty', message: 'space has no levels' });
    }
    if (new Set(space.levels).size !== space.levels.length) {
      issues.push({ subject, rule: 'levels-unique', message: 'space has duplicate levels' });
    }
    byId.set(space.id, space);
  }
  return byId;
}

function parameterNames(action: Action): Set<string> {
  return new Set(action.parameters.map((parameter) => parameter.name));
}

function validateObjectType(
  objectType: ObjectType,
  spaces: ReadonlyMap<string, QualitativeSpace>,
  actions: ReadonlyMap<string, Action>,
  issues: KnowledgeBaseIssue[]
): void {
  const scope: Scope = {
    subject: `object ${objectType.name}`,
    objectType,
    spaces,
    parameters: null,
    issues,
  };
  const tables = [
    ...Object.entries(objectType.parts).map(([part, table]) => ({ prefix: `${part}.`, table })),
    { prefix: '', table: objectType.globals ?? {} },
  ];

  for (const { prefix, table } of tables) {
    for (const [name, definition] of Object.entries(table)) {
      const key = `${prefix}${name}`;
      const space = spaces.get(definition.space);
      if (!space) {
        report(scope, 'space-exists', `'${key}' uses unknown space '${definition.space}'`);
        continue;
      }
      if (definition.default !== 'unknown') {
        const defaults = typeof definition.default === 'string'
          ? [definition.default]
          : definition.default;
        if (defaults.length === 0) {
          report(scope, 'default-non-empty', `'${key}' has an empty default`);
        }
        checkLevels(scope, space, key, defaults);
      }
    }
  }

  for (const constraint of objectType.constraints) {
    checkCondition(scope, constraint.condition);
    checkCondition(scope, constraint.requires);
  }

  for (const [name, behavior] of Object.entries(objectType.behaviors ?? {})) {
    const action = actions.get(name);
    const behaviorScope: Scope = {
      ...scope,
      subject: `object ${objectType.name} behavior ${name}`,
      parameters: action ? parameterNames(action) : null,
    };
    if (!action || action.objectType !== GENERIC_OBJECT_TYPE) {
      report(behaviorScope, 'behavior-action-exists', `no generic action named '${name}'`);
      continue;
    }
    behavior.preconditions.forEach((condition) => checkCondition(behaviorScope, condition));
    checkEffects(behaviorScope, behavior.effects, new Set());
  }
}

function checkActionBody(scope: Scope, action: Action): void {
  action.preconditions.forEach((condition) => checkCondition(scope, condition));
  checkEffects(scope, action.effects, new Set());
}

function validateAction(
  action: Action,
  objectTypes: ReadonlyMap<string, ObjectType>,
  spaces: ReadonlyMap<string, QualitativeSpace>,
  issues: KnowledgeBaseIssue[]
): void {
  const subject = `action ${action.name}`;
  for (const parameter of action.parameters) {
    if (
      parameter.default !== undefined &&
      parameter.choices !== undefined &&
      !parameter.choices.includes(parameter.default)
    ) {
      issues.push({
        subject,
        rule: 'parameter-default',
        message: `default of '${parameter.name}' is not one of its choices`,
      });
    }
  }

  // A generic body runs on every object type, so it is checked against each
  if (action.objectType === GENERIC_OBJECT_TYPE) {
    for (const objectType of objectTypes.values()) {
      checkActionBody(
        {
          subject: `${subject} on ${objectType.name}`,
          objectType,
          spaces,
          parameters: parameterNames(action),
          issues,
        },
        action
      );
    }
    return;
  }

  const objectType = objectTypes.get(action.objectType);
  if (!objectType) {
    issues.push({
      subject,
      rule: 'object-type-exists',
      message: `unknown object type '${action.objectType}'`,
    });
    return;
  }
  checkActionBody(
    { subject, objectType, spaces, parameters: parameterNames(action), issues },
    action
  );
}

/**
 * Returns every issue found in the definitions; an empty list means the
 * knowledge base can be built.
 */
export function validateKnowledgeBase(
  definition: KnowledgeBaseDefinition
): KnowledgeBaseIssue[] {
  const issues: KnowledgeBaseIssue[] = [];
  const spaces = validateSpaces(definition.spaces, issues);

  const actions = new Map<string, Action>();
  for (const action of definition.actions) {
    actions.set(action.name, action);
  }

  const objectTypes = new Map<string, ObjectType>();
  for (const objectType of definition.objectTypes) {
    if (objectTypes.has(objectType.name)) {
      issues.push({
        subject: `object ${objectType.name}`,
        rule: 'object-unique',
        message: 'object type is defined twice',
      });
    }
    objectTypes.set(objectType.name, objectType);
    validateObjectType(objectType, spaces, actions, issues);
  }

  const actionNames = new Set<string>();
  for (const action of definition.actions) {
    if (actionNames.has(action.name)) {
      issues.push({
        subject: `action ${action.name}`,
        rule: 'action-unique',
        message: 'action is defined twice',
      });
    }
    actionNames.add(action.name);
    validateAction(action, objectTypes, spaces, issues);
  }

  return issues;
}

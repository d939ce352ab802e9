/**
 * Definitions for the qualitative model: spaces, object types, conditions,
 * effects and actions.
 *
 * This file defines TypeScript types only (no logic). Definitions are
 * plain data so they can be written in code or loaded from YAML.
 *
 * Non-goals (not included):
 * - Numeric or continuous attributes
 * - Probabilities on branches
 */

// ============================================================================
// Spaces
// ============================================================================

export type Level = string;

/**
 * QualitativeSpace: a finite, ordered set of levels.
 *
 * Index order is the comparison order for lt/lte/gt/gte.
 */
export interface QualitativeSpace {
  id: string;
  name: string;
  levels: readonly Level[];
}

export type Trend = 'up' | 'down' | 'none';

export type Operator =
  | 'equals'
  | 'not_equals'
  | 'lt'
  | 'lte'
  | 'gt'
  | 'gte'
  | 'in'
  | 'not_in';

// ============================================================================
// Conditions
// ============================================================================

/** A value supplied at call time through an action parameter. */
export interface ParameterRef {
  type: 'parameter_ref';
  name: string;
}

export type CheckValue = Level | readonly Level[] | ParameterRef;

export interface AttributeCheck {
  type: 'attribute_check';
  /** Attribute path key, e.g. "battery.level" */
  target: string;
  operator: Operator;
  value: CheckValue;
}

/**
 * Checks a parameter supplied with the action request.
 *
 * Exactly one of validValues / expectedValue is set.
 */
export interface ParameterCheck {
  type: 'parameter_check';
  parameter: string;
  validValues?: readonly string[];
  expectedValue?: string;
}

export interface AndCondition {
  type: 'and';
  items: readonly Condition[];
}

export interface OrCondition {
  type: 'or';
  items: readonly Condition[];
}

export interface NotCondition {
  type: 'not';
  item: Condition;
}

export interface ImplicationCondition {
  type: 'implication';
  if: Condition;
  then: Condition;
}

export type Condition =
  | AttributeCheck
  | ParameterCheck
  | AndCondition
  | OrCondition
  | NotCondition
  | ImplicationCondition;

// ============================================================================
// Effects
// ============================================================================

export interface SetAttributeEffect {
  type: 'set_attribute';
  target: string;
  value: Level | ParameterRef;
}

export interface SetTrendEffect {
  type: 'set_trend';
  target: string;
  direction: Trend;
}

/**
 * Conditional effect. An elif is written as an `else` holding exactly one
 * conditional on the same attribute.
 */
export interface ConditionalEffect {
  type: 'conditional';
  condition: Condition;
  then: readonly Effect[];
  else?: readonly Effect[];
}

export type Effect = SetAttributeEffect | SetTrendEffect | ConditionalEffect;

// ============================================================================
// Actions
// ============================================================================

export interface ActionParameter {
  name: string;
  /** Allowed values; any string when omitted */
  choices?: readonly string[];
  required: boolean;
  default?: string;
}

export interface Action {
  name: string;
  /** An object type name, or 'generic' for actions any object may take */
  objectType: string;
  description?: string;
  parameters: readonly ActionParameter[];
  /** Implicitly AND-ed */
  preconditions: readonly Condition[];
  /** Applied in order */
  effects: readonly Effect[];
}

export type ParameterValues = Readonly<Record<string, string>>;

export interface ActionRequest {
  action: string;
  parameters?: ParameterValues;
}

// ============================================================================
// Object Types
// ============================================================================

/** 'unknown' means the whole space. */
export type AttributeDefault = Level | readonly Level[] | 'unknown';

export interface AttributeDefinition {
  space: string;
  default: AttributeDefault;
  mutable: boolean;
}

export type AttributeTable = Readonly<Record<string, AttributeDefinition>>;

/**
 * Dependency rule: whenever `condition` holds, `requires` must hold too.
 */
export interface DependencyConstraint {
  type: 'dependency';
  name?: string;
  condition: Condition;
  requires: Condition;
}

/**
 * Object-specific body of a generic action, keyed by action name. Its
 * preconditions and effects run after the action's own.
 */
export interface ObjectBehavior {
  preconditions: readonly Condition[];
  effects: readonly Effect[];
}

export interface ObjectType {
  name: string;
  parts: Readonly<Record<string, AttributeTable>>;
  /** Attributes that belong to the object itself, addressed without a part */
  globals?: AttributeTable;
  constraints: readonly DependencyConstraint[];
  behaviors?: Readonly<Record<string, ObjectBehavior>>;
}

// ============================================================================
// Knowledge Base
// ============================================================================

/**
 * KnowledgeBase: read-only lookup of every definition the engine needs.
 *
 * Injected into the evaluator, applier and runner; nothing is global.
 */
export interface KnowledgeBase {
  getSpace(id: string): QualitativeSpace | undefined;
  getObjectType(name: string): ObjectType | undefined;
  getAction(name: string): Action | undefined;
  listSpaces(): readonly QualitativeSpace[];
  listObjectTypes(): readonly ObjectType[];
  listActions(): readonly Action[];
}

/**
 * Raw definitions a knowledge base is built from.
 */
export interface KnowledgeBaseDefinition {
  spaces: readonly QualitativeSpace[];
  objectTypes: readonly ObjectType[];
  actions: readonly Action[];
}

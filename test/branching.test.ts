/**
 * Branch generator tests: partitions and De Morgan splits.
 */

import { describe, it, expect } from 'vitest';
import {
  describeBranch,
  narrowSnapshot,
  splitCondition,
  type Branch,
} from '../src/domain/branching.js';
import type { AttributeCheck, Condition } from '../src/domain/model.js';
import type { EvaluationContext } from '../src/domain/rules.js';
import { createRootSnapshot, readValue } from '../src/domain/state.js';
import { union } from '../src/domain/space.js';
import { batteryLevel } from '../src/infra/flashlight/spaces.js';
import { catalog } from '../src/kb/catalog.js';
import { flashlight } from '../src/infra/flashlight/object.js';

// ============================================================================
// Test Helpers
// ============================================================================

const context: EvaluationContext = { kb: catalog, objectType: flashlight, parameters: {} };

/** Battery and brightness both unknown. */
const state = createRootSnapshot(catalog, flashlight, {
  'bulb.brightness': ['none', 'low', 'medium', 'high'],
});

function check(
  target: string,
  operator: AttributeCheck['operator'],
  value: AttributeCheck['value']
): AttributeCheck {
  return { type: 'attribute_check', target, operator, value };
}

function narrowings(branches: readonly Branch[]): Record<string, readonly string[]>[] {
  return branches.map((branch) => Object.fromEntries(branch.narrowing));
}

const batteryAtLeastMedium = check('battery.level', 'gte', 'medium');
const brightnessHigh = check('bulb.brightness', 'equals', 'high');

// ============================================================================
// Simple checks
// ============================================================================

describe('simple attribute check', () => {
  it('splits into the satisfying and violating parts of the current set', () => {
    const split = splitCondition(check('battery.level', 'not_equals', 'empty'), state, context);

    expect(narrowings(split.success)).toEqual([
      { 'battery.level': ['low', 'medium', 'high', 'full'] },
    ]);
    expect(narrowings(split.fail)).toEqual([{ 'battery.level': ['empty'] }]);
    expect(split.success[0]?.clauses).toEqual([
      { attribute: 'battery.level', operator: 'not_equals', value: 'empty' },
    ]);
    expect(split.fail[0]?.clauses).toEqual([
      { attribute: 'battery.level', operator: 'equals', value: 'empty' },
    ]);
  });

  it('covers the current set exactly', () => {
    for (const level of batteryLevel.levels) {
      const split = splitCondition(check('battery.level', 'lte', level), state, context);
      const parts = [...split.success, ...split.fail].map(
        (branch) => branch.narrowing.get('battery.level') ?? batteryLevel.levels
      );
      const covered = parts.reduce<string[]>(
        (acc, part) => union(batteryLevel, acc, part),
        []
      );
      expect(covered).toEqual(readValue(state, 'battery.level').values);
    }
  });

  it('gives one unconstrained branch for a decided check', () => {
    const split = splitCondition(check('switch.position', 'equals', 'off'), state, context);
    expect(narrowings(split.success)).toEqual([{}]);
    expect(split.fail).toEqual([]);
  });
});

// ============================================================================
// Compound conditions
// ============================================================================

describe('and', () => {
  it('gives one success narrowing every item and one fail per item', () => {
    const split = splitCondition(
      { type: 'and', items: [batteryAtLeastMedium, brightnessHigh] },
      state,
      context
    );

    expect(narrowings(split.success)).toEqual([
      { 'battery.level': ['medium', 'high', 'full'], 'bulb.brightness': ['high'] },
    ]);
    expect(narrowings(split.fail)).toEqual([
      { 'battery.level': ['empty', 'low'] },
      { 'bulb.brightness': ['none', 'low', 'medium'] },
    ]);
  });

  it('ignores items that already hold', () => {
    const split = splitCondition(
      { type: 'and', items: [batteryAtLeastMedium, check('switch.position', 'equals', 'off')] },
      state,
      context
    );
    expect(split.success).toHaveLength(1);
    expect(split.fail).toHaveLength(1);
  });

  it('intersects checks on the same attribute', () => {
    const split = splitCondition(
      {
        type: 'and',
        items: [check('battery.level', 'gte', 'low'), check('battery.level', 'lte', 'high')],
      },
      state,
      context
    );

    expect(narrowings(split.success)).toEqual([
      { 'battery.level': ['low', 'medium', 'high'] },
    ]);
    expect(narrowings(split.fail)).toEqual([
      { 'battery.level': ['empty'] },
      { 'battery.level': ['full'] },
    ]);
  });

  it('drops combinations that leave no level', () => {
    const split = splitCondition(
      {
        type: 'and',
        items: [check('battery.level', 'equals', 'empty'), check('battery.level', 'equals', 'full')],
      },
      state,
      context
    );
    expect(split.success).toEqual([]);
    expect(split.fail).toHaveLength(2);
  });
});

describe('or', () => {
  it('gives one success per item and one fail narrowing every item', () => {
    const split = splitCondition(
      { type: 'or', items: [batteryAtLeastMedium, brightnessHigh] },
      state,
      context
    );

    expect(narrowings(split.success)).toEqual([
      { 'battery.level': ['medium', 'high', 'full'] },
      { 'bulb.brightness': ['high'] },
    ]);
    expect(narrowings(split.fail)).toEqual([
      { 'battery.level': ['empty', 'low'], 'bulb.brightness': ['none', 'low', 'medium'] },
    ]);
  });
});

describe('not', () => {
  it('swaps success and fail', () => {
    const inner: Condition = { type: 'and', items: [batteryAtLeastMedium, brightnessHigh] };
    const plain = splitCondition(inner, state, context);
    const negated = splitCondition({ type: 'not', item: inner }, state, context);

    expect(negated.success).toEqual(plain.fail);
    expect(negated.fail).toEqual(plain.success);
  });
});

describe('implication', () => {
  it('splits as not(if) or then', () => {
    const split = splitCondition(
      { type: 'implication', if: batteryAtLeastMedium, then: brightnessHigh },
      state,
      context
    );

    expect(narrowings(split.success)).toEqual([
      { 'battery.level': ['empty', 'low'] },
      { 'bulb.brightness': ['high'] },
    ]);
    expect(narrowings(split.fail)).toEqual([
      { 'battery.level': ['medium', 'high', 'full'], 'bulb.brightness': ['none', 'low', 'medium'] },
    ]);
  });
});

// ============================================================================
// Applying and describing branches
// ============================================================================

describe('narrowSnapshot', () => {
  it('touches only the narrowed attributes and keeps trends', () => {
    const narrowed = narrowSnapshot(state, new Map([['battery.level', ['low']]]));

    expect(readValue(narrowed, 'battery.level')).toEqual({ values: ['low'], trend: 'none' });
    expect(narrowed.attributes.get('bulb.brightness')).toBe(state.attributes.get('bulb.brightness'));
  });
});

describe('describeBranch', () => {
  it('records a single clause as a simple condition', () => {
    const condition = check('battery.level', 'not_equals', 'empty');
    const split = splitCondition(condition, state, context);
    const [fail] = split.fail;
    if (!fail) throw new Error('expected a fail branch');

    expect(describeBranch(condition, fail, 'precondition', 'fail')).toEqual({
      kind: 'simple',
      source: 'precondition',
      branchType: 'fail',
      attribute: 'battery.level',
      operator: 'equals',
      value: 'empty',
    });
  });

  it('records several clauses as a compound condition', () => {
    const condition: Condition = { type: 'or', items: [batteryAtLeastMedium, brightnessHigh] };
    const [fail] = splitCondition(condition, state, context).fail;
    if (!fail) throw new Error('expected a fail branch');

    expect(describeBranch(condition, fail, 'precondition', 'fail')).toEqual({
      kind: 'compound',
      source: 'precondition',
      branchType: 'fail',
      compoundType: 'or',
      subConditions: [
        { attribute: 'battery.level', operator: 'lt', value: 'medium' },
        { attribute: 'bulb.brightness', operator: 'not_equals', value: 'high' },
      ],
    });
  });
});

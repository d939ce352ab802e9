/**
 * Single-action transition tests: effects, postcondition branching,
 * parameter validation.
 */

import { describe, it, expect } from 'vitest';
import {
  applyAction,
  applyEffects,
  diffSnapshots,
  mergeBehavior,
} from '../src/domain/transitions.js';
import {
  DomainError,
  ImmutableWriteError,
  ValidationError,
} from '../src/domain/errors.js';
import { createRootSnapshot, readValue, type KnownValues } from '../src/domain/state.js';
import { catalog } from '../src/kb/catalog.js';
import { flashlight } from '../src/infra/flashlight/object.js';
import {
  behaviorKnowledgeBase,
  behavingLamp,
  lamp,
  lampDefinition,
  lampKnowledgeBase,
  makeKnowledgeBase,
  nudge,
} from './fixtures.js';

const ALL_BATTERY = ['empty', 'low', 'medium', 'high', 'full'];

function makeFlashlight(known: KnownValues = {}) {
  return createRootSnapshot(catalog, flashlight, known);
}

function makeLamp(known: KnownValues = {}) {
  return createRootSnapshot(lampKnowledgeBase, lamp, known);
}

// ============================================================================
// turn_on with an unknown battery
// ============================================================================

describe('turn_on with an unknown battery', () => {
  const results = applyAction(catalog, makeFlashlight(), { action: 'turn_on' });

  it('gives three success outcomes and one rejection', () => {
    expect(results.map((result) => result.status)).toEqual(['ok', 'ok', 'ok', 'rejected']);
    expect(
      results.map((result) => readValue(result.state, 'battery.level').values)
    ).toEqual([['full'], ['high'], ['low', 'medium'], ['empty']]);
    expect(
      results.map((result) => readValue(result.state, 'bulb.brightness').values)
    ).toEqual([['high'], ['medium'], ['low'], ['none']]);
  });

  it('records precondition and postcondition provenance', () => {
    const success = {
      kind: 'simple',
      source: 'precondition',
      branchType: 'success',
      attribute: 'battery.level',
      operator: 'not_equals',
      value: 'empty',
    };
    expect(results[0]?.branchConditions).toEqual([
      success,
      {
        kind: 'simple',
        source: 'postcondition',
        branchType: 'if',
        attribute: 'battery.level',
        operator: 'equals',
        value: 'full',
      },
    ]);
    expect(results[1]?.branchConditions[1]).toMatchObject({ branchType: 'elif', value: 'high' });
    expect(results[2]?.branchConditions[1]).toEqual({
      kind: 'simple',
      source: 'postcondition',
      branchType: 'else',
      attribute: 'battery.level',
      operator: 'in',
      value: ['low', 'medium'],
    });
    expect(results[3]?.branchConditions).toEqual([
      { ...success, branchType: 'fail', operator: 'equals' },
    ]);
  });

  it('applies effects only to success outcomes', () => {
    const [first, , , rejected] = results;

    expect(first?.after).not.toBeNull();
    expect(first?.changes).toEqual([
      { attribute: 'switch.position', kind: 'value', before: ['off'], after: ['on'] },
      { attribute: 'bulb.state', kind: 'value', before: ['off'], after: ['on'] },
      { attribute: 'bulb.brightness', kind: 'value', before: ['none'], after: ['high'] },
      { attribute: 'battery.level', kind: 'narrowing', before: ALL_BATTERY, after: ['full'] },
      { attribute: 'battery.level', kind: 'trend', before: 'none', after: 'down' },
    ]);

    expect(rejected?.after).toBeNull();
    expect(readValue(rejected?.state ?? makeFlashlight(), 'switch.position').values).toEqual([
      'off',
    ]);
    expect(rejected?.changes).toEqual([
      { attribute: 'battery.level', kind: 'narrowing', before: ALL_BATTERY, after: ['empty'] },
    ]);
  });

  it('leaves the input snapshot untouched', () => {
    const before = makeFlashlight();
    applyAction(catalog, before, { action: 'turn_on' });
    expect(readValue(before, 'battery.level').values).toEqual(ALL_BATTERY);
  });
});

// ============================================================================
// Known values
// ============================================================================

describe('known values', () => {
  it('rejects without branching when the precondition is false', () => {
    const results = applyAction(catalog, makeFlashlight({ 'battery.level': 'empty' }), {
      action: 'turn_on',
    });

    expect(results).toHaveLength(1);
    expect(results[0]?.status).toBe('rejected');
    expect(results[0]?.branchConditions).toEqual([]);
    expect(results[0]?.changes).toEqual([]);
  });

  it('follows the chain without branching when the value is decided', () => {
    const results = applyAction(catalog, makeFlashlight({ 'battery.level': 'medium' }), {
      action: 'turn_on',
    });

    expect(results).toHaveLength(1);
    expect(results[0]?.status).toBe('ok');
    expect(results[0]?.branchConditions).toEqual([]);
    expect(readValue(results[0]?.state ?? makeFlashlight(), 'bulb.brightness').values).toEqual([
      'low',
    ]);
  });
});

// ============================================================================
// Trends
// ============================================================================

describe('trend-derived branching', () => {
  it('reads a draining battery as every level at or below its last value', () => {
    const [lit] = applyAction(catalog, makeFlashlight({ 'battery.level': 'medium' }), {
      action: 'turn_on',
    });
    if (!lit) throw new Error('expected an outcome');

    const again = applyAction(catalog, lit.state, { action: 'turn_on' });

    expect(again.map((result) => result.status)).toEqual(['ok', 'rejected']);
    expect(readValue(again[0]?.state ?? lit.state, 'battery.level')).toEqual({
      values: ['low', 'medium'],
      trend: 'down',
    });
    expect(readValue(again[1]?.state ?? lit.state, 'battery.level')).toEqual({
      values: ['empty'],
      trend: 'down',
    });
  });
});

// ============================================================================
// Postconditions without else
// ============================================================================

describe('required postconditions', () => {
  it('branches first and fails only the unsatisfied remainder', () => {
    const results = applyAction(lampKnowledgeBase, makeLamp(), { action: 'ignite' });

    expect(results.map((result) => result.status)).toEqual(['ok', 'error']);
    expect(readValue(results[0]?.state ?? makeLamp(), 'light.state').values).toEqual(['on']);

    const failed = results[1];
    expect(failed?.after).toBeNull();
    expect(readValue(failed?.state ?? makeLamp(), 'dial.setting').values).toEqual(['low', 'mid']);
    expect(failed?.error).toBe(
      "Postcondition 'dial.setting == high' does not hold and has no else branch"
    );
    expect(failed?.branchConditions).toEqual([
      {
        kind: 'simple',
        source: 'postcondition',
        branchType: 'else',
        attribute: 'dial.setting',
        operator: 'in',
        value: ['low', 'mid'],
      },
    ]);
  });

  it('fails outright when the condition is known false', () => {
    const results = applyAction(lampKnowledgeBase, makeLamp({ 'dial.setting': 'low' }), {
      action: 'ignite',
    });

    expect(results).toHaveLength(1);
    expect(results[0]?.status).toBe('error');
    expect(results[0]?.branchConditions).toEqual([]);
  });
});

describe('compound postconditions', () => {
  it('sends success branches to then and fail branches to else', () => {
    const results = applyAction(lampKnowledgeBase, makeLamp(), { action: 'sync' });

    expect(results.map((result) => result.status)).toEqual(['ok', 'ok']);
    expect(results[0]?.branchConditions).toEqual([
      {
        kind: 'simple',
        source: 'postcondition',
        branchType: 'if',
        attribute: 'dial.setting',
        operator: 'gte',
        value: 'mid',
      },
    ]);
    expect(readValue(results[0]?.state ?? makeLamp(), 'light.state').values).toEqual(['on']);
    expect(readValue(results[1]?.state ?? makeLamp(), 'dial.setting')).toEqual({
      values: ['low'],
      trend: 'down',
    });
    expect(results[1]?.branchConditions[0]).toMatchObject({
      branchType: 'else',
      operator: 'lt',
      value: 'mid',
    });
  });
});

// ============================================================================
// Errors
// ============================================================================

describe('malformed requests and definitions', () => {
  it('rejects unknown actions', () => {
    expect(() => applyAction(catalog, makeFlashlight(), { action: 'explode' })).toThrow(
      'Unknown action: explode'
    );
  });

  it('rejects parameters outside their choices', () => {
    expect(() =>
      applyAction(catalog, makeFlashlight(), {
        action: 'replace_battery',
        parameters: { charge: 'low' },
      })
    ).toThrow('Parameter charge must be one of [full, high]');
  });

  it('rejects undeclared parameters', () => {
    expect(() =>
      applyAction(catalog, makeFlashlight(), { action: 'turn_on', parameters: { speed: 'fast' } })
    ).toThrow(ValidationError);
  });

  it('fills parameter defaults', () => {
    const [result] = applyAction(catalog, makeFlashlight(), { action: 'replace_battery' });
    expect(readValue(result?.state ?? makeFlashlight(), 'battery.level').values).toEqual([
      'full',
    ]);
  });

  it('refuses writes to immutable attributes', () => {
    expect(() => applyAction(lampKnowledgeBase, makeLamp(), { action: 'rebrand' })).toThrow(
      ImmutableWriteError
    );
  });

  it('refuses values outside the attribute space', () => {
    expect(() => applyAction(lampKnowledgeBase, makeLamp(), { action: 'overdrive' })).toThrow(
      DomainError
    );
  });
});

// ============================================================================
// Generic actions and object behaviors
// ============================================================================

describe('object behaviors', () => {
  function makeBehavingLamp(known: KnownValues = {}) {
    return createRootSnapshot(behaviorKnowledgeBase, behavingLamp, known);
  }

  it('appends the behavior to the generic action', () => {
    const merged = mergeBehavior(nudge, behavingLamp);
    expect(merged.objectType).toBe('lamp');
    expect(merged.preconditions).toEqual([
      { type: 'attribute_check', target: 'light.state', operator: 'equals', value: 'off' },
    ]);
    expect(merged.effects).toEqual([
      { type: 'set_attribute', target: 'dial.setting', value: 'high' },
    ]);
  });

  it('applies behavior effects to the object', () => {
    const results = applyAction(behaviorKnowledgeBase, makeBehavingLamp(), { action: 'nudge' });

    expect(results).toHaveLength(1);
    expect(results[0]?.status).toBe('ok');
    expect(results[0]?.changes).toEqual([
      { attribute: 'dial.setting', kind: 'value', before: ['low', 'mid', 'high'], after: ['high'] },
    ]);
  });

  it('gates the action on behavior preconditions', () => {
    const results = applyAction(
      behaviorKnowledgeBase,
      makeBehavingLamp({ 'light.state': 'on' }),
      { action: 'nudge' }
    );

    expect(results.map((result) => result.status)).toEqual(['rejected']);
  });

  it('runs a generic action as declared on objects without a behavior', () => {
    const kb = makeKnowledgeBase({ ...lampDefinition, actions: [...lampDefinition.actions, nudge] });
    const state = createRootSnapshot(kb, lamp);
    const [result] = applyAction(kb, state, { action: 'nudge' });

    expect(result?.status).toBe('ok');
    expect(result?.changes).toEqual([]);
  });
});

// ============================================================================
// Effect applier
// ============================================================================

describe('applyEffects', () => {
  it('changes only the trend for set_trend', () => {
    const before = makeFlashlight({ 'battery.level': 'high' });
    const [outcome] = applyEffects(
      before,
      [{ type: 'set_trend', target: 'battery.level', direction: 'down' }],
      { kb: catalog, objectType: flashlight, parameters: {} }
    );
    if (!outcome) throw new Error('expected an outcome');

    expect(readValue(outcome.snapshot, 'battery.level')).toEqual({
      values: ['high'],
      trend: 'down',
    });
    expect(diffSnapshots(before, outcome.snapshot, outcome.written)).toEqual([
      { attribute: 'battery.level', kind: 'trend', before: 'none', after: 'down' },
    ]);
  });

  it('keeps the trend when writing a value', () => {
    const [outcome] = applyEffects(
      makeFlashlight(),
      [
        { type: 'set_trend', target: 'battery.level', direction: 'up' },
        { type: 'set_attribute', target: 'battery.level', value: 'low' },
      ],
      { kb: catalog, objectType: flashlight, parameters: {} }
    );

    expect(outcome?.written.has('battery.level')).toBe(true);
    expect(readValue(outcome?.snapshot ?? makeFlashlight(), 'battery.level')).toEqual({
      values: ['low'],
      trend: 'up',
    });
  });
});

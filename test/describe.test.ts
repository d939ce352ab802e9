import { describe, it, expect } from 'vitest';
import {
  describeBranchCondition,
  describeCondition,
  describeEvent,
  describeNode,
  describeSnapshotLines,
  describeValue,
} from '../src/domain/describe.js';
import { simulate } from '../src/domain/engine.js';
import type { TreeNode } from '../src/domain/graph.js';
import { catalog } from '../src/kb/catalog.js';

const { graph, events } = simulate(catalog, 'flashlight', [{ action: 'turn_on' }]);

function node(id: string): TreeNode {
  const found = graph.nodes.get(id);
  if (!found) {
    throw new Error(`missing node ${id}`);
  }
  return found;
}

describe('describeCondition', () => {
  it('renders attribute and parameter checks', () => {
    expect(
      describeCondition({ type: 'attribute_check', target: 'battery.level', operator: 'gte', value: 'low' })
    ).toBe('battery.level >= low');
    expect(
      describeCondition({
        type: 'attribute_check',
        target: 'battery.level',
        operator: 'not_in',
        value: ['empty', 'low'],
      })
    ).toBe('battery.level not in {empty, low}');
    expect(
      describeCondition({
        type: 'attribute_check',
        target: 'battery.level',
        operator: 'equals',
        value: { type: 'parameter_ref', name: 'charge' },
      })
    ).toBe('battery.level == $charge');
    expect(describeCondition({ type: 'parameter_check', parameter: 'cup', validValues: ['small', 'large'] })).toBe(
      'cup in {small, large}'
    );
  });

  it('parenthesizes nested compounds', () => {
    expect(
      describeCondition({
        type: 'or',
        items: [
          { type: 'attribute_check', target: 'switch.position', operator: 'equals', value: 'on' },
          {
            type: 'not',
            item: {
              type: 'and',
              items: [
                { type: 'attribute_check', target: 'bulb.state', operator: 'equals', value: 'on' },
                { type: 'parameter_check', parameter: 'mode', expectedValue: 'eco' },
              ],
            },
          },
        ],
      })
    ).toBe('switch.position == on or not (bulb.state == on and mode == eco)');
  });
});

describe('describeBranchCondition', () => {
  it('renders simple and compound branches', () => {
    expect(
      describeBranchCondition({
        kind: 'simple',
        source: 'precondition',
        branchType: 'fail',
        attribute: 'battery.level',
        operator: 'equals',
        value: 'empty',
      })
    ).toBe('precondition/fail: battery.level == empty');
    expect(
      describeBranchCondition({
        kind: 'compound',
        source: 'postcondition',
        branchType: 'else',
        compoundType: 'and',
        subConditions: [
          { attribute: 'dial.setting', operator: 'lt', value: 'mid' },
          { attribute: 'light.state', operator: 'in', value: ['on'] },
        ],
      })
    ).toBe('postcondition/else (and): dial.setting < mid; light.state in {on}');
  });
});

describe('describeNode', () => {
  it('lists branch provenance and status', () => {
    expect(describeNode(node('state0'))).toBe('state0 root [ok]');
    expect(describeNode(node('state3'))).toBe(
      'state3 turn_on [ok] | precondition/success: battery.level != empty | postcondition/else: battery.level in {low, medium}'
    );
    expect(describeNode(node('state4'))).toBe(
      'state4 turn_on [rejected] | precondition/fail: battery.level == empty'
    );
  });

  it('lists snapshot values with trends', () => {
    expect(describeSnapshotLines(node('state1'))).toEqual([
      'switch.position = on',
      'bulb.state = on',
      'bulb.brightness = high',
      'battery.level = full (down)',
    ]);
    expect(describeValue({ values: ['low', 'medium'], trend: 'none' })).toBe('{low, medium}');
  });
});

describe('describeEvent', () => {
  it('renders one line per event', () => {
    expect(events.map(describeEvent)).toEqual([
      'layer 1: turn_on on 1 node(s)',
      'turn_on rejected at state4',
      'state0 split into state1, state2, state3, state4',
    ]);
  });
});

/**
 * Flashlight object type.
 *
 * The battery level starts unknown, so the first action that reads it
 * branches.
 */

import type { ObjectType } from '../../domain/model.js';

export const flashlight: ObjectType = {
  name: 'flashlight',
  parts: {
    switch: {
      position: { space: 'binary_state', default: 'off', mutable: true },
    },
    bulb: {
      state: { space: 'binary_state', default: 'off', mutable: true },
      brightness: { space: 'brightness', default: 'none', mutable: true },
    },
    battery: {
      level: { space: 'battery_level', default: 'unknown', mutable: true },
    },
  },
  constraints: [
    {
      type: 'dependency',
      name: 'lit_bulb_needs_charge',
      condition: {
        type: 'attribute_check',
        target: 'bulb.state',
        operator: 'equals',
        value: 'on',
      },
      requires: {
        type: 'attribute_check',
        target: 'battery.level',
        operator: 'not_equals',
        value: 'empty',
      },
    },
  ],
};

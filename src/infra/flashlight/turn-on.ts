/**
 * turn_on: switch the flashlight on.
 *
 * Brightness follows the battery level through an if/elif/else chain, and
 * the battery starts draining.
 */

import type { Action } from '../../domain/model.js';

export const turnOn: Action = {
  name: 'turn_on',
  objectType: 'flashlight',
  description: 'Switch the flashlight on',
  parameters: [],
  preconditions: [
    {
      type: 'attribute_check',
      target: 'battery.level',
      operator: 'not_equals',
      value: 'empty',
    },
  ],
  effects: [
    { type: 'set_attribute', target: 'switch.position', value: 'on' },
    { type: 'set_attribute', target: 'bulb.state', value: 'on' },
    {
      type: 'conditional',
      condition: {
        type: 'attribute_check',
        target: 'battery.level',
        operator: 'equals',
        value: 'full',
      },
      then: [{ type: 'set_attribute', target: 'bulb.brightness', value: 'high' }],
      else: [
        {
          type: 'conditional',
          condition: {
            type: 'attribute_check',
            target: 'battery.level',
            operator: 'equals',
            value: 'high',
          },
          then: [{ type: 'set_attribute', target: 'bulb.brightness', value: 'medium' }],
          else: [{ type: 'set_attribute', target: 'bulb.brightness', value: 'low' }],
        },
      ],
    },
    { type: 'set_trend', target: 'battery.level', direction: 'down' },
  ],
};

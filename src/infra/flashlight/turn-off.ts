import type { Action } from '../../domain/model.js';

export const turnOff: Action = {
  name: 'turn_off',
  objectType: 'flashlight',
  description: 'Switch the flashlight off',
  parameters: [],
  preconditions: [
    {
      type: 'attribute_check',
      target: 'switch.position',
      operator: 'equals',
      value: 'on',
    },
  ],
  effects: [
    { type: 'set_attribute', target: 'switch.position', value: 'off' },
    { type: 'set_attribute', target: 'bulb.state', value: 'off' },
    { type: 'set_attribute', target: 'bulb.brightness', value: 'none' },
    { type: 'set_trend', target: 'battery.level', direction: 'none' },
  ],
};

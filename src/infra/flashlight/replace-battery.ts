/**
 * replace_battery: fit a fresh battery while the flashlight is off.
 *
 * The charge of the new battery is a parameter, so the same action covers
 * a new cell and a partly used spare.
 */

import type { Action } from '../../domain/model.js';

export const replaceBattery: Action = {
  name: 'replace_battery',
  objectType: 'flashlight',
  description: 'Replace the battery',
  parameters: [{ name: 'charge', choices: ['full', 'high'], required: false, default: 'full' }],
  preconditions: [
    {
      type: 'attribute_check',
      target: 'switch.position',
      operator: 'equals',
      value: 'off',
    },
  ],
  effects: [
    {
      type: 'set_attribute',
      target: 'battery.level',
      value: { type: 'parameter_ref', name: 'charge' },
    },
    { type: 'set_trend', target: 'battery.level', direction: 'none' },
  ],
};

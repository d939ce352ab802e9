/**
 * Qualitative spaces used by the flashlight model.
 */

import type { QualitativeSpace } from '../../domain/model.js';

export const binaryState: QualitativeSpace = {
  id: 'binary_state',
  name: 'Binary state',
  levels: ['off', 'on'],
};

export const brightness: QualitativeSpace = {
  id: 'brightness',
  name: 'Brightness',
  levels: ['none', 'low', 'medium', 'high'],
};

export const batteryLevel: QualitativeSpace = {
  id: 'battery_level',
  name: 'Battery level',
  levels: ['empty', 'low', 'medium', 'high', 'full'],
};

export const flashlightSpaces: readonly QualitativeSpace[] = [
  binaryState,
  brightness,
  batteryLevel,
];

/**
 * Shared test definitions.
 */

import type {
  Action,
  KnowledgeBase,
  KnowledgeBaseDefinition,
  ObjectType,
  QualitativeSpace,
} from '../src/domain/model.js';

/**
 * Wraps definitions in a knowledge base without validating them, so tests
 * can reach the runtime errors validation would otherwise catch.
 */
export function makeKnowledgeBase(definition: KnowledgeBaseDefinition): KnowledgeBase {
  return {
    getSpace: (id) => definition.spaces.find((space) => space.id === id),
    getObjectType: (name) => definition.objectTypes.find((objectType) => objectType.name === name),
    getAction: (name) => definition.actions.find((action) => action.name === name),
    listSpaces: () => definition.spaces,
    listObjectTypes: () => definition.objectTypes,
    listActions: () => definition.actions,
  };
}

export const settingSpace: QualitativeSpace = {
  id: 'setting',
  name: 'Setting',
  levels: ['low', 'mid', 'high'],
};

export const switchSpace: QualitativeSpace = {
  id: 'switch',
  name: 'Switch',
  levels: ['off', 'on'],
};

export const lamp: ObjectType = {
  name: 'lamp',
  parts: {
    dial: { setting: { space: 'setting', default: 'unknown', mutable: true } },
    light: { state: { space: 'switch', default: 'off', mutable: true } },
  },
  globals: {
    model: { space: 'setting', default: 'mid', mutable: false },
  },
  constraints: [
    {
      type: 'dependency',
      name: 'light_needs_setting',
      condition: { type: 'attribute_check', target: 'light.state', operator: 'equals', value: 'on' },
      requires: { type: 'attribute_check', target: 'dial.setting', operator: 'not_equals', value: 'low' },
    },
  ],
};

/** Conditional without else: required postcondition. */
export const ignite: Action = {
  name: 'ignite',
  objectType: 'lamp',
  parameters: [],
  preconditions: [],
  effects: [
    {
      type: 'conditional',
      condition: { type: 'attribute_check', target: 'dial.setting', operator: 'equals', value: 'high' },
      then: [{ type: 'set_attribute', target: 'light.state', value: 'on' }],
    },
  ],
};

/** Compound postcondition with an else branch. */
export const sync: Action = {
  name: 'sync',
  objectType: 'lamp',
  parameters: [],
  preconditions: [],
  effects: [
    {
      type: 'conditional',
      condition: {
        type: 'and',
        items: [
          { type: 'attribute_check', target: 'dial.setting', operator: 'gte', value: 'mid' },
          { type: 'attribute_check', target: 'light.state', operator: 'equals', value: 'off' },
        ],
      },
      then: [{ type: 'set_attribute', target: 'light.state', value: 'on' }],
      else: [{ type: 'set_trend', target: 'dial.setting', direction: 'down' }],
    },
  ],
};

export const forceOn: Action = {
  name: 'force_on',
  objectType: 'lamp',
  parameters: [],
  preconditions: [],
  effects: [{ type: 'set_attribute', target: 'light.state', value: 'on' }],
};

export const rebrand: Action = {
  name: 'rebrand',
  objectType: 'lamp',
  parameters: [],
  preconditions: [],
  effects: [{ type: 'set_attribute', target: 'model', value: 'high' }],
};

export const overdrive: Action = {
  name: 'overdrive',
  objectType: 'lamp',
  parameters: [],
  preconditions: [],
  effects: [{ type: 'set_attribute', target: 'dial.setting', value: 'max' }],
};

export const lampDefinition: KnowledgeBaseDefinition = {
  spaces: [settingSpace, switchSpace],
  objectTypes: [lamp],
  actions: [ignite, sync, forceOn],
};

/** Includes actions validation would reject. */
export const lampKnowledgeBase: KnowledgeBase = makeKnowledgeBase({
  ...lampDefinition,
  actions: [...lampDefinition.actions, rebrand, overdrive],
});

/** Generic action with an empty body of its own. */
export const nudge: Action = {
  name: 'nudge',
  objectType: 'generic',
  parameters: [],
  preconditions: [],
  effects: [],
};

export const behavingLamp: ObjectType = {
  ...lamp,
  behaviors: {
    nudge: {
      preconditions: [
        { type: 'attribute_check', target: 'light.state', operator: 'equals', value: 'off' },
      ],
      effects: [{ type: 'set_attribute', target: 'dial.setting', value: 'high' }],
    },
  },
};

export const behaviorDefinition: KnowledgeBaseDefinition = {
  spaces: [settingSpace, switchSpace],
  objectTypes: [behavingLamp],
  actions: [forceOn, nudge],
};

export const behaviorKnowledgeBase: KnowledgeBase = makeKnowledgeBase(behaviorDefinition);

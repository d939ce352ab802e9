/**
 * In-memory knowledge base.
 *
 * Provides lookup and enumeration of spaces, object types and actions.
 * This is a dumb catalog: definitions are validated once when it is built
 * and never change afterwards.
 */

import type {
  Action,
  KnowledgeBase,
  KnowledgeBaseDefinition,
  ObjectType,
  QualitativeSpace,
} from '../domain/model.js';
import { KnowledgeBaseError } from '../domain/errors.js';
import { validateKnowledgeBase } from '../domain/validation.js';
import { flashlightSpaces } from '../infra/flashlight/spaces.js';
import { flashlight } from '../infra/flashlight/object.js';
import { turnOn } from '../infra/flashlight/turn-on.js';
import { turnOff } from '../infra/flashlight/turn-off.js';
import { replaceBattery } from '../infra/flashlight/replace-battery.js';

function byKey<T>(items: readonly T[], key: (item: T) => string): Map<string, T> {
  return new Map(items.map((item) => [key(item), item]));
}

/**
 * Builds a knowledge base, throwing KnowledgeBaseError when validation
 * reports any issue.
 */
export function createKnowledgeBase(definition: KnowledgeBaseDefinition): KnowledgeBase {
  const issues = validateKnowledgeBase(definition);
  if (issues.length > 0) {
    throw new KnowledgeBaseError(issues);
  }

  const spaces = byKey<QualitativeSpace>(definition.spaces, (space) => space.id);
  const objectTypes = byKey<ObjectType>(definition.objectTypes, (objectType) => objectType.name);
  const actions = byKey<Action>(definition.actions, (action) => action.name);

  return {
    getSpace: (id) => spaces.get(id),
    getObjectType: (name) => objectTypes.get(name),
    getAction: (name) => actions.get(name),
    // Stable order (insertion order for Map values)
    listSpaces: () => Array.from(spaces.values()),
    listObjectTypes: () => Array.from(objectTypes.values()),
    listActions: () => Array.from(actions.values()),
  };
}

export const flashlightDefinition: KnowledgeBaseDefinition = {
  spaces: flashlightSpaces,
  objectTypes: [flashlight],
  actions: [turnOn, turnOff, replaceBattery],
};

/**
 * The sample flashlight knowledge base.
 */
export const catalog: KnowledgeBase = createKnowledgeBase(flashlightDefinition);

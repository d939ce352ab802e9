/**
 * Qualitative space operations.
 *
 * Pure functions over finite ordered level sets. Every set returned here is
 * deduplicated and kept in space order, so two sets with the same members
 * compare equal element by element.
 */

import type { Level, Operator, QualitativeSpace, Trend } from './model.js';
import { UnknownLevelError, ValidationError } from './errors.js';

export function createSpace(
  id: string,
  levels: readonly Level[],
  name: string = id
): QualitativeSpace {
  if (levels.length === 0) {
    throw new ValidationError(`Space '${id}' has no levels`);
  }
  if (new Set(levels).size !== levels.length) {
    throw new ValidationError(`Space '${id}' has duplicate levels`);
  }
  return { id, name, levels: [...levels] };
}

export function indexOf(space: QualitativeSpace, level: Level): number {
  const index = space.levels.indexOf(level);
  if (index < 0) {
    throw new UnknownLevelError(space.id, level);
  }
  return index;
}

export function hasLevel(space: QualitativeSpace, level: Level): boolean {
  return space.levels.includes(level);
}

/**
 * Returns the members of `values` in space order, without duplicates.
 * Throws UnknownLevelError for a level outside the space.
 */
export function normalize(
  space: QualitativeSpace,
  values: Iterable<Level>
): Level[] {
  const members = new Set<Level>();
  for (const value of values) {
    indexOf(space, value);
    members.add(value);
  }
  return space.levels.filter((level) => members.has(level));
}

/**
 * Expands a comparison into the set of levels that satisfy it.
 *
 * A list pivot with equals / not_equals is read as in / not_in.
 * Ordering operators need a single level.
 */
export function expand(
  space: QualitativeSpace,
  operator: Operator,
  pivot: Level | readonly Level[]
): Level[] {
  if (typeof pivot !== 'string') {
    const members = normalize(space, pivot);
    switch (operator) {
      case 'equals':
      case 'in':
        return members;
      case 'not_equals':
      case 'not_in':
        return space.levels.filter((level) => !members.includes(level));
      default:
        throw new ValidationError(
          `Operator '${operator}' needs a single level, got a list`
        );
    }
  }

  const pivotIndex = indexOf(space, pivot);
  switch (operator) {
    case 'equals':
    case 'in':
      return [pivot];
    case 'not_equals':
    case 'not_in':
      return space.levels.filter((level) => level !== pivot);
    case 'lt':
      return space.levels.slice(0, pivotIndex);
    case 'lte':
      return space.levels.slice(0, pivotIndex + 1);
    case 'gt':
      return space.levels.slice(pivotIndex + 1);
    case 'gte':
      return space.levels.slice(pivotIndex);
  }
}

/**
 * Moves one level in the given direction, clamped at the boundaries.
 */
export function step(
  space: QualitativeSpace,
  level: Level,
  direction: Trend
): Level {
  const index = indexOf(space, level);
  if (direction === 'up') {
    return space.levels[Math.min(index + 1, space.levels.length - 1)] ?? level;
  }
  if (direction === 'down') {
    return space.levels[Math.max(index - 1, 0)] ?? level;
  }
  return level;
}

/**
 * The set of levels an attribute may have reached while trending.
 *
 * down: every level at or below the highest current level.
 * up: every level at or above the lowest current level.
 */
export function valueSetFromTrend(
  space: QualitativeSpace,
  values: readonly Level[],
  trend: Trend
): Level[] {
  const current = normalize(space, values);
  if (trend === 'none' || current.length === 0) {
    return current;
  }
  const indices = current.map((level) => indexOf(space, level));
  if (trend === 'down') {
    return space.levels.slice(0, Math.max(...indices) + 1);
  }
  return space.levels.slice(Math.min(...indices));
}

// ============================================================================
// Set helpers
// ============================================================================

export function intersect(
  space: QualitativeSpace,
  a: readonly Level[],
  b: readonly Level[]
): Level[] {
  return space.levels.filter((level) => a.includes(level) && b.includes(level));
}

export function subtract(
  space: QualitativeSpace,
  a: readonly Level[],
  b: readonly Level[]
): Level[] {
  return space.levels.filter((level) => a.includes(level) && !b.includes(level));
}

export function union(
  space: QualitativeSpace,
  a: readonly Level[],
  b: readonly Level[]
): Level[] {
  return space.levels.filter((level) => a.includes(level) || b.includes(level));
}

export function isSubset(a: readonly Level[], b: readonly Level[]): boolean {
  return a.every((level) => b.includes(level));
}

export function sameMembers(a: readonly Level[], b: readonly Level[]): boolean {
  return a.length === b.length && isSubset(a, b);
}

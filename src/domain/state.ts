/**
 * World snapshots: the attribute store of one simulated object.
 *
 * A snapshot is immutable. Every write produces a new snapshot through
 * `withValues`; the map inside is never mutated after construction.
 *
 * Non-goals (not included):
 * - Several objects in one snapshot
 * - History (see io/history.ts)
 */

import { createHash } from 'node:crypto';

import type {
  AttributeDefinition,
  KnowledgeBase,
  Level,
  ObjectType,
  QualitativeSpace,
  Trend,
} from './model.js';
import { ValidationError } from './errors.js';
import { normalize, valueSetFromTrend } from './space.js';

// ============================================================================
// Paths
// ============================================================================

/**
 * AttributePath: a part-qualified attribute, or an object-global one when
 * `part` is null.
 */
export interface AttributePath {
  part: string | null;
  attribute: string;
}

export function pathKey(path: AttributePath): string {
  return path.part === null ? path.attribute : `${path.part}.${path.attribute}`;
}

export function parsePath(key: string): AttributePath {
  const dot = key.indexOf('.');
  if (dot < 0) {
    return { part: null, attribute: key };
  }
  return { part: key.slice(0, dot), attribute: key.slice(dot + 1) };
}

// ============================================================================
// Values
// ============================================================================

/**
 * AttributeValue: a non-empty set of levels in space order plus a trend.
 */
export interface AttributeValue {
  values: readonly Level[];
  trend: Trend;
}

export function isFullyKnown(value: AttributeValue): boolean {
  return value.values.length === 1 && value.trend === 'none';
}

export interface WorldSnapshot {
  objectType: string;
  /** Layer index; 0 at the root */
  sequence: number;
  attributes: ReadonlyMap<string, AttributeValue>;
}

/** Values a caller already knows, keyed by attribute path. */
export type KnownValues = Readonly<Record<string, Level | readonly Level[]>>;

// ============================================================================
// Attribute resolution
// ============================================================================

export interface ResolvedAttribute {
  key: string;
  path: AttributePath;
  definition: AttributeDefinition;
  space: QualitativeSpace;
}

function lookupDefinition(
  objectType: ObjectType,
  path: AttributePath
): AttributeDefinition | undefined {
  if (path.part === null) {
    return objectType.globals?.[path.attribute];
  }
  return objectType.parts[path.part]?.[path.attribute];
}

export function resolveAttribute(
  kb: KnowledgeBase,
  objectType: ObjectType,
  key: string
): ResolvedAttribute {
  const path = parsePath(key);
  const definition = lookupDefinition(objectType, path);
  if (!definition) {
    throw new ValidationError(
      `Unknown attribute '${key}' on object type '${objectType.name}'`
    );
  }
  const space = kb.getSpace(definition.space);
  if (!space) {
    throw new ValidationError(
      `Attribute '${key}' refers to unknown space '${definition.space}'`
    );
  }
  return { key, path, definition, space };
}

/**
 * Every attribute of an object type: parts in declaration order, then
 * object-global attributes.
 */
export function listAttributes(
  kb: KnowledgeBase,
  objectType: ObjectType
): ResolvedAttribute[] {
  const keys: string[] = [];
  for (const [part, table] of Object.entries(objectType.parts)) {
    for (const attribute of Object.keys(table)) {
      keys.push(pathKey({ part, attribute }));
    }
  }
  for (const attribute of Object.keys(objectType.globals ?? {})) {
    keys.push(attribute);
  }
  return keys.map((key) => resolveAttribute(kb, objectType, key));
}

function defaultValues(resolved: ResolvedAttribute): Level[] {
  const initial = resolved.definition.default;
  if (initial === 'unknown') {
    return [...resolved.space.levels];
  }
  return normalize(resolved.space, typeof initial === 'string' ? [initial] : initial);
}

// ============================================================================
// Snapshot construction
// ============================================================================

/**
 * Builds the root snapshot from the object type's defaults, with known
 * values taking their place.
 */
export function createRootSnapshot(
  kb: KnowledgeBase,
  objectType: ObjectType,
  knownValues: KnownValues = {}
): WorldSnapshot {
  const attributes = new Map<string, AttributeValue>();
  for (const resolved of listAttributes(kb, objectType)) {
    attributes.set(resolved.key, { values: defaultValues(resolved), trend: 'none' });
  }

  for (const [key, known] of Object.entries(knownValues)) {
    const resolved = resolveAttribute(kb, objectType, key);
    const values = normalize(resolved.space, typeof known === 'string' ? [known] : known);
    if (values.length === 0) {
      throw new ValidationError(`Known value for '${key}' is an empty set`);
    }
    attributes.set(key, { values, trend: 'none' });
  }

  return { objectType: objectType.name, sequence: 0, attributes };
}

export function readValue(snapshot: WorldSnapshot, key: string): AttributeValue {
  const value = snapshot.attributes.get(key);
  if (!value) {
    throw new ValidationError(
      `Attribute '${key}' is not part of '${snapshot.objectType}'`
    );
  }
  return value;
}

/**
 * Copy-with-overrides. The source snapshot is left untouched.
 */
export function withValues(
  snapshot: WorldSnapshot,
  overrides: ReadonlyMap<string, AttributeValue>,
  sequence: number = snapshot.sequence
): WorldSnapshot {
  if (overrides.size === 0 && sequence === snapshot.sequence) {
    return snapshot;
  }
  const attributes = new Map(snapshot.attributes);
  for (const [key, value] of overrides) {
    attributes.set(key, value);
  }
  return { objectType: snapshot.objectType, sequence, attributes };
}

/**
 * Expands every trending attribute to the levels it may have reached.
 *
 * Trends are kept, so applying this twice gives the same snapshot.
 */
export function resolveTrends(
  kb: KnowledgeBase,
  objectType: ObjectType,
  snapshot: WorldSnapshot
): WorldSnapshot {
  const overrides = new Map<string, AttributeValue>();
  for (const [key, value] of snapshot.attributes) {
    if (value.trend === 'none') {
      continue;
    }
    const { space } = resolveAttribute(kb, objectType, key);
    const values = valueSetFromTrend(space, value.values, value.trend);
    if (values.length !== value.values.length) {
      overrides.set(key, { values, trend: value.trend });
    }
  }
  return withValues(snapshot, overrides);
}

/**
 * Digest of the snapshot's attribute content.
 *
 * Paths, values and trends only; the sequence marker is left out so equal
 * states reached along different paths share a fingerprint.
 */
export function fingerprint(snapshot: WorldSnapshot): string {
  const entries = [...snapshot.attributes.entries()]
    .map(([key, value]) => [key, [...value.values].sort(), value.trend] as const)
    .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  const canonical = JSON.stringify([snapshot.objectType, entries]);
  return createHash('sha256').update(canonical).digest('hex').slice(0, 16);
}

/**
 * Node factory and DAG merger.
 *
 * Nodes live in an arena keyed by id (`state0`, `state1`, ...). Within one
 * layer, a candidate whose status and snapshot fingerprint match an
 * existing node is folded into it: the existing node gains a parent, an
 * incoming edge and nothing else. Nodes from different layers are never
 * merged.
 */

import type { ActionRequest, ParameterValues } from './model.js';
import type { BranchCondition } from './branching.js';
import type { ConstraintViolation } from './constraints.js';
import type { SimulationErrorCode } from './errors.js';
import type { Change, NodeStatus, TransitionResult } from './transitions.js';
import { fingerprint, withValues, type WorldSnapshot } from './state.js';

// ============================================================================
// Types
// ============================================================================

/**
 * IncomingEdge: how one parent reached this node. Merged nodes carry one
 * edge per parent edge, each with its own branch conditions and changes.
 */
export interface IncomingEdge {
  parentId: string;
  branchConditions: readonly BranchCondition[];
  changes: readonly Change[];
}

export interface TreeNode {
  id: string;
  layer: number;
  snapshot: WorldSnapshot;
  fingerprint: string;
  parentIds: readonly string[];
  childrenIds: readonly string[];
  /** null for the root */
  actionName: string | null;
  parameters: ParameterValues;
  status: NodeStatus;
  error?: string;
  violations: readonly ConstraintViolation[];
  edges: readonly IncomingEdge[];
}

export interface GraphStatistics {
  totalNodes: number;
  /** Index of the deepest layer; 0 when only the root exists */
  depth: number;
  /** Size of the widest layer */
  width: number;
  leaves: number;
  /** Nodes with more than one child */
  branchPoints: number;
  /** Non-root nodes with status ok */
  successCount: number;
  /** Non-root nodes with any other status */
  failCount: number;
  /** Nodes reached through more than one edge */
  mergedNodes: number;
  edges: number;
}

export interface HaltRecord {
  layer: number;
  nodeId: string;
  action: string;
  code: SimulationErrorCode;
  message: string;
}

export interface SimulationGraph {
  simulationId: string;
  objectType: string;
  rootId: string;
  nodes: ReadonlyMap<string, TreeNode>;
  /** Node ids per layer; layer 0 holds the root */
  layers: readonly (readonly string[])[];
  requests: readonly ActionRequest[];
  halted: HaltRecord | null;
  statistics: GraphStatistics;
}

export interface GraphBuilderOptions {
  /** Fold equal nodes of one layer together. Defaults to true. */
  mergeDuplicates?: boolean;
}

export interface AddedNode {
  node: TreeNode;
  merged: boolean;
}

interface NodeRecord {
  id: string;
  layer: number;
  snapshot: WorldSnapshot;
  fingerprint: string;
  parentIds: string[];
  childrenIds: string[];
  actionName: string | null;
  parameters: ParameterValues;
  status: NodeStatus;
  error?: string;
  violations: readonly ConstraintViolation[];
  edges: IncomingEdge[];
}

// ============================================================================
// Builder
// ============================================================================

function freeze(record: NodeRecord): TreeNode {
  return {
    ...record,
    parentIds: [...record.parentIds],
    childrenIds: [...record.childrenIds],
    edges: [...record.edges],
  };
}

export class SimulationGraphBuilder {
  private readonly mergeDuplicates: boolean;
  private readonly records = new Map<string, NodeRecord>();
  private readonly layers: string[][] = [];
  private layerIndex = new Map<string, string>();
  private counter = 0;

  constructor(options: GraphBuilderOptions = {}) {
    this.mergeDuplicates = options.mergeDuplicates ?? true;
  }

  get layerCount(): number {
    return this.layers.length;
  }

  private allocate(): string {
    const id = `state${this.counter}`;
    this.counter += 1;
    return id;
  }

  private record(id: string): NodeRecord {
    const found = this.records.get(id);
    if (!found) {
      throw new Error(`Unknown node: ${id}`);
    }
    return found;
  }

  private insert(record: NodeRecord): void {
    this.records.set(record.id, record);
    const layer = this.layers[record.layer];
    if (layer) {
      layer.push(record.id);
    } else {
      this.layers.push([record.id]);
    }
  }

  addRoot(snapshot: WorldSnapshot): TreeNode {
    if (this.records.size > 0) {
      throw new Error('Root already added');
    }
    const root: NodeRecord = {
      id: this.allocate(),
      layer: 0,
      snapshot: withValues(snapshot, new Map(), 0),
      fingerprint: fingerprint(snapshot),
      parentIds: [],
      childrenIds: [],
      actionName: null,
      parameters: {},
      status: 'ok',
      violations: [],
      edges: [],
    };
    this.insert(root);
    return freeze(root);
  }

  /**
   * Opens the next layer and clears the merge index.
   */
  startLayer(): number {
    this.layers.push([]);
    this.layerIndex = new Map();
    return this.layers.length - 1;
  }

  private currentLayer(): number {
    if (this.layers.length < 2) {
      throw new Error('No layer started');
    }
    return this.layers.length - 1;
  }

  /**
   * Adds one transition result below `parentId`, merging it into an equal
   * node of the current layer when there is one.
   */
  addOutcome(
    parentId: string,
    actionName: string,
    parameters: ParameterValues,
    result: TransitionResult
  ): AddedNode {
    const layer = this.currentLayer();
    const parent = this.record(parentId);
    const snapshot = withValues(result.state, new Map(), layer);
    const digest = fingerprint(snapshot);
    const edge: IncomingEdge = {
      parentId,
      branchConditions: result.branchConditions,
      changes: result.changes,
    };
    const key = `${result.status}:${digest}:${result.error ?? ''}`;

    const existingId = this.mergeDuplicates ? this.layerIndex.get(key) : undefined;
    if (existingId !== undefined) {
      const existing = this.record(existingId);
      if (!existing.parentIds.includes(parentId)) {
        existing.parentIds.push(parentId);
      }
      existing.edges.push(edge);
      if (!parent.childrenIds.includes(existingId)) {
        parent.childrenIds.push(existingId);
      }
      return { node: freeze(existing), merged: true };
    }

    const created: NodeRecord = {
      id: this.allocate(),
      layer,
      snapshot,
      fingerprint: digest,
      parentIds: [parentId],
      childrenIds: [],
      actionName,
      parameters,
      status: result.status,
      violations: result.violations,
      edges: [edge],
      ...(result.error === undefined ? {} : { error: result.error }),
    };
    this.insert(created);
    this.layerIndex.set(key, created.id);
    parent.childrenIds.push(created.id);
    return { node: freeze(created), merged: false };
  }

  getNode(id: string): TreeNode | undefined {
    const found = this.records.get(id);
    return found ? freeze(found) : undefined;
  }

  layerIds(layer: number): readonly string[] {
    return [...(this.layers[layer] ?? [])];
  }

  build(meta: {
    simulationId: string;
    requests: readonly ActionRequest[];
    halted: HaltRecord | null;
  }): SimulationGraph {
    const root = this.records.get('state0');
    if (!root) {
      throw new Error('Graph has no root');
    }
    const nodes = new Map<string, TreeNode>();
    for (const [id, record] of this.records) {
      nodes.set(id, freeze(record));
    }
    const layers = this.layers.filter((layer) => layer.length > 0).map((layer) => [...layer]);
    return {
      simulationId: meta.simulationId,
      objectType: root.snapshot.objectType,
      rootId: root.id,
      nodes,
      layers,
      requests: [...meta.requests],
      halted: meta.halted,
      statistics: computeStatistics(nodes, layers),
    };
  }
}

// ============================================================================
// Statistics
// ============================================================================

export function computeStatistics(
  nodes: ReadonlyMap<string, TreeNode>,
  layers: readonly (readonly string[])[]
): GraphStatistics {
  let leaves = 0;
  let branchPoints = 0;
  let successCount = 0;
  let failCount = 0;
  let mergedNodes = 0;
  let edges = 0;

  for (const node of nodes.values()) {
    if (node.childrenIds.length === 0) leaves += 1;
    if (node.childrenIds.length > 1) branchPoints += 1;
    if (node.edges.length > 1) mergedNodes += 1;
    edges += node.edges.length;
    if (node.actionName === null) continue;
    if (node.status === 'ok') {
      successCount += 1;
    } else {
      failCount += 1;
    }
  }

  return {
    totalNodes: nodes.size,
    depth: Math.max(0, layers.length - 1),
    width: layers.reduce((widest, layer) => Math.max(widest, layer.length), 0),
    leaves,
    branchPoints,
    successCount,
    failCount,
    mergedNodes,
    edges,
  };
}

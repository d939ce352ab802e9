/**
 * Simulation events.
 *
 * This file defines TypeScript types only (no logic). Events are the
 * engine's log: the runner returns them next to the graph instead of
 * writing anywhere, and callers decide how to report them.
 *
 * Non-goals (not included):
 * - Event handling or processing logic
 * - Formatting (see describe.ts)
 */

import type { SimulationErrorCode } from './errors.js';

/**
 * LayerStartedEvent: Emitted before an action is applied to the frontier.
 */
export interface LayerStartedEvent {
  type: 'layer_started';
  layer: number;
  action: string;
  /** Number of nodes the action is applied to */
  frontier: number;
}

/**
 * BranchSplitEvent: Emitted when one parent produced more than one child.
 */
export interface BranchSplitEvent {
  type: 'branch_split';
  layer: number;
  parentId: string;
  action: string;
  childIds: string[];
}

/**
 * NodeMergedEvent: Emitted when a candidate child matched an existing node
 * of the same layer and was folded into it.
 */
export interface NodeMergedEvent {
  type: 'node_merged';
  layer: number;
  nodeId: string;
  parentId: string;
}

export interface ActionRejectedEvent {
  type: 'action_rejected';
  layer: number;
  nodeId: string;
  parentId: string;
  action: string;
}

export interface ConstraintViolatedEvent {
  type: 'constraint_violated';
  layer: number;
  nodeId: string;
  constraints: string[];
}

/**
 * ConstraintDeferredEvent: a constraint could not be decided because an
 * attribute it reads is still a value set.
 */
export interface ConstraintDeferredEvent {
  type: 'constraint_deferred';
  layer: number;
  nodeId: string;
  constraints: string[];
}

export interface PostconditionUnsatisfiedEvent {
  type: 'postcondition_unsatisfied';
  layer: number;
  nodeId: string;
  message: string;
}

/**
 * RunHaltedEvent: an action definition or request was malformed. No
 * further layers are expanded.
 */
export interface RunHaltedEvent {
  type: 'run_halted';
  layer: number;
  nodeId: string;
  action: string;
  code: SimulationErrorCode;
  message: string;
}

export type SimulationEvent =
  | LayerStartedEvent
  | BranchSplitEvent
  | NodeMergedEvent
  | ActionRejectedEvent
  | ConstraintViolatedEvent
  | ConstraintDeferredEvent
  | PostconditionUnsatisfiedEvent
  | RunHaltedEvent;

/**
 * Simulation runner: breadth-first expansion of an action sequence.
 *
 * Each action request opens one layer. Every non-error node of the
 * previous layer is expanded with `applyAction`, and the results go
 * through the graph builder, which merges equal siblings.
 *
 * Non-goals (not included):
 * - Condition semantics (belongs in rules.ts)
 * - Persistence (see io/history.ts)
 * - Console output; callers receive events instead
 */

import type { ActionRequest, KnowledgeBase, ParameterValues } from './model.js';
import type { SimulationEvent } from './events.js';
import { SimulationError, ValidationError, isHaltingError } from './errors.js';
import {
  SimulationGraphBuilder,
  type HaltRecord,
  type SimulationGraph,
  type TreeNode,
} from './graph.js';
import { createRootSnapshot, type KnownValues } from './state.js';
import { applyAction, resolveAction, type TransitionResult } from './transitions.js';

export interface SimulationOptions {
  simulationId?: string;
  /**
   * Values known ahead of the run, keyed by attribute path. They replace
   * the object type's defaults in the root snapshot.
   */
  initialValues?: KnownValues;
  /** Defaults to true */
  mergeDuplicates?: boolean;
}

export interface SimulationRun {
  graph: SimulationGraph;
  events: SimulationEvent[];
}

const DEFAULT_SIMULATION_ID = 'simulation';

function haltResult(parent: TreeNode, error: SimulationError): TransitionResult {
  return {
    status: 'error',
    before: parent.snapshot,
    after: null,
    state: parent.snapshot,
    changes: [],
    violations: [],
    branchConditions: [],
    error: error.message,
  };
}

/**
 * Runs `requests` in order against a fresh object of `objectTypeName`.
 *
 * A malformed request or action definition stops the run: the failing
 * expansion is recorded as an error node and `graph.halted` is set.
 */
export function simulate(
  kb: KnowledgeBase,
  objectTypeName: string,
  requests: readonly ActionRequest[],
  options: SimulationOptions = {}
): SimulationRun {
  const objectType = kb.getObjectType(objectTypeName);
  if (!objectType) {
    throw new ValidationError(`Unknown object type: ${objectTypeName}`);
  }

  const builder = new SimulationGraphBuilder({ mergeDuplicates: options.mergeDuplicates });
  const root = builder.addRoot(createRootSnapshot(kb, objectType, options.initialValues));
  const events: SimulationEvent[] = [];
  let frontier: string[] = [root.id];
  let halted: HaltRecord | null = null;

  for (const request of requests) {
    if (frontier.length === 0) {
      break;
    }
    const layer = builder.startLayer();
    events.push({ type: 'layer_started', layer, action: request.action, frontier: frontier.length });

    for (const parentId of frontier) {
      const parent = builder.getNode(parentId);
      if (!parent) {
        continue;
      }

      // Nodes record the parameters the action ran with, defaults included
      let parameters: ParameterValues = request.parameters ?? {};
      let results: TransitionResult[];
      try {
        parameters = resolveAction(kb, parent.snapshot, request).parameters;
        results = applyAction(kb, parent.snapshot, request);
      } catch (error) {
        if (!(error instanceof SimulationError) || !isHaltingError(error)) {
          throw error;
        }
        const { node } = builder.addOutcome(
          parentId,
          request.action,
          parameters,
          haltResult(parent, error)
        );
        halted = {
          layer,
          nodeId: node.id,
          action: request.action,
          code: error.code,
          message: error.message,
        };
        events.push({ type: 'run_halted', ...halted });
        break;
      }

      const childIds: string[] = [];
      for (const result of results) {
        const { node, merged } = builder.addOutcome(parentId, request.action, parameters, result);
        if (!childIds.includes(node.id)) {
          childIds.push(node.id);
        }
        events.push(...describeOutcome(layer, parentId, request.action, node, merged, result));
      }
      if (childIds.length > 1) {
        events.push({ type: 'branch_split', layer, parentId, action: request.action, childIds });
      }
    }

    if (halted) {
      break;
    }
    frontier = builder
      .layerIds(layer)
      .filter((id) => builder.getNode(id)?.status !== 'error');
  }

  return {
    graph: builder.build({
      simulationId: options.simulationId ?? DEFAULT_SIMULATION_ID,
      requests,
      halted,
    }),
    events,
  };
}

function describeOutcome(
  layer: number,
  parentId: string,
  action: string,
  node: TreeNode,
  merged: boolean,
  result: TransitionResult
): SimulationEvent[] {
  if (merged) {
    return [{ type: 'node_merged', layer, nodeId: node.id, parentId }];
  }

  const events: SimulationEvent[] = [];
  switch (result.status) {
    case 'rejected':
      events.push({ type: 'action_rejected', layer, nodeId: node.id, parentId, action });
      break;
    case 'constraint_violated':
      events.push({
        type: 'constraint_violated',
        layer,
        nodeId: node.id,
        constraints: result.violations
          .filter((violation) => violation.outcome === 'violated')
          .map((violation) => violation.constraint),
      });
      break;
    case 'error':
      events.push({
        type: 'postcondition_unsatisfied',
        layer,
        nodeId: node.id,
        message: result.error ?? 'required postcondition does not hold',
      });
      break;
    case 'ok':
      break;
  }

  const deferred = result.violations
    .filter((violation) => violation.outcome === 'unknown')
    .map((violation) => violation.constraint);
  if (deferred.length > 0) {
    events.push({ type: 'constraint_deferred', layer, nodeId: node.id, constraints: deferred });
  }
  return events;
}

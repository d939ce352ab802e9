/**
 * Developer smoke run for the simulator.
 *
 * This script is intentionally simple and explicit.
 * Its purpose is to show that:
 * - an unknown battery level branches turn_on
 * - the if/elif/else brightness chain splits the success branch
 * - replacing the battery merges the branches back together
 *
 * Run with:
 *   npm run smoke
 */

import { simulate } from '../domain/engine.js';
import {
  describeEvent,
  describeNode,
  describeSnapshotLines,
} from '../domain/describe.js';
import { catalog } from '../kb/catalog.js';
import { historyToYaml, serializeHistory } from '../io/history.js';

// -----------------------------------------------------------------------------
// Run
// -----------------------------------------------------------------------------

const { graph, events } = simulate(catalog, 'flashlight', [
  { action: 'turn_on' },
  { action: 'turn_off' },
  { action: 'replace_battery', parameters: { charge: 'full' } },
]);

console.log('\n=== EVENTS ===');
events.forEach((event) => console.log(describeEvent(event)));

// -----------------------------------------------------------------------------
// Nodes
// -----------------------------------------------------------------------------

console.log('\n=== NODES ===');
graph.layers.forEach((layer, index) => {
  console.log(`-- layer ${index} --`);
  for (const id of layer) {
    const node = graph.nodes.get(id);
    if (!node) continue;
    console.log(describeNode(node));
    describeSnapshotLines(node).forEach((line) => console.log(`    ${line}`));
  }
});

console.log('\n=== STATISTICS ===');
console.dir(graph.statistics, { depth: null });

if (process.argv.includes('--history')) {
  console.log('\n=== HISTORY ===');
  console.log(historyToYaml(serializeHistory(graph)));
}

if (graph.halted) {
  console.error(`\nRun halted: ${graph.halted.message}`);
  process.exit(1);
}

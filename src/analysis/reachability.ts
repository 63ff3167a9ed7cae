/**
 * Attacker reachability over a built attack graph.
 */

import type { AttackGraph } from '../graph/attack-graph.js';
import type { AttackGraphNode } from '../graph/node.js';
import type { Attacker } from '../graph/attacker.js';
import { createLogger } from '../core/logger.js';

const logger = createLogger('reachability');

/**
 * Whether `node` becomes reachable given the nodes reached so far. An
 * and-step needs every parent, every other kind needs one.
 */
function canReach(node: AttackGraphNode, reachable: Set<AttackGraphNode>): boolean {
  if (!node.isViable) return false;
  if (node.type === 'and') {
    for (const parent of node.parents) {
      if (!reachable.has(parent)) return false;
    }
  }
  return true;
}

/**
 * Nodes reachable by one attacker, starting from its reached steps.
 *
 * Every newly reachable node re-visits its children, so an and-step is
 * checked again each time one of its parents turns reachable.
 */
export function reachableFrom(attacker: Attacker): Set<AttackGraphNode> {
  const reachable = new Set<AttackGraphNode>(attacker.reachedAttackSteps);
  const queue = [...attacker.reachedAttackSteps];

  for (let i = 0; i < queue.length; i++) {
    for (const child of queue[i].children) {
      if (reachable.has(child) || !canReach(child, reachable)) continue;
      reachable.add(child);
      queue.push(child);
    }
  }

  return reachable;
}

/**
 * Recompute `reachableBy` on every node and `reachableAttackSteps` on every
 * attacker from scratch.
 */
export function calculateReachability(graph: AttackGraph): void {
  for (const node of graph.nodes) {
    node.reachableBy.clear();
  }

  for (const attacker of graph.attackers) {
    attacker.reachableAttackSteps.clear();
    for (const node of reachableFrom(attacker)) {
      node.reachableBy.add(attacker);
      attacker.reachableAttackSteps.add(node);
    }
    logger.debug(
      `Attacker "${attacker.name}" can reach ${attacker.reachableAttackSteps.size} attack steps`
    );
  }
}

/**
 * Tests for attacker reachability.
 */

import { describe, it, expect } from 'vitest';
import { AttackGraph } from '../../src/graph/attack-graph.js';
import { Attacker } from '../../src/graph/attacker.js';
import { buildAttackGraph, attachAttackers } from '../../src/graph/builder.js';
import { calculateReachability, reachableFrom } from '../../src/analysis/reachability.js';
import { addStep, chainGraph, loadFixtures } from '../fixtures/index.js';

function fullNames(nodes: Iterable<{ fullName: string }>): string[] {
  return [...nodes].map((n) => n.fullName);
}

/**
 * n1 -> n4, n2 -> n3 -> n4, with n4 an and-step.
 */
function convergentGraph() {
  const graph = new AttackGraph();
  const n1 = addStep(graph, 'n1');
  const n2 = addStep(graph, 'n2');
  const n3 = addStep(graph, 'n3');
  const n4 = addStep(graph, 'n4', 'and');
  graph.addEdge(n1, n4);
  graph.addEdge(n2, n3);
  graph.addEdge(n3, n4);
  return { graph, n1, n2, n3, n4 };
}

describe('reachableFrom', () => {
  it('should follow or-steps from the reached steps', () => {
    const { graph, nodes } = chainGraph(['a', 'b', 'c']);
    const attacker = graph.addAttacker(new Attacker('Outsider'), undefined, [0]);

    expect([...reachableFrom(attacker)]).toEqual(nodes);
  });

  it('should include the reached steps themselves', () => {
    const { graph, nodes } = chainGraph(['a', 'b']);
    const attacker = graph.addAttacker(new Attacker('Outsider'), undefined, [1]);

    expect([...reachableFrom(attacker)]).toEqual([nodes[1]]);
  });

  it('should hold back an and-step until every parent is reachable', () => {
    const { graph, n4 } = convergentGraph();
    const attacker = graph.addAttacker(new Attacker('Outsider'), undefined, [0]);

    expect(reachableFrom(attacker).has(n4)).toBe(false);
  });

  it('should reach an and-step whose parents turn reachable at different depths', () => {
    const { graph, n3, n4 } = convergentGraph();
    const attacker = graph.addAttacker(new Attacker('Outsider'), undefined, [0, 1]);

    const reachable = reachableFrom(attacker);

    expect(reachable.has(n3)).toBe(true);
    expect(reachable.has(n4)).toBe(true);
  });

  it('should not propagate through non-viable steps', () => {
    const { graph, nodes } = chainGraph(['a', 'b', 'c']);
    nodes[1].isViable = false;
    const attacker = graph.addAttacker(new Attacker('Outsider'), undefined, [0]);

    expect([...reachableFrom(attacker)]).toEqual([nodes[0]]);
  });

  it('should not enter a non-viable and-step even when every parent is reachable', () => {
    const { graph, n3, n4 } = convergentGraph();
    n4.isViable = false;
    const attacker = graph.addAttacker(new Attacker('Outsider'), undefined, [0, 1]);

    const reachable = reachableFrom(attacker);

    expect(reachable.has(n3)).toBe(true);
    expect(reachable.has(n4)).toBe(false);
  });

  it('should terminate on cycles', () => {
    const { graph, nodes } = chainGraph(['a', 'b', 'c']);
    graph.addEdge(nodes[2], nodes[0]);
    const attacker = graph.addAttacker(new Attacker('Outsider'), undefined, [0]);

    expect(reachableFrom(attacker).size).toBe(3);
  });
});

describe('calculateReachability', () => {
  it('should record reachability on nodes and attackers', () => {
    const { graph, nodes } = chainGraph(['a', 'b', 'c']);
    const first = graph.addAttacker(new Attacker('first'), undefined, [0]);
    const second = graph.addAttacker(new Attacker('second'), undefined, [2]);

    calculateReachability(graph);

    expect([...first.reachableAttackSteps]).toEqual(nodes);
    expect([...second.reachableAttackSteps]).toEqual([nodes[2]]);
    expect([...nodes[2].reachableBy]).toEqual([first, second]);
    expect([...nodes[0].reachableBy]).toEqual([first]);
  });

  it('should start over on every run', () => {
    const { graph, nodes } = chainGraph(['a', 'b']);
    const attacker = graph.addAttacker(new Attacker('Outsider'), undefined, [0]);
    calculateReachability(graph);

    attacker.undoCompromise(nodes[0]);
    calculateReachability(graph);

    expect(attacker.reachableAttackSteps.size).toBe(0);
    expect(nodes[1].reachableBy.size).toBe(0);
  });

  it('should stop at an and-step guarded by an unreached defense in the fixture model', () => {
    const { language, model } = loadFixtures();
    const graph = buildAttackGraph(language, model);
    const [outsider] = attachAttackers(graph, model);

    calculateReachability(graph);

    expect(fullNames(outsider.reachableAttackSteps)).toEqual([
      'Internet:access',
      'WebApp:networkConnect',
      'WebApp:attemptAccess',
    ]);
  });
});

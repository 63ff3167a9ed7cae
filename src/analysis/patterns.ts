/**
 * Search for chains of nodes that satisfy an ordered list of conditions.
 */

import type { AttackGraph } from '../graph/attack-graph.js';
import type { AttackGraphNode } from '../graph/node.js';

export type NodePredicate = (node: AttackGraphNode) => boolean;

/**
 * A condition one or more consecutive nodes of a chain must satisfy.
 * `maxRepeated` may be Infinity.
 */
export class SearchCondition {
  static readonly ANY: NodePredicate = () => true;

  constructor(
    readonly matches: NodePredicate,
    readonly minRepeated: number = 1,
    readonly maxRepeated: number = 1
  ) {
    if (minRepeated < 0 || maxRepeated < 1 || maxRepeated < minRepeated) {
      throw new RangeError(
        `Invalid repetition bounds ${minRepeated}..${maxRepeated} for a search condition`
      );
    }
  }

  canMatchAgain(matchCount: number): boolean {
    return matchCount < this.maxRepeated;
  }

  mustMatchAgain(matchCount: number): boolean {
    return matchCount < this.minRepeated;
  }
}

interface Frame {
  node: AttackGraphNode;
  conditionIndex: number;
  path: AttackGraphNode[];
  matchCount: number;
}

export class SearchPattern {
  constructor(readonly conditions: SearchCondition[]) {
    if (conditions.length === 0) {
      throw new RangeError('A search pattern needs at least one condition');
    }
  }

  /**
   * Every path of nodes, following child edges, that satisfies the
   * conditions in order. Each distinct path is returned once.
   */
  findMatches(graph: AttackGraph): AttackGraphNode[][] {
    const [first] = this.conditions;
    const matches: AttackGraphNode[][] = [];
    const seen = new Set<string>();

    for (const start of graph.nodes) {
      if (!first.matches(start)) continue;
      for (const path of this.matchFrom(start)) {
        const key = path.map((node) => node.id).join(',');
        if (seen.has(key)) continue;
        seen.add(key);
        matches.push(path);
      }
    }

    return matches;
  }

  private matchFrom(start: AttackGraphNode): AttackGraphNode[][] {
    const last = this.conditions.length - 1;
    const found: AttackGraphNode[][] = [];
    const stack: Frame[] = [{ node: start, conditionIndex: 0, path: [], matchCount: 0 }];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;
      const { node, conditionIndex, path, matchCount } = frame;
      if (path.includes(node)) continue;

      const condition = this.conditions[conditionIndex];
      const pending: Frame[] = [];

      // The current condition is satisfied: try the next one on this node.
      if (conditionIndex < last && !condition.mustMatchAgain(matchCount)) {
        pending.push({ node, conditionIndex: conditionIndex + 1, path, matchCount: 0 });
      }

      if (condition.matches(node)) {
        const matchedPath = [...path, node];
        const count = matchCount + 1;
        const satisfied = !condition.mustMatchAgain(count);

        if (conditionIndex < last && satisfied) {
          for (const child of node.children) {
            pending.push({
              node: child,
              conditionIndex: conditionIndex + 1,
              path: matchedPath,
              matchCount: 0,
            });
          }
        }
        if (condition.canMatchAgain(count)) {
          for (const child of node.children) {
            pending.push({ node: child, conditionIndex, path: matchedPath, matchCount: count });
          }
        }
        if (conditionIndex === last && satisfied) {
          found.push(matchedPath);
        }
      }

      // Reversed so branches are explored in the order they were listed.
      for (let i = pending.length - 1; i >= 0; i--) {
        stack.push(pending[i]);
      }
    }

    return found;
  }
}

/**
 * Pattern over attack step names, where `*` stands for a run of one or more
 * arbitrary steps: `['attemptModify', '*', 'attemptRead']`.
 */
export function chainPattern(stepNames: string[]): SearchPattern {
  return new SearchPattern(
    stepNames.map((stepName) =>
      stepName === '*'
        ? new SearchCondition(SearchCondition.ANY, 1, Infinity)
        : new SearchCondition((node) => node.name === stepName)
    )
  );
}

/**
 * Attackers and the compromise bookkeeping they share with nodes.
 */

import { AttackGraphError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { SerializedAttacker } from '../storage/schema.js';
import type { AttackGraphNode } from './node.js';

const logger = createLogger('attacker');

export class Attacker {
  readonly name: string;
  entryPoints: Set<AttackGraphNode>;
  readonly reachedAttackSteps = new Set<AttackGraphNode>();
  /** Derived by calculateReachability, never persisted. */
  readonly reachableAttackSteps = new Set<AttackGraphNode>();

  private assignedId?: number;

  constructor(name: string, entryPoints: Iterable<AttackGraphNode> = []) {
    this.name = name;
    this.entryPoints = new Set(entryPoints);
  }

  get id(): number {
    if (this.assignedId === undefined) {
      throw new AttackGraphError(`Attacker ${this.name} has not been added to a graph`);
    }
    return this.assignedId;
  }

  get hasId(): boolean {
    return this.assignedId !== undefined;
  }

  /** @internal Called by AttackGraph.addAttacker. */
  assignId(id: number): void {
    this.assignedId = id;
  }

  /**
   * Mark `node` as compromised by this attacker. No-op when it already is.
   */
  compromise(node: AttackGraphNode): void {
    if (node.compromisedBy.has(this)) {
      logger.debug(`Attacker "${this.name}" had already compromised ${node.fullName}`);
      return;
    }
    logger.debug(`Attacker "${this.name}" compromises ${node.fullName}`);
    node.compromisedBy.add(this);
    this.reachedAttackSteps.add(node);
  }

  /**
   * Undo a compromise. No-op when the node was not compromised by this
   * attacker.
   */
  undoCompromise(node: AttackGraphNode): void {
    if (!node.compromisedBy.has(this)) {
      logger.debug(`Attacker "${this.name}" had not compromised ${node.fullName}`);
      return;
    }
    node.compromisedBy.delete(this);
    this.reachedAttackSteps.delete(node);
    this.entryPoints.delete(node);
  }

  toDict(): SerializedAttacker {
    return {
      id: this.id,
      name: this.name,
      entry_points: [...this.entryPoints].map((node) => node.fullName),
      reached_attack_steps: [...this.reachedAttackSteps].map((node) => node.fullName),
    };
  }
}

/**
 * Attack-step nodes.
 */

import type {
  AttackStepType,
  JsonObject,
  ModelAsset,
  TtcDescriptor,
} from '../core/types.js';
import type { SerializedAttackStep } from '../storage/schema.js';
import { AttackGraphError } from '../core/errors.js';
import type { Attacker } from './attacker.js';

export interface AttackGraphNodeOptions {
  type: AttackStepType;
  name: string;
  ttc?: TtcDescriptor;
  asset?: ModelAsset;
  defenseStatus?: number;
  existenceStatus?: boolean;
  isViable?: boolean;
  isNecessary?: boolean;
  tags?: Iterable<string>;
  mitreInfo?: string;
  extras?: JsonObject;
}

/**
 * One attack step of one asset. Nodes are owned by an AttackGraph, which
 * assigns their ids; edges are plain references to other nodes of the same
 * graph.
 */
export class AttackGraphNode {
  readonly type: AttackStepType;
  readonly name: string;
  ttc: TtcDescriptor;
  readonly asset?: ModelAsset;
  readonly children = new Set<AttackGraphNode>();
  readonly parents = new Set<AttackGraphNode>();
  defenseStatus?: number;
  existenceStatus?: boolean;
  isViable: boolean;
  isNecessary: boolean;
  readonly tags: Set<string>;
  readonly compromisedBy = new Set<Attacker>();
  readonly reachableBy = new Set<Attacker>();
  mitreInfo?: string;
  extras?: JsonObject;

  private assignedId?: number;

  constructor(options: AttackGraphNodeOptions) {
    this.type = options.type;
    this.name = options.name;
    this.ttc = options.ttc ?? null;
    this.asset = options.asset;
    this.defenseStatus = options.defenseStatus;
    this.existenceStatus = options.existenceStatus;
    this.isViable = options.isViable ?? true;
    this.isNecessary = options.isNecessary ?? true;
    this.tags = new Set(options.tags ?? []);
    this.mitreInfo = options.mitreInfo;
    this.extras = options.extras;
  }

  get id(): number {
    if (this.assignedId === undefined) {
      throw new AttackGraphError(`Attack step ${this.name} has not been added to a graph`);
    }
    return this.assignedId;
  }

  get hasId(): boolean {
    return this.assignedId !== undefined;
  }

  /** @internal Called by AttackGraph.addNode. */
  assignId(id: number): void {
    this.assignedId = id;
  }

  /**
   * `<asset>:<step>`, or `<id>:<step>` for nodes without an asset.
   */
  get fullName(): string {
    if (this.asset) {
      return `${this.asset.name}:${this.name}`;
    }
    return `${this.id}:${this.name}`;
  }

  isCompromised(): boolean {
    return this.compromisedBy.size > 0;
  }

  isCompromisedBy(attacker: Attacker): boolean {
    return this.compromisedBy.has(attacker);
  }

  compromise(attacker: Attacker): void {
    attacker.compromise(this);
  }

  undoCompromise(attacker: Attacker): void {
    attacker.undoCompromise(this);
  }

  /**
   * A defense that is fully enabled and not suppressed.
   */
  isEnabledDefense(): boolean {
    return this.type === 'defense' && !this.tags.has('suppress') && this.defenseStatus === 1.0;
  }

  /**
   * A defense that could still be enabled.
   */
  isAvailableDefense(): boolean {
    return this.type === 'defense' && !this.tags.has('suppress') && this.defenseStatus !== 1.0;
  }

  toDict(): SerializedAttackStep {
    const record: SerializedAttackStep = {
      id: this.id,
      type: this.type,
      name: this.name,
      ttc: this.ttc,
      children: [...this.children].map((child) => child.fullName),
      parents: [...this.parents].map((parent) => parent.fullName),
      compromised_by: [...this.compromisedBy].map((attacker) => attacker.name),
    };

    if (this.asset) record.asset = this.asset.name;
    if (this.defenseStatus !== undefined) record.defense_status = this.defenseStatus;
    if (this.existenceStatus !== undefined) record.existence_status = this.existenceStatus;
    record.is_viable = this.isViable;
    record.is_necessary = this.isNecessary;
    if (this.mitreInfo !== undefined) record.mitre_info = this.mitreInfo;
    if (this.tags.size > 0) record.tags = [...this.tags];
    if (this.extras && Object.keys(this.extras).length > 0) record.extras = this.extras;

    return record;
  }

  toString(): string {
    return `AttackGraphNode(${this.hasId ? this.fullName : this.name}, ${this.type})`;
  }
}

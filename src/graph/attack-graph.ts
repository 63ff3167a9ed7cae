/**
 * The attack graph: the sole owner of its nodes and attackers.
 */

import type { LanguageQuery, ModelAsset, ModelQuery } from '../core/types.js';
import { AttackGraphError, DuplicateIdError, GraphFormatError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { SerializedAttackGraph, SerializedAttackStep } from '../storage/schema.js';
import { AttackGraphNode } from './node.js';
import { Attacker } from './attacker.js';

const logger = createLogger('attack-graph');

/**
 * Full name a serialized record was written under. Records carry the asset
 * name when the node had one, otherwise the node was named by its id.
 */
function serializedFullName(record: SerializedAttackStep): string {
  return `${record.asset ?? record.id}:${record.name}`;
}

export class AttackGraph {
  readonly language?: LanguageQuery;
  readonly model?: ModelQuery;

  private readonly nodesById = new Map<number, AttackGraphNode>();
  private readonly nodesByFullName = new Map<string, AttackGraphNode>();
  private readonly attackersById = new Map<number, Attacker>();
  private nextNodeId = 0;
  private nextAttackerId = 0;

  constructor(options: { language?: LanguageQuery; model?: ModelQuery } = {}) {
    this.language = options.language;
    this.model = options.model;
  }

  /** Nodes in insertion order. */
  get nodes(): AttackGraphNode[] {
    return [...this.nodesById.values()];
  }

  /** Attackers in insertion order. */
  get attackers(): Attacker[] {
    return [...this.attackersById.values()];
  }

  getNodeById(id: number): AttackGraphNode | undefined {
    return this.nodesById.get(id);
  }

  getNodeByFullName(fullName: string): AttackGraphNode | undefined {
    return this.nodesByFullName.get(fullName);
  }

  getAttackerById(id: number): Attacker | undefined {
    return this.attackersById.get(id);
  }

  /**
   * Add a node, assigning the next free id unless one is given.
   *
   * @throws DuplicateIdError when the id or the full name is taken
   */
  addNode(node: AttackGraphNode, id?: number): AttackGraphNode {
    const nodeId = id ?? this.nextNodeId;
    if (this.nodesById.has(nodeId)) {
      throw new DuplicateIdError('node', nodeId);
    }

    const fullName = `${node.asset ? node.asset.name : nodeId}:${node.name}`;
    if (this.nodesByFullName.has(fullName)) {
      throw new DuplicateIdError('node', fullName, 'full name');
    }
    node.assignId(nodeId);

    logger.debug(`Add node ${fullName} with id ${nodeId}`);
    this.nodesById.set(nodeId, node);
    this.nodesByFullName.set(fullName, node);
    this.nextNodeId = Math.max(nodeId + 1, this.nextNodeId);
    return node;
  }

  /**
   * Remove a node and every edge touching it.
   *
   * @throws AttackGraphError when the node belongs to another graph
   */
  removeNode(node: AttackGraphNode): void {
    if (!node.hasId || this.nodesById.get(node.id) !== node) {
      throw new AttackGraphError(`${node} is not part of this graph`);
    }
    logger.debug(`Remove node ${node.fullName}`);
    for (const child of node.children) {
      child.parents.delete(node);
    }
    for (const parent of node.parents) {
      parent.children.delete(node);
    }
    node.children.clear();
    node.parents.clear();

    for (const attacker of [...node.compromisedBy]) {
      attacker.undoCompromise(node);
    }
    for (const attacker of node.reachableBy) {
      attacker.reachableAttackSteps.delete(node);
    }
    node.reachableBy.clear();

    this.nodesById.delete(node.id);
    this.nodesByFullName.delete(node.fullName);
  }

  /**
   * Link `parent` to `child` in both directions.
   */
  addEdge(parent: AttackGraphNode, child: AttackGraphNode): void {
    parent.children.add(child);
    child.parents.add(parent);
  }

  /**
   * Add an attacker and have it compromise the nodes listed by id.
   *
   * @throws DuplicateIdError when the id is taken
   */
  addAttacker(attacker: Attacker, id?: number, reachedStepIds: number[] = []): Attacker {
    const attackerId = id ?? this.nextAttackerId;
    if (this.attackersById.has(attackerId)) {
      throw new DuplicateIdError('attacker', attackerId);
    }

    attacker.assignId(attackerId);
    this.attackersById.set(attackerId, attacker);
    this.nextAttackerId = Math.max(attackerId + 1, this.nextAttackerId);

    for (const stepId of reachedStepIds) {
      const node = this.nodesById.get(stepId);
      if (!node) {
        logger.warn(`Attacker "${attacker.name}" reached unknown attack step id ${stepId}, skipping it`);
        continue;
      }
      attacker.compromise(node);
    }
    return attacker;
  }

  /**
   * Remove an attacker, undoing everything it compromised.
   *
   * @throws AttackGraphError when the attacker belongs to another graph
   */
  removeAttacker(attacker: Attacker): void {
    if (!attacker.hasId || this.attackersById.get(attacker.id) !== attacker) {
      throw new AttackGraphError(`Attacker "${attacker.name}" is not part of this graph`);
    }
    for (const node of [...attacker.reachedAttackSteps]) {
      attacker.undoCompromise(node);
    }
    for (const node of attacker.reachableAttackSteps) {
      node.reachableBy.delete(attacker);
    }
    attacker.reachableAttackSteps.clear();
    attacker.entryPoints.clear();
    this.attackersById.delete(attacker.id);
  }

  toDict(): SerializedAttackGraph {
    return {
      attack_steps: this.nodes.map((node) => node.toDict()),
      attackers: this.attackers.map((attacker) => attacker.toDict()),
    };
  }

  /**
   * Rebuild a graph from its serialized form. With a model, nodes get their
   * assets back by name.
   *
   * @throws GraphFormatError when a reference cannot be resolved
   */
  static fromDict(document: SerializedAttackGraph, model?: ModelQuery): AttackGraph {
    const graph = new AttackGraph({ model });
    const byDocumentName = new Map<string, AttackGraphNode>();

    for (const record of document.attack_steps) {
      let asset: ModelAsset | undefined;
      if (model && record.asset !== undefined) {
        asset = model.getAssetByName(record.asset);
        if (!asset) {
          throw new GraphFormatError(
            `Failed to find asset ${record.asset} for attack step ${serializedFullName(record)}`
          );
        }
      }

      const node = new AttackGraphNode({
        type: record.type,
        name: record.name,
        ttc: record.ttc,
        asset,
        defenseStatus: record.defense_status,
        existenceStatus: record.existence_status,
        isViable: record.is_viable,
        isNecessary: record.is_necessary,
        tags: record.tags,
        mitreInfo: record.mitre_info,
        extras: record.extras,
      });
      graph.addNode(node, record.id);
      byDocumentName.set(serializedFullName(record), node);
    }

    const resolve = (fullName: string, context: string): AttackGraphNode => {
      const node = byDocumentName.get(fullName);
      if (!node) {
        throw new GraphFormatError(`Failed to find attack step ${fullName} referenced by ${context}`);
      }
      return node;
    };

    // Edges come from `children` alone so their order survives a reload;
    // `parents` must then agree with them.
    for (const record of document.attack_steps) {
      const context = serializedFullName(record);
      const node = resolve(context, context);
      for (const childName of record.children) {
        graph.addEdge(node, resolve(childName, context));
      }
    }
    for (const record of document.attack_steps) {
      const context = serializedFullName(record);
      const node = resolve(context, context);
      const parents = new Set(record.parents.map((name) => resolve(name, context)));
      const mismatch =
        parents.size !== node.parents.size || [...parents].some((parent) => !node.parents.has(parent));
      if (mismatch) {
        throw new GraphFormatError(
          `Parents of attack step ${context} do not match the children listed by other attack steps`
        );
      }
    }

    for (const record of document.attackers) {
      const context = `attacker ${record.name}`;
      const reached = record.reached_attack_steps.map((name) => resolve(name, context).id);
      const attacker = graph.addAttacker(new Attacker(record.name), record.id, reached);
      attacker.entryPoints = new Set(record.entry_points.map((name) => resolve(name, context)));
      for (const entryPoint of attacker.entryPoints) {
        attacker.compromise(entryPoint);
      }
    }

    return graph;
  }

  toString(): string {
    return `AttackGraph(${this.nodesById.size} nodes)`;
  }
}

/**
 * Attack graph generation from a language specification and an instance
 * model, and attacher placement.
 */

import type {
  AttackStepSpec,
  LanguageQuery,
  ModelAsset,
  ModelQuery,
  PropertyValue,
} from '../core/types.js';
import { StepExpressionResolutionError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { AttackGraph } from './attack-graph.js';
import { AttackGraphNode } from './node.js';
import { Attacker } from './attacker.js';
import { evaluateStepExpression, type EvaluationOptions } from './step-expression.js';

const logger = createLogger('builder');

/**
 * Turn a model property into a defense status. Booleans map to 1.0/0.0 and
 * an unset defense is disabled.
 */
function toDefenseStatus(value: PropertyValue | undefined): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1.0 : 0.0;
  if (typeof value === 'string') {
    const parsed = Number(value);
    if (!Number.isNaN(parsed)) return parsed;
    return value.toLowerCase() === 'true' ? 1.0 : 0.0;
  }
  return 0.0;
}

function createNode(
  asset: ModelAsset,
  step: AttackStepSpec,
  language: LanguageQuery,
  model: ModelQuery,
  options: EvaluationOptions
): AttackGraphNode {
  let defenseStatus: number | undefined;
  let existenceStatus: boolean | undefined;

  switch (step.type) {
    case 'defense':
      defenseStatus = toDefenseStatus(model.getProperty(asset, step.name));
      logger.debug(`Defense status of ${asset.name}:${step.name} is ${defenseStatus}`);
      break;
    case 'exist':
    case 'notExist': {
      const required = step.requires?.stepExpressions[0];
      if (required) {
        const { assets } = evaluateStepExpression(required, [asset], language, model, options);
        existenceStatus = assets.length > 0;
      } else {
        logger.warn(`${asset.name}:${step.name} is an ${step.type} step without requirements`);
        existenceStatus = false;
      }
      break;
    }
    case 'or':
    case 'and':
      break;
  }

  const mitre = step.meta['mitre'];
  return new AttackGraphNode({
    type: step.type,
    name: step.name,
    ttc: step.ttc,
    asset,
    defenseStatus,
    existenceStatus,
    tags: step.tags,
    mitreInfo: typeof mitre === 'string' ? mitre : undefined,
  });
}

/**
 * Generate the attack graph of `model` under `language`.
 *
 * @throws StepExpressionResolutionError when a `reaches` expression leads to
 * an attack step the graph does not have
 */
export function buildAttackGraph(
  language: LanguageQuery,
  model: ModelQuery,
  options: EvaluationOptions = {}
): AttackGraph {
  const graph = new AttackGraph({ language, model });
  const specs = new Map<AttackGraphNode, AttackStepSpec>();

  for (const asset of model.assets) {
    if (!asset.type) {
      logger.warn(`Asset ${asset.name} has no type, it gets no attack steps`);
      continue;
    }
    logger.debug(`Generating attack steps for ${asset.name} of type ${asset.type}`);
    for (const step of language.getAttackSteps(asset.type).values()) {
      const node = createNode(asset, step, language, model, options);
      graph.addNode(node);
      specs.set(node, step);
    }
  }

  for (const [node, step] of specs) {
    const { asset } = node;
    if (!asset) continue;

    for (const expression of step.reaches?.stepExpressions ?? []) {
      const { assets, attackStep } = evaluateStepExpression(
        expression,
        [asset],
        language,
        model,
        options
      );
      if (attackStep === undefined) {
        logger.warn(`A reaches expression of ${node.fullName} does not end in an attack step`);
        continue;
      }
      for (const target of assets) {
        const targetFullName = `${target.name}:${attackStep}`;
        const child = graph.getNodeByFullName(targetFullName);
        if (!child) {
          logger.error(`Failed to find target node ${targetFullName} for ${node.fullName}`);
          throw new StepExpressionResolutionError(node.fullName, targetFullName);
        }
        graph.addEdge(node, child);
      }
    }
  }

  logger.info(`Generated ${graph.nodes.length} attack steps for model ${model.name}`);
  return graph;
}

/**
 * Create the model's attackers and compromise their entry points. Entry
 * points missing from the graph are logged and skipped.
 */
export function attachAttackers(graph: AttackGraph, model: ModelQuery): Attacker[] {
  logger.info(`Attaching attackers of model ${model.name}`);
  const attached: Attacker[] = [];

  for (const definition of model.attackers) {
    const attacker = graph.addAttacker(new Attacker(definition.name), definition.id);
    for (const { asset, attackSteps } of definition.entryPoints) {
      for (const stepName of attackSteps) {
        const fullName = `${asset.name}:${stepName}`;
        const node = graph.getNodeByFullName(fullName);
        if (!node) {
          logger.warn(`Failed to find entry point ${fullName} for attacker "${definition.name}"`);
          continue;
        }
        attacker.compromise(node);
      }
    }
    attacker.entryPoints = new Set(attacker.reachedAttackSteps);
    attached.push(attacker);
  }

  return attached;
}

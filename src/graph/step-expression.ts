/**
 * Step-expression evaluation.
 *
 * An expression is evaluated against a list of target assets and yields a
 * new list of assets, plus the attack step name when the expression ends in
 * one.
 */

import type {
  LanguageQuery,
  ModelAsset,
  ModelQuery,
  StepExpression,
} from '../core/types.js';
import { createLogger } from '../core/logger.js';

const logger = createLogger('step-expression');

export const DEFAULT_MAX_EXPRESSION_DEPTH = 64;

export interface EvaluationResult {
  assets: ModelAsset[];
  attackStep?: string;
}

export interface EvaluationOptions {
  /** Bound on nested expression depth, variable indirection included. */
  maxDepth?: number;
}

/**
 * Distinct assets of `assets`, in first-seen order.
 */
function distinct(assets: Iterable<ModelAsset>): ModelAsset[] {
  return [...new Set(assets)];
}

function union(lhs: ModelAsset[], rhs: ModelAsset[]): ModelAsset[] {
  return distinct([...lhs, ...rhs]);
}

function intersection(lhs: ModelAsset[], rhs: ModelAsset[]): ModelAsset[] {
  const right = new Set(rhs);
  return distinct(lhs.filter((asset) => right.has(asset)));
}

function difference(lhs: ModelAsset[], rhs: ModelAsset[]): ModelAsset[] {
  const right = new Set(rhs);
  return distinct(lhs.filter((asset) => !right.has(asset)));
}

/**
 * Evaluate `expression` against `targets`.
 *
 * Recoverable problems (unknown variants, variables on untyped assets,
 * unknown variables) are logged and produce an empty result.
 */
export function evaluateStepExpression(
  expression: StepExpression,
  targets: ModelAsset[],
  language: LanguageQuery,
  model: ModelQuery,
  options: EvaluationOptions = {}
): EvaluationResult {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_EXPRESSION_DEPTH;

  function evaluate(expr: StepExpression, assets: ModelAsset[], depth: number): EvaluationResult {
    if (depth > maxDepth) {
      logger.error(`Step expression nesting exceeds ${maxDepth} levels, giving up on it`);
      return { assets: [] };
    }

    switch (expr.type) {
      case 'attackStep':
        return { assets, attackStep: expr.name };

      case 'union':
      case 'intersection':
      case 'difference': {
        const lhs = evaluate(expr.lhs, assets, depth + 1).assets;
        const rhs = evaluate(expr.rhs, assets, depth + 1).assets;
        const combine =
          expr.type === 'union' ? union : expr.type === 'intersection' ? intersection : difference;
        return { assets: combine(lhs, rhs) };
      }

      case 'variable': {
        const untyped = assets.find((asset) => !asset.type);
        if (untyped) {
          logger.error(
            `Requested variable ${expr.name} from untyped target ${untyped.name}, which cannot be resolved`
          );
          return { assets: [] };
        }

        // Group by type: each type may bind the variable differently.
        const byType = new Map<string, ModelAsset[]>();
        for (const asset of assets) {
          const type = asset.type ?? '';
          const group = byType.get(type);
          if (group) group.push(asset);
          else byType.set(type, [asset]);
        }

        const resolved: ModelAsset[] = [];
        let attackStep: string | undefined;
        for (const [type, group] of byType) {
          const bound = language.getVariable(type, expr.name);
          if (!bound) {
            logger.error(`Failed to find variable ${expr.name} for asset type ${type}`);
            continue;
          }
          const result = evaluate(bound, group, depth + 1);
          resolved.push(...result.assets);
          attackStep ??= result.attackStep;
        }
        return attackStep === undefined ? { assets: resolved } : { assets: resolved, attackStep };
      }

      case 'field': {
        const associated: ModelAsset[] = [];
        for (const asset of assets) {
          associated.push(...model.getAssociatedAssets(asset, expr.name));
        }
        return { assets: associated };
      }

      case 'transitive': {
        const visited = new Set<ModelAsset>();
        const collected: ModelAsset[] = [];
        let frontier = assets;
        while (frontier.length > 0) {
          const next: ModelAsset[] = [];
          for (const asset of evaluate(expr.stepExpression, frontier, depth + 1).assets) {
            if (visited.has(asset)) continue;
            visited.add(asset);
            collected.push(asset);
            next.push(asset);
          }
          frontier = next;
        }
        return { assets: collected };
      }

      case 'subType': {
        const inner = evaluate(expr.stepExpression, assets, depth + 1).assets;
        return {
          assets: inner.filter(
            (asset) => asset.type !== undefined && language.extendsAsset(asset.type, expr.subType)
          ),
        };
      }

      case 'collect': {
        const lhs = evaluate(expr.lhs, assets, depth + 1);
        return evaluate(expr.rhs, lhs.assets, depth + 1);
      }

      default: {
        const unknown: never = expr;
        logger.error(`Unknown step expression type: ${JSON.stringify(unknown)}`);
        return { assets: [] };
      }
    }
  }

  return evaluate(expression, targets, 0);
}

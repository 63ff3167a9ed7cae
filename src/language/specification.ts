/**
 * Query interface over a compiled language specification document.
 */

import type {
  AssociationSpec,
  AttackStepSpec,
  LanguageQuery,
  StepExpression,
} from '../core/types.js';
import { createLogger } from '../core/logger.js';
import { loadDocument, validateDocument } from '../storage/files.js';
import { languageDocumentSchema, type LanguageDocument } from '../storage/schema.js';

const logger = createLogger('language');

type AssetDefinition = LanguageDocument['assets'][number];

function cloneStep(step: AttackStepSpec): AttackStepSpec {
  return structuredClone(step);
}

export class LanguageSpecification implements LanguageQuery {
  private readonly assets = new Map<string, AssetDefinition>();
  private readonly attackStepCache = new Map<string, Map<string, AttackStepSpec>>();
  private readonly resolving = new Set<string>();

  constructor(readonly document: LanguageDocument) {
    for (const asset of document.assets) {
      this.assets.set(asset.name, asset);
    }
  }

  get id(): string | undefined {
    return this.document.defines['id'];
  }

  get assetTypes(): string[] {
    return [...this.assets.keys()];
  }

  /**
   * Attack steps of `assetType` with inheritance applied. A step redefined
   * in a sub type replaces the inherited one when its reaches override,
   * otherwise its reaches are appended to the inherited ones.
   */
  getAttackSteps(assetType: string): Map<string, AttackStepSpec> {
    const cached = this.attackStepCache.get(assetType);
    if (cached) return cached;

    const asset = this.assets.get(assetType);
    if (!asset) {
      logger.error(`Failed to find asset type ${assetType} when looking for attack steps`);
      return new Map();
    }

    if (this.resolving.has(assetType)) {
      logger.error(`Asset type ${assetType} inherits from itself`);
      return new Map();
    }

    const steps = new Map<string, AttackStepSpec>();
    if (asset.superAsset) {
      this.resolving.add(assetType);
      try {
        for (const [name, step] of this.getAttackSteps(asset.superAsset)) {
          steps.set(name, cloneStep(step));
        }
      } finally {
        this.resolving.delete(assetType);
      }
    }

    for (const step of asset.attackSteps) {
      const inherited = steps.get(step.name);
      if (!inherited || step.reaches?.overrides) {
        steps.set(step.name, cloneStep(step));
      } else if (step.reaches) {
        const reaches = structuredClone(step.reaches.stepExpressions);
        if (inherited.reaches) {
          inherited.reaches.stepExpressions.push(...reaches);
        } else {
          inherited.reaches = { overrides: false, stepExpressions: reaches };
        }
      }
    }

    this.attackStepCache.set(assetType, steps);
    return steps;
  }

  getVariable(assetType: string, name: string): StepExpression | undefined {
    for (const asset of this.lineage(assetType)) {
      const variable = asset.variables.find((candidate) => candidate.name === name);
      if (variable) return variable.stepExpression;
    }
    return undefined;
  }

  /**
   * Associations an asset type takes part in, its super types' included.
   */
  getAssociations(assetType: string): AssociationSpec[] {
    const associations: AssociationSpec[] = [];
    for (const { name } of this.lineage(assetType)) {
      associations.push(
        ...this.document.associations.filter(
          (association) => association.leftAsset === name || association.rightAsset === name
        )
      );
    }
    return associations;
  }

  extendsAsset(assetType: string, superType: string): boolean {
    for (const asset of this.lineage(assetType)) {
      if (asset.name === superType) return true;
    }
    return false;
  }

  /**
   * The asset type followed by its super types, nearest first.
   */
  private *lineage(assetType: string): Generator<AssetDefinition> {
    const visited = new Set<string>();
    let current = this.assets.get(assetType);
    while (current && !visited.has(current.name)) {
      visited.add(current.name);
      yield current;
      current = current.superAsset ? this.assets.get(current.superAsset) : undefined;
    }
  }
}

/**
 * Load a compiled language specification from JSON or YAML.
 */
export function loadLanguageSpecification(filePath: string): LanguageSpecification {
  logger.info(`Loading language specification from ${filePath}`);
  const document = validateDocument(languageDocumentSchema, loadDocument(filePath), filePath);
  return new LanguageSpecification(document);
}

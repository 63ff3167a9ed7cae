/**
 * In-memory instance model: assets, associations between them and attacker
 * definitions.
 */

import type {
  AttackerDefinition,
  ModelAsset,
  ModelQuery,
  PropertyValue,
} from '../core/types.js';
import { GraphFormatError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { loadDocument, validateDocument } from '../storage/files.js';
import { modelDocumentSchema, type ModelDocument } from '../storage/schema.js';

const logger = createLogger('model');

export interface Asset extends ModelAsset {
  readonly type: string;
  readonly properties: Map<string, PropertyValue>;
}

/**
 * An association instance. From an asset on the right, `leftField` leads to
 * the left assets; from an asset on the left, `rightField` leads to the
 * right ones.
 */
export interface Association {
  name: string;
  leftField: string;
  left: Asset[];
  rightField: string;
  right: Asset[];
}

export class InstanceModel implements ModelQuery {
  private readonly assetsById = new Map<number, Asset>();
  private readonly assetsByName = new Map<string, Asset>();
  readonly associations: Association[] = [];
  readonly attackers: AttackerDefinition[] = [];
  private nextAssetId = 0;

  constructor(readonly name: string = 'model') {}

  get assets(): Asset[] {
    return [...this.assetsById.values()];
  }

  addAsset(
    type: string,
    name: string,
    properties: Record<string, PropertyValue> = {},
    id: number = this.nextAssetId
  ): Asset {
    if (this.assetsById.has(id)) {
      throw new GraphFormatError(`An asset with id ${id} already exists in model ${this.name}`);
    }
    if (this.assetsByName.has(name)) {
      throw new GraphFormatError(`An asset named ${name} already exists in model ${this.name}`);
    }
    const asset: Asset = { id, name, type, properties: new Map(Object.entries(properties)) };
    this.assetsById.set(id, asset);
    this.assetsByName.set(name, asset);
    this.nextAssetId = Math.max(id + 1, this.nextAssetId);
    return asset;
  }

  addAssociation(association: Association): Association {
    this.associations.push(association);
    return association;
  }

  addAttacker(definition: AttackerDefinition): AttackerDefinition {
    this.attackers.push(definition);
    return definition;
  }

  getAssetById(id: number): Asset | undefined {
    return this.assetsById.get(id);
  }

  getAssetByName(name: string): Asset | undefined {
    return this.assetsByName.get(name);
  }

  getAssociatedAssets(asset: ModelAsset, fieldName: string): Asset[] {
    const associated: Asset[] = [];
    for (const association of this.associations) {
      if (association.leftField === fieldName && association.right.some((a) => a === asset)) {
        associated.push(...association.left);
      }
      if (association.rightField === fieldName && association.left.some((a) => a === asset)) {
        associated.push(...association.right);
      }
    }
    return associated;
  }

  getProperty(asset: ModelAsset, name: string): PropertyValue | undefined {
    return this.assetsById.get(asset.id)?.properties.get(name);
  }
}

/**
 * Build a model from its document form. Associations and attackers refer to
 * assets by name.
 */
export function modelFromDocument(document: ModelDocument): InstanceModel {
  const model = new InstanceModel(document.name);
  for (const asset of document.assets) {
    model.addAsset(asset.type, asset.name, asset.properties, asset.id);
  }

  const lookup = (name: string, context: string): Asset => {
    const asset = model.getAssetByName(name);
    if (!asset) {
      throw new GraphFormatError(`Unknown asset ${name} referenced by ${context}`);
    }
    return asset;
  };

  for (const association of document.associations) {
    const context = `association ${association.name}`;
    model.addAssociation({
      name: association.name,
      leftField: association.leftField,
      left: association.left.map((name) => lookup(name, context)),
      rightField: association.rightField,
      right: association.right.map((name) => lookup(name, context)),
    });
  }

  for (const attacker of document.attackers) {
    const context = `attacker ${attacker.name}`;
    model.addAttacker({
      id: attacker.id,
      name: attacker.name,
      entryPoints: attacker.entryPoints.map((entryPoint) => ({
        asset: lookup(entryPoint.asset, context),
        attackSteps: entryPoint.attackSteps,
      })),
    });
  }

  return model;
}

/**
 * Load an instance model from JSON or YAML.
 */
export function loadInstanceModel(filePath: string): InstanceModel {
  logger.info(`Loading instance model from ${filePath}`);
  const document = validateDocument(modelDocumentSchema, loadDocument(filePath), filePath);
  return modelFromDocument(document);
}

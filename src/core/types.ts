/**
 * Core type definitions for attack graphs and the collaborators they are
 * generated from.
 */

/**
 * Any value that survives a JSON/YAML round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * The five kinds of attack step.
 */
export type AttackStepType = 'or' | 'and' | 'defense' | 'exist' | 'notExist';

export const ATTACK_STEP_TYPES = [
  'or',
  'and',
  'defense',
  'exist',
  'notExist',
] as const satisfies readonly AttackStepType[];

/**
 * Time-to-compromise distribution. Opaque to the engine, carried through
 * generation and persistence untouched.
 */
export type TtcDescriptor = JsonObject | null;

// Step expressions

export interface AttackStepExpression {
  type: 'attackStep';
  name: string;
}

export interface SetExpression {
  type: 'union' | 'intersection' | 'difference';
  lhs: StepExpression;
  rhs: StepExpression;
}

export interface CollectExpression {
  type: 'collect';
  lhs: StepExpression;
  rhs: StepExpression;
}

export interface VariableExpression {
  type: 'variable';
  name: string;
}

export interface FieldExpression {
  type: 'field';
  name: string;
}

export interface TransitiveExpression {
  type: 'transitive';
  stepExpression: StepExpression;
}

export interface SubTypeExpression {
  type: 'subType';
  subType: string;
  stepExpression: StepExpression;
}

/**
 * A step expression navigates from a set of assets to related assets and,
 * at its tail, names the attack step to attach to.
 */
export type StepExpression =
  | AttackStepExpression
  | SetExpression
  | CollectExpression
  | VariableExpression
  | FieldExpression
  | TransitiveExpression
  | SubTypeExpression;

/**
 * A `requires` or `reaches` block of an attack step.
 */
export interface StepExpressionList {
  overrides: boolean;
  stepExpressions: StepExpression[];
}

/**
 * An attack step as resolved for one asset type.
 */
export interface AttackStepSpec {
  name: string;
  type: AttackStepType;
  ttc: TtcDescriptor;
  tags: string[];
  meta: JsonObject;
  requires: StepExpressionList | null;
  reaches: StepExpressionList | null;
}

export interface AssociationSpec {
  name: string;
  leftAsset: string;
  leftField: string;
  rightAsset: string;
  rightField: string;
}

/**
 * What graph generation needs from a compiled language specification.
 */
export interface LanguageQuery {
  /** Inheritance-flattened attack steps of an asset type, in declaration order. */
  getAttackSteps(assetType: string): Map<string, AttackStepSpec>;
  getVariable(assetType: string, name: string): StepExpression | undefined;
  getAssociations(assetType: string): AssociationSpec[];
  /** True when `assetType` is `superType` or inherits from it. */
  extendsAsset(assetType: string, superType: string): boolean;
}

// Instance model

export interface ModelAsset {
  readonly id: number;
  readonly name: string;
  readonly type?: string;
}

export type PropertyValue = string | number | boolean;

export interface AttackerEntryPoint {
  asset: ModelAsset;
  attackSteps: string[];
}

export interface AttackerDefinition {
  id: number;
  name: string;
  entryPoints: AttackerEntryPoint[];
}

/**
 * What graph generation needs from an instance model.
 */
export interface ModelQuery {
  readonly name: string;
  readonly assets: readonly ModelAsset[];
  readonly attackers: readonly AttackerDefinition[];
  getAssociatedAssets(asset: ModelAsset, fieldName: string): ModelAsset[];
  getProperty(asset: ModelAsset, name: string): PropertyValue | undefined;
  getAssetByName(name: string): ModelAsset | undefined;
  getAssetById(id: number): ModelAsset | undefined;
}

/**
 * Attack graph generation and analysis.
 *
 * @packageDocumentation
 */

export type {
  AttackStepType,
  AttackStepSpec,
  AssociationSpec,
  StepExpression,
  LanguageQuery,
  ModelAsset,
  ModelQuery,
  AttackerDefinition,
} from './core/types.js';
export {
  AttackGraphError,
  StepExpressionResolutionError,
  DuplicateIdError,
  UnsupportedFileFormatError,
  GraphFormatError,
} from './core/errors.js';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './core/logger.js';
export { loadConfig, parseConfig, DEFAULT_CONFIG, type EngineConfig } from './core/config.js';
export { evaluateStepExpression, type EvaluationResult } from './graph/step-expression.js';
export { AttackGraphNode } from './graph/node.js';
export { Attacker } from './graph/attacker.js';
export { AttackGraph } from './graph/attack-graph.js';
export { buildAttackGraph, attachAttackers } from './graph/builder.js';
export { calculateReachability } from './analysis/reachability.js';
export { SearchCondition, SearchPattern, chainPattern } from './analysis/patterns.js';
export { loadAttackGraph, saveAttackGraph } from './storage/files.js';
export type { SerializedAttackGraph } from './storage/schema.js';
export { LanguageSpecification, loadLanguageSpecification } from './language/specification.js';
export { InstanceModel, loadInstanceModel } from './model/instance-model.js';

/**
 * Error types raised by graph generation, the graph store and persistence.
 */

export class AttackGraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A `reaches` expression led to an attack step that is not in the graph.
 * The language specification and the model disagree.
 */
export class StepExpressionResolutionError extends AttackGraphError {
  constructor(
    readonly sourceFullName: string,
    readonly targetFullName: string
  ) {
    super(
      `Failed to find target node ${targetFullName} to link with for attack step ${sourceFullName}`
    );
  }
}

export class DuplicateIdError extends AttackGraphError {
  constructor(
    readonly kind: 'node' | 'attacker',
    readonly id: number | string,
    key: 'id' | 'full name' = 'id'
  ) {
    super(
      `An ${kind === 'node' ? 'attack step' : 'attacker'} with ${key} ${id} already exists in the graph`
    );
  }
}

export class UnsupportedFileFormatError extends AttackGraphError {
  constructor(readonly filePath: string) {
    super(`Unknown file extension for ${filePath}, expected .json, .yml or .yaml`);
  }
}

/**
 * A persisted document failed validation or references something it does
 * not define.
 */
export class GraphFormatError extends AttackGraphError {}

/**
 * Error types shared across modules
 *
 * Degraded provider failures are not modelled here: retrieval stages absorb
 * them and leave the corresponding state field null.
 */

/**
 * A required credential or dataset identifier is missing or invalid.
 * Raised before any network call is attempted.
 */
export class ConfigurationError extends Error {
  readonly parameter: string;

  constructor(parameter: string, message?: string) {
    super(message ?? `${parameter} is required`);
    this.name = 'ConfigurationError';
    this.parameter = parameter;
  }
}

/**
 * A stage graph definition is not a valid DAG
 */
export class GraphDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphDefinitionError';
  }
}

/**
 * A stage returned an update for a field it does not own
 */
export class StageOwnershipError extends Error {
  readonly stage: string;
  readonly field: string;

  constructor(stage: string, field: string) {
    super(`Stage "${stage}" attempted to write "${field}", which it does not own`);
    this.name = 'StageOwnershipError';
    this.stage = stage;
    this.field = field;
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

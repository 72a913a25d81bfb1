/**
 * Error taxonomy for graph construction and execution.
 *
 * Configuration errors surface at build time, variable errors before the
 * first node runs, routing errors at the transition that failed. Errors
 * thrown by a node's own `run` are never wrapped in any of these.
 */

export type AriumErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'VARIABLE_RESOLUTION_ERROR'
  | 'ROUTING_ERROR';

// Base class for engine errors
export class AriumError extends Error {
  readonly code: AriumErrorCode;
  readonly isOperational: boolean;

  constructor(message: string, code: AriumErrorCode) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AriumError {
  readonly reference?: string;
  readonly alternatives: string[];

  constructor(message: string, details: { reference?: string; alternatives?: string[] } = {}) {
    const alternatives = details.alternatives ?? [];
    super(
      alternatives.length
        ? `${message}. Available: [${alternatives.join(', ')}]`
        : message,
      'CONFIGURATION_ERROR',
    );
    this.reference = details.reference;
    this.alternatives = alternatives;
  }
}

export class VariableResolutionError extends AriumError {
  readonly missingByNode: Record<string, string[]>;
  readonly provided: string[];

  constructor(missingByNode: Record<string, string[]>, provided: string[]) {
    const lines = Object.entries(missingByNode).map(
      ([owner, names]) => `  - ${owner}: ${names.join(', ')}`,
    );
    super(
      `Missing required variables:\n${lines.join('\n')}\nProvided variables: [${provided.join(', ')}]`,
      'VARIABLE_RESOLUTION_ERROR',
    );
    this.missingByNode = missingByNode;
    this.provided = provided;
  }

  /** Every missing name across all owners, sorted and de-duplicated. */
  get missing(): string[] {
    return [...new Set(Object.values(this.missingByNode).flat())].sort();
  }
}

export class RoutingError extends AriumError {
  readonly fromNode: string;
  readonly chosen?: string;
  readonly candidates: string[];

  constructor(
    message: string,
    details: { fromNode: string; chosen?: string; candidates?: string[] },
  ) {
    const candidates = details.candidates ?? [];
    super(
      candidates.length ? `${message}. Valid candidates: [${candidates.join(', ')}]` : message,
      'ROUTING_ERROR',
    );
    this.fromNode = details.fromNode;
    this.chosen = details.chosen;
    this.candidates = candidates;
  }
}

export function isAriumError(value: unknown): value is AriumError {
  return value instanceof AriumError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

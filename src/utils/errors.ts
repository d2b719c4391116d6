export class ValidationError extends Error {
  code = 'VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class DuplicateDetectionError extends Error {
  code = 'DUPLICATE_DETECTION';
  constructor(public detectionId: string) {
    super(`Duplicate detection id: ${detectionId}`);
    this.name = 'DuplicateDetectionError';
  }

  get details(): { detectionId: string } {
    return { detectionId: this.detectionId };
  }
}

export class StructureError extends Error {
  code = 'STRUCTURE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'StructureError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class CollaboratorError extends Error {
  code = 'COLLABORATOR_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'CollaboratorError';
  }
}

export type StructureFailure = ValidationError | DuplicateDetectionError | StructureError;

export function isClientError(error: unknown): error is StructureFailure {
  return (
    error instanceof ValidationError ||
    error instanceof DuplicateDetectionError ||
    error instanceof StructureError
  );
}

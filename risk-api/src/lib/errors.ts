export class RiskEngineError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class MissingRequiredFieldError extends RiskEngineError {
  readonly field: string;

  constructor(field: string) {
    super('missing_required_field', `Required field "${field}" is missing`, 400);
    this.field = field;
  }
}

export class PipelineStateError extends RiskEngineError {
  constructor(message: string) {
    super('pipeline_not_ready', message, 409);
  }
}

export class PersistenceError extends RiskEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('model_persistence_failed', message, 500);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class DatasetLoadError extends RiskEngineError {
  constructor(message: string) {
    super('dataset_load_failed', message, 500);
  }
}

/**
 * Typed error hierarchy for IES parsing, serialization and rescaling.
 *
 * Every failure carries a machine-readable code and optional context
 * (line number, field name, resource identifier).
 */

export class IesError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IesError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A resource could not be read, was empty, or could not be written. */
export class ResourceError extends IesError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RESOURCE_ERROR', context);
    this.name = 'ResourceError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** An expected line, field or array is missing or too short. */
export class StructureError extends IesError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STRUCTURE_ERROR', context);
    this.name = 'StructureError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A token does not parse as its declared numeric kind. */
export class NumericFormatError extends IesError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NUMERIC_FORMAT_ERROR', context);
    this.name = 'NumericFormatError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends IesError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SerializationError extends IesError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SERIALIZATION_ERROR', context);
    this.name = 'SerializationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends IesError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

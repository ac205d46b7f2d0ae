export class AppError extends Error {
  constructor(
    public code: string,
    public exitCode: number,
    message: string
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public field?: string
  ) {
    super('VALIDATION_ERROR', 2, message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class DuplicateSlotError extends AppError {
  constructor(
    public date: string,
    public time: string,
    message: string = `A slot already exists for ${date} at ${time}`
  ) {
    super('DUPLICATE_SLOT', 3, message);
    this.name = 'DuplicateSlotError';
    Object.setPrototypeOf(this, DuplicateSlotError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', 4, message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class RemoteServiceError extends AppError {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error
  ) {
    super('REMOTE_SERVICE_ERROR', 5, `${service}.${operation} failed: ${originalError.message}`);
    this.name = 'RemoteServiceError';
    Object.setPrototypeOf(this, RemoteServiceError.prototype);
  }
}

export class ConfigMissingError extends AppError {
  constructor(
    message: string = 'Clinic calendars are not configured. Run "clinic setup --student <id> --clinic <id>" first.'
  ) {
    super('CONFIG_MISSING', 6, message);
    this.name = 'ConfigMissingError';
    Object.setPrototypeOf(this, ConfigMissingError.prototype);
  }
}

export class StoreError extends AppError {
  constructor(
    message: string,
    public filePath: string
  ) {
    super('STORE_ERROR', 7, message);
    this.name = 'StoreError';
    Object.setPrototypeOf(this, StoreError.prototype);
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string') {
    return new Error(value.message);
  }
  return new Error(String(value));
}

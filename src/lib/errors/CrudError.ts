import { AppError } from './AppError';

/**
 * CRUD engine domain errors.
 * Transports map InvalidInputError to 400 and RecordNotFoundError to 404;
 * store failures travel as StoreActionError.
 */

export class InvalidInputError extends AppError {
  constructor(
    message: string,
    readonly details?: Readonly<Record<string, string>>,
  ) {
    super(message, 'CRUD_INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class RecordNotFoundError extends AppError {
  constructor(
    readonly resource: string,
    readonly id: string | number,
  ) {
    super(`Record not found in ${resource} with id ${String(id)}`, 'CRUD_NOT_FOUND');
    this.name = 'RecordNotFoundError';
  }
}

export class SchemaDefinitionError extends AppError {
  constructor(
    readonly resource: string,
    readonly reason: string,
  ) {
    super(`Invalid resource schema ${resource}: ${reason}`, 'SCHEMA_INVALID');
    this.name = 'SchemaDefinitionError';
  }
}

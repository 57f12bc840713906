export type SessionErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'EMPTY_LIBRARY'
  | 'INVALID_EXERCISE_DATA';

export class SessionError extends Error {
  readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string) {
    super(message);
    this.name = 'SessionError';
    this.code = code;
  }
}

export class InvalidConfigurationError extends SessionError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', message);
    this.name = 'InvalidConfigurationError';
  }
}

export class EmptyLibraryError extends SessionError {
  constructor(message = 'No exercise matches the selected equipment.') {
    super('EMPTY_LIBRARY', message);
    this.name = 'EmptyLibraryError';
  }
}

export class InvalidExerciseDataError extends SessionError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('INVALID_EXERCISE_DATA', message);
    this.name = 'InvalidExerciseDataError';
    this.field = field;
  }
}

export const isSessionError = (value: unknown): value is SessionError =>
  value instanceof SessionError;

export const getErrorMessage = (value: unknown): string => {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
};

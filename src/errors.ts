export type PasswordErrorCode = 'INVALID_LENGTH' | 'NO_CHARACTER_CLASS_SELECTED' | 'RNG_ERROR';

export class PasswordGenerationError extends Error {
  readonly code: PasswordErrorCode;

  constructor(code: PasswordErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidLengthError extends PasswordGenerationError {
  readonly minLength: number;

  constructor(minLength: number) {
    super('INVALID_LENGTH', `password length must be at least ${minLength} characters`);
    this.minLength = minLength;
  }
}

export class NoCharacterClassSelectedError extends PasswordGenerationError {
  constructor() {
    super('NO_CHARACTER_CLASS_SELECTED', 'at least one character type must be selected');
  }
}

export class RngError extends PasswordGenerationError {
  constructor(message: string, cause?: unknown) {
    super('RNG_ERROR', message, cause === undefined ? undefined : { cause });
  }
}

export type ContactBookErrorCode =
  | 'InvalidName'
  | 'InvalidPhoneFormat'
  | 'InvalidDateFormat'
  | 'NotFound';

/**
 * Base class for every error the address book reports.
 * The `code` is stable and is what callers branch on.
 */
export class ContactBookError extends Error {
  readonly code: ContactBookErrorCode;

  constructor(message: string, code: ContactBookErrorCode) {
    super(message);
    Object.setPrototypeOf(this, ContactBookError.prototype);
    this.name = 'ContactBookError';
    this.code = code;
  }

  isValidation(): boolean {
    return this.code !== 'NotFound';
  }
}

export class InvalidNameError extends ContactBookError {
  constructor() {
    super('Contact name must not be empty.', 'InvalidName');
    Object.setPrototypeOf(this, InvalidNameError.prototype);
    this.name = 'InvalidNameError';
  }
}

export class InvalidPhoneFormatError extends ContactBookError {
  constructor(
    readonly value: string,
    reason = 'The number must contain exactly 10 digits'
  ) {
    super(`Invalid phone number "${value}". ${reason}.`, 'InvalidPhoneFormat');
    Object.setPrototypeOf(this, InvalidPhoneFormatError.prototype);
    this.name = 'InvalidPhoneFormatError';
  }
}

export class InvalidDateFormatError extends ContactBookError {
  constructor(readonly value: string) {
    super(
      `Invalid date "${value}". Use a real date in DD.MM.YYYY format.`,
      'InvalidDateFormat'
    );
    Object.setPrototypeOf(this, InvalidDateFormatError.prototype);
    this.name = 'InvalidDateFormatError';
  }
}

export class NotFoundError extends ContactBookError {
  constructor(what: string) {
    super(`${what} not found.`, 'NotFound');
    Object.setPrototypeOf(this, NotFoundError.prototype);
    this.name = 'NotFoundError';
  }
}

export type ValidationError =
  | InvalidNameError
  | InvalidPhoneFormatError
  | InvalidDateFormatError;

/**
 * Thrown at startup when an environment variable cannot be used.
 */
export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    Object.setPrototypeOf(this, ConfigError.prototype);
    this.name = 'ConfigError';
  }
}

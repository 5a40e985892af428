export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Same message whether the account is missing or the password is wrong.
 */
export class InvalidCredentialsError extends AuthError {
  constructor(message = 'Invalid credentials') {
    super(message);
  }
}

export class WeakCredentialError extends AuthError {
  constructor(message = 'Password does not meet the policy') {
    super(message);
  }
}

export class TokenExpiredError extends AuthError {
  constructor(
    public readonly expiredAt: Date,
    message = 'Token has expired'
  ) {
    super(message);
  }
}

export class TokenInvalidError extends AuthError {
  constructor(message = 'Token is invalid') {
    super(message);
  }
}

export class ForbiddenError extends AuthError {
  constructor(message = 'Not authorized to perform this action') {
    super(message);
  }
}

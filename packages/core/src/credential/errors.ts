/** raised when a credential store holds no credential */
export class CredentialNotFoundError extends Error {
  constructor(message = 'no stored credential found') {
    super(message);
    this.name = 'CredentialNotFoundError';
  }
}

/** raised when a stored credential document cannot be understood */
export class InvalidCredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCredentialError';
  }
}

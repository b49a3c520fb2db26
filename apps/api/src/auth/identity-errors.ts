export type InvalidCredentialCause =
  | "missing"
  | "malformed"
  | "expired"
  | "not_yet_valid"
  | "signature"
  | "unknown_key"
  | "claims";

/**
 * The credential itself was rejected. Callers answer with a uniform 401 and
 * log `credentialCause` for operators.
 */
export class InvalidCredentialError extends Error {
  constructor(
    readonly credentialCause: InvalidCredentialCause,
    message: string
  ) {
    super(message);
    this.name = "InvalidCredentialError";
  }
}

/** Signing keys could not be fetched. Says nothing about the credential. */
export class IdentityProviderUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IdentityProviderUnavailableError";
  }
}

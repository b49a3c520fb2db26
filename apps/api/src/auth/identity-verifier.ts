import jwt from "jsonwebtoken";
import { InvalidCredentialError } from "./identity-errors.js";
import type { SigningKeySource } from "./signing-keys.js";

export interface VerifiedIdentity {
  subjectId: string;
  email: string;
  emailVerified: boolean;
  displayName: string | null;
  issuedAt: Date;
  expiresAt: Date;
}

export interface IdentityVerifierOptions {
  keys: SigningKeySource;
  audience: string;
  issuer: string;
  clockToleranceSeconds?: number;
}

const MAX_SUBJECT_LENGTH = 128;

function toInvalidCredential(error: unknown) {
  if (error instanceof jwt.TokenExpiredError) {
    return new InvalidCredentialError("expired", "Credential has expired");
  }

  if (error instanceof jwt.NotBeforeError) {
    return new InvalidCredentialError("not_yet_valid", "Credential is not valid yet");
  }

  if (error instanceof jwt.JsonWebTokenError) {
    if (error.message.includes("signature")) {
      return new InvalidCredentialError("signature", "Credential signature is invalid");
    }

    if (error.message.includes("audience") || error.message.includes("issuer")) {
      return new InvalidCredentialError("claims", error.message);
    }

    return new InvalidCredentialError("malformed", error.message);
  }

  return new InvalidCredentialError("malformed", "Credential could not be verified");
}

/**
 * Verifies identity-provider ID tokens (RS256, `kid`-addressed signing keys)
 * and extracts the claims the rest of the service relies on.
 */
export class IdentityVerifier {
  constructor(private readonly options: IdentityVerifierOptions) {}

  async verify(credential: string): Promise<VerifiedIdentity> {
    if (credential.trim().length === 0) {
      throw new InvalidCredentialError("missing", "Credential is empty");
    }

    const decoded = jwt.decode(credential, { complete: true });

    if (!decoded || typeof decoded.payload === "string") {
      throw new InvalidCredentialError("malformed", "Credential is not a signed token");
    }

    if (decoded.header.alg !== "RS256" || !decoded.header.kid) {
      throw new InvalidCredentialError("malformed", "Credential header is not supported");
    }

    const key = await this.lookupKey(decoded.header.kid);
    let payload: string | jwt.JwtPayload;

    try {
      payload = jwt.verify(credential, key, {
        algorithms: ["RS256"],
        audience: this.options.audience,
        issuer: this.options.issuer,
        clockTolerance: this.options.clockToleranceSeconds ?? 5
      });
    } catch (error) {
      throw toInvalidCredential(error);
    }

    if (typeof payload === "string") {
      throw new InvalidCredentialError("malformed", "Credential payload is not an object");
    }

    const { sub, email, email_verified: emailVerified, name, iat, exp } = payload;

    if (typeof sub !== "string" || sub.length === 0 || sub.length > MAX_SUBJECT_LENGTH) {
      throw new InvalidCredentialError("claims", "Credential subject is missing or invalid");
    }

    if (typeof email !== "string" || email.length === 0) {
      throw new InvalidCredentialError("claims", "Credential carries no email");
    }

    if (typeof iat !== "number" || typeof exp !== "number") {
      throw new InvalidCredentialError("claims", "Credential lifetime claims are missing");
    }

    return {
      subjectId: sub,
      email,
      emailVerified: emailVerified === true,
      displayName: typeof name === "string" && name.length > 0 ? name : null,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000)
    };
  }

  private async lookupKey(kid: string) {
    const cached = await this.options.keys.getKey(kid);

    if (cached) {
      return cached;
    }

    // Providers rotate keys ahead of use; an unknown kid may just mean a stale cache.
    const refreshed = await this.options.keys.getKey(kid, { forceRefresh: true });

    if (!refreshed) {
      throw new InvalidCredentialError("unknown_key", `No signing key published for kid ${kid}`);
    }

    return refreshed;
  }
}


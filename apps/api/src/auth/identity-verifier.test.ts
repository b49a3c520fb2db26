import crypto from "node:crypto";
import { describe, expect, it } from "vitest";
import {
  TEST_AUDIENCE,
  TEST_ISSUER,
  TEST_KID,
  testPublicKey,
  tokenFor
} from "../testing/harness.js";
import { IdentityProviderUnavailableError, InvalidCredentialError } from "./identity-errors.js";
import { IdentityVerifier } from "./identity-verifier.js";
import { StaticSigningKeySource, type SigningKeySource } from "./signing-keys.js";

function createVerifier(keys: SigningKeySource = new StaticSigningKeySource({ [TEST_KID]: testPublicKey })) {
  return new IdentityVerifier({ keys, audience: TEST_AUDIENCE, issuer: TEST_ISSUER });
}

async function causeOf(promise: Promise<unknown>) {
  try {
    await promise;
  } catch (error) {
    if (error instanceof InvalidCredentialError) {
      return error.credentialCause;
    }

    throw error;
  }

  throw new Error("Expected the credential to be rejected");
}

describe("identity verifier", () => {
  it("returns the verified claims of a valid token", async () => {
    const identity = await createVerifier().verify(
      tokenFor({ sub: "subject-1", email: "host@example.test", name: "Pat Host" })
    );

    expect(identity.subjectId).toBe("subject-1");
    expect(identity.email).toBe("host@example.test");
    expect(identity.emailVerified).toBe(true);
    expect(identity.displayName).toBe("Pat Host");
    expect(identity.expiresAt.getTime() - identity.issuedAt.getTime()).toBe(3_600_000);
  });

  it("rejects an empty credential as missing", async () => {
    expect(await causeOf(createVerifier().verify("   "))).toBe("missing");
  });

  it("rejects a string that is not a token as malformed", async () => {
    expect(await causeOf(createVerifier().verify("not-a-token"))).toBe("malformed");
  });

  it("rejects an expired token", async () => {
    const token = tokenFor({
      sub: "subject-1",
      email: "host@example.test",
      iatOffsetSeconds: -7200,
      expOffsetSeconds: -3600
    });

    expect(await causeOf(createVerifier().verify(token))).toBe("expired");
  });

  it("rejects a token signed by a different key", async () => {
    const { privateKey } = crypto.generateKeyPairSync("rsa", { modulusLength: 2048 });
    const token = tokenFor({
      sub: "subject-1",
      email: "host@example.test",
      key: privateKey.export({ type: "pkcs8", format: "pem" }).toString()
    });

    expect(await causeOf(createVerifier().verify(token))).toBe("signature");
  });

  it("rejects a token minted for another audience", async () => {
    const token = tokenFor({ sub: "subject-1", email: "host@example.test", audience: "other-project" });

    expect(await causeOf(createVerifier().verify(token))).toBe("claims");
  });

  it("rejects an unknown key id after one forced refresh", async () => {
    const lookups: Array<{ kid: string; forceRefresh: boolean }> = [];
    const keys: SigningKeySource = {
      async getKey(kid, options) {
        lookups.push({ kid, forceRefresh: options?.forceRefresh ?? false });
        return null;
      }
    };
    const token = tokenFor({ sub: "subject-1", email: "host@example.test", kid: "rotated-key" });

    expect(await causeOf(createVerifier(keys).verify(token))).toBe("unknown_key");
    expect(lookups).toEqual([
      { kid: "rotated-key", forceRefresh: false },
      { kid: "rotated-key", forceRefresh: true }
    ]);
  });

  it("requires an email claim", async () => {
    expect(await causeOf(createVerifier().verify(tokenFor({ sub: "subject-1" })))).toBe("claims");
  });

  it("passes provider outages through untouched", async () => {
    const keys: SigningKeySource = {
      async getKey() {
        throw new IdentityProviderUnavailableError("Unable to fetch identity provider signing keys");
      }
    };
    const token = tokenFor({ sub: "subject-1", email: "host@example.test" });

    await expect(createVerifier(keys).verify(token)).rejects.toBeInstanceOf(IdentityProviderUnavailableError);
  });
});

import jwt from "jsonwebtoken";
import crypto from "node:crypto";
import { StaticSigningKeySource, type SigningKeySource } from "../auth/signing-keys.js";
import { openDatabase } from "../db/client.js";
import type { PhotoStorage, UploadUrlRequest } from "../lib/storage.js";
import { NotificationBus, type PublishedNotification } from "../notifications/notification-bus.js";
import { createServices } from "../server/services.js";

export const TEST_AUDIENCE = "eventfolio-test";
export const TEST_ISSUER = `https://securetoken.google.com/${TEST_AUDIENCE}`;
export const TEST_KID = "test-key-1";
export const TEST_WEB_URL = "https://photos.example.test";
export const ADMIN_EMAIL = "admin@example.test";

const { privateKey, publicKey } = crypto.generateKeyPairSync("rsa", { modulusLength: 2048 });

export const testPrivateKey = privateKey.export({ type: "pkcs8", format: "pem" }).toString();
export const testPublicKey = publicKey.export({ type: "spki", format: "pem" }).toString();

export interface TokenClaims {
  sub: string;
  email?: string;
  name?: string;
  iatOffsetSeconds?: number;
  expOffsetSeconds?: number;
  audience?: string;
  issuer?: string;
  kid?: string;
  key?: string;
}

/** Signs an RS256 identity token the way the identity provider would. */
export function tokenFor(claims: TokenClaims) {
  const nowSeconds = Math.floor(Date.now() / 1000);
  const payload: Record<string, unknown> = {
    sub: claims.sub,
    iat: nowSeconds + (claims.iatOffsetSeconds ?? 0),
    exp: nowSeconds + (claims.expOffsetSeconds ?? 3600),
    email_verified: true
  };

  if (claims.email !== undefined) {
    payload.email = claims.email;
  }

  if (claims.name !== undefined) {
    payload.name = claims.name;
  }

  return jwt.sign(payload, claims.key ?? testPrivateKey, {
    algorithm: "RS256",
    keyid: claims.kid ?? TEST_KID,
    audience: claims.audience ?? TEST_AUDIENCE,
    issuer: claims.issuer ?? TEST_ISSUER
  });
}

export class FakePhotoStorage implements PhotoStorage {
  readonly uploads: UploadUrlRequest[] = [];

  async createUploadUrl(input: UploadUrlRequest) {
    this.uploads.push(input);
    return `https://storage.example.test/upload/${input.key}`;
  }

  async createDownloadUrl(input: { key: string }) {
    return `https://storage.example.test/download/${input.key}`;
  }
}

export interface TestContextOptions {
  adminEmails?: string[];
  keys?: SigningKeySource;
  storage?: PhotoStorage;
}

export function createTestContext(options: TestContextOptions = {}) {
  const handle = openDatabase(":memory:");
  const notifications = new NotificationBus();
  const published: PublishedNotification[] = [];
  const storage = new FakePhotoStorage();
  const photoStorage = options.storage ?? storage;

  notifications.subscribe((notification) => {
    published.push(notification);
  });

  const services = createServices({
    db: handle.db,
    webUrl: TEST_WEB_URL,
    adminEmails: options.adminEmails ?? [ADMIN_EMAIL],
    identity: {
      keys: options.keys ?? new StaticSigningKeySource({ [TEST_KID]: testPublicKey }),
      audience: TEST_AUDIENCE,
      issuer: TEST_ISSUER
    },
    storage: photoStorage,
    notifications
  });

  return { db: handle.db, close: handle.close, services, storage, published };
}

export type TestContext = ReturnType<typeof createTestContext>;

export function identityFor(subjectId: string, email: string) {
  const now = new Date();

  return {
    subjectId,
    email,
    emailVerified: true,
    displayName: null,
    issuedAt: now,
    expiresAt: new Date(now.getTime() + 3_600_000)
  };
}

/** Resolves an actor directly, skipping token verification. */
export async function actorFor(context: TestContext, subjectId: string, email: string) {
  return context.services.resolver.resolve(identityFor(subjectId, email));
}

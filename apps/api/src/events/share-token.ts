import crypto from "node:crypto";

const SHARE_TOKEN_BYTES = 16;

export function generateShareToken() {
  return crypto.randomBytes(SHARE_TOKEN_BYTES).toString("base64url");
}

export function buildShareUrl(webUrl: string, shareToken: string) {
  return `${webUrl}/e/${encodeURIComponent(shareToken)}`;
}

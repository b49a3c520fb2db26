import crypto from "node:crypto";

function sanitizeFilename(filename: string) {
  const cleaned = filename
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");

  return cleaned.slice(0, 120) || "photo.jpg";
}

function uniquePrefix(now: Date) {
  const timestamp = now.toISOString().replace(/[:.]/g, "-");
  return `${timestamp}-${crypto.randomBytes(4).toString("hex")}`;
}

export function createPhotoStorageKey(input: { eventId: string; filename: string; now?: Date }) {
  return `events/${input.eventId}/uploads/${uniquePrefix(input.now ?? new Date())}-${sanitizeFilename(input.filename)}`;
}

export function createCoverStorageKey(input: { eventId: string; filename: string; now?: Date }) {
  return `events/${input.eventId}/cover/${uniquePrefix(input.now ?? new Date())}-${sanitizeFilename(input.filename)}`;
}

import type { PhotoSummary } from "@eventfolio/shared";
import type { PhotoRow } from "../db/schema.js";
import type { PhotoStorage } from "../lib/storage.js";

export function serializePhoto(photo: PhotoRow): PhotoSummary {
  return {
    id: photo.id,
    eventId: photo.eventId,
    storageRef: photo.storageRef,
    caption: photo.caption,
    approvalStatus: photo.approvalStatus,
    uploadedAt: photo.uploadedAt.toISOString(),
    moderatedBy: photo.moderatedBy,
    moderatedAt: photo.moderatedAt?.toISOString() ?? null
  };
}

export interface PublicPhoto {
  id: string;
  caption: string | null;
  uploadedAt: string;
  previewUrl: string;
}

export async function serializePublicPhoto(photo: PhotoRow, storage: PhotoStorage): Promise<PublicPhoto> {
  return {
    id: photo.id,
    caption: photo.caption,
    uploadedAt: photo.uploadedAt.toISOString(),
    previewUrl: await storage.createDownloadUrl({ key: photo.storageRef })
  };
}

import bcrypt from "bcryptjs";
import { fail, succeed, type Result } from "../core/result.js";
import type { EventRepository } from "../db/events.repository.js";
import type { PhotoRepository } from "../db/photos.repository.js";
import type { EventRow, PhotoRow } from "../db/schema.js";
import { actionFailure } from "../lib/logger.js";

export const HOST_UPLOAD_QUOTA_BYTES = 1024 * 1024 * 1024;

export interface GrantedView {
  event: EventRow;
  photos: PhotoRow[];
}

export interface PublicDescription {
  event: EventRow;
  approvedCount: number;
}

/**
 * Public access by share token. No identity is involved: the event must be
 * active and, when it has a password, the caller must supply it.
 */
export class ShareAccessGate {
  constructor(
    private readonly deps: {
      events: EventRepository;
      photos: PhotoRepository;
    }
  ) {}

  /** Summary shown before a password is asked for. */
  async describe(shareToken: string): Promise<Result<PublicDescription>> {
    const event = await this.resolveActive(shareToken);

    if (!event.ok) {
      return event;
    }

    const counts = await this.deps.photos.countByEvent(event.value.id);
    return succeed({ event: event.value, approvedCount: counts.approved });
  }

  async evaluate(shareToken: string, password?: string | null): Promise<Result<GrantedView>> {
    const admitted = await this.admit(shareToken, password);

    if (!admitted.ok) {
      return admitted;
    }

    const photos = await this.deps.photos.listApproved(admitted.value.id);
    return succeed({ event: admitted.value, photos });
  }

  /**
   * Uploads pass the same gate as viewing, password included, and must fit
   * within the owning host's storage quota.
   */
  async admitUpload(shareToken: string, password: string | null | undefined, fileSize: number): Promise<Result<EventRow>> {
    const admitted = await this.admit(shareToken, password);

    if (!admitted.ok) {
      return admitted;
    }

    const used = await this.deps.photos.sumFileSizeByHost(admitted.value.hostId);

    if (used + fileSize > HOST_UPLOAD_QUOTA_BYTES) {
      actionFailure("share-access", "upload", { eventId: admitted.value.id, reason: "QuotaExceeded", used, fileSize });
      return fail("QuotaExceeded", "The host's upload limit of 1 GB has been reached");
    }

    return admitted;
  }

  async admit(shareToken: string, password?: string | null): Promise<Result<EventRow>> {
    const event = await this.resolveActive(shareToken);

    if (!event.ok) {
      return event;
    }

    const hash = event.value.accessPasswordHash;

    if (hash && !(password && (await bcrypt.compare(password, hash)))) {
      actionFailure("share-access", "password", { eventId: event.value.id, reason: "WrongPassword" });
      return fail("WrongPassword", "Incorrect password");
    }

    return event;
  }

  private async resolveActive(shareToken: string): Promise<Result<EventRow>> {
    const event = await this.deps.events.findByShareToken(shareToken);

    // Unknown, draft, suspended and deleted all read the same to the public.
    if (!event || event.status !== "active") {
      actionFailure("share-access", "resolve", { reason: "NotAvailable", status: event?.status ?? "unknown" });
      return fail("NotAvailable", "Event not found or not available");
    }

    return succeed(event);
  }
}

import type { ApprovalStatus, BatchItemOutcome, Page } from "@eventfolio/shared";
import crypto from "node:crypto";
import type { Actor } from "../auth/actor.js";
import type { AuthorizationGuard, OperationKind } from "../auth/authorization-guard.js";
import type { PageRequest } from "../core/page.js";
import { toPage } from "../core/page.js";
import { fail, succeed, type Result } from "../core/result.js";
import type { EventRepository } from "../db/events.repository.js";
import type { HostRepository } from "../db/hosts.repository.js";
import type { PhotoRepository } from "../db/photos.repository.js";
import type { EventRow, PhotoRow } from "../db/schema.js";
import { actionFailure, actionSuccess } from "../lib/logger.js";
import type { Notifier } from "../notifications/notification-bus.js";

export type ModerationDecision = "approve" | "reject";

const DECISION_RULES: Record<ModerationDecision, { from: readonly ApprovalStatus[]; to: ApprovalStatus }> = {
  approve: { from: ["pending", "rejected"], to: "approved" },
  reject: { from: ["pending", "approved"], to: "rejected" }
};

export interface PendingUpload {
  storageRef: string;
  caption?: string | null;
  mimeType?: string | null;
  fileSize?: number | null;
}

export interface PhotoModerationDeps {
  photos: PhotoRepository;
  events: EventRepository;
  hosts: HostRepository;
  guard: AuthorizationGuard;
  notifier: Notifier;
  now?: () => Date;
}

interface PhotoTarget {
  photo: PhotoRow;
  event: EventRow;
}

export class PhotoModeration {
  private readonly now: () => Date;

  constructor(private readonly deps: PhotoModerationDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Public uploads land here once the share gate has admitted them. */
  async createPending(event: EventRow, upload: PendingUpload) {
    const photo = await this.deps.photos.insert({
      id: crypto.randomUUID(),
      eventId: event.id,
      storageRef: upload.storageRef,
      caption: upload.caption ?? null,
      mimeType: upload.mimeType ?? null,
      fileSize: upload.fileSize ?? null,
      uploadedAt: this.now()
    });

    actionSuccess("photo-moderation", "photo.upload", { eventId: event.id, photoId: photo.id });
    return photo;
  }

  async list(
    actor: Actor,
    eventId: string,
    filter: { status?: ApprovalStatus },
    page: PageRequest
  ): Promise<Result<Page<PhotoRow>>> {
    const event = await this.deps.events.findById(eventId);

    if (!event) {
      return fail("NotFound", "Event not found");
    }

    if (event.status === "deleted") {
      return fail("IllegalState", "Photos of a deleted event are not reachable");
    }

    const decision = this.deps.guard.check(actor, "event.read", { kind: "event", event });

    if (!decision.allowed) {
      return fail(decision.reason, "You do not have access to this event");
    }

    const { rows, total } = await this.deps.photos.listByEvent(eventId, filter, page);
    return succeed(toPage(rows, total, page));
  }

  /**
   * Approves or rejects a photo through a conditional update on its status.
   * `expectedStatus` lets a caller pin the state it saw; without it the stored
   * status read at the start of the call is used.
   */
  async moderate(
    actor: Actor,
    eventId: string,
    photoId: string,
    decision: ModerationDecision,
    expectedStatus?: ApprovalStatus
  ): Promise<Result<PhotoRow>> {
    const target = await this.authorize(actor, eventId, photoId, "photo.moderate");

    if (!target.ok) {
      return target;
    }

    const rule = DECISION_RULES[decision];
    const expected = expectedStatus ?? target.value.photo.approvalStatus;

    if (!rule.from.includes(expected)) {
      actionFailure("photo-moderation", `photo.${decision}`, { photoId, reason: "IllegalState", from: expected });
      return fail("IllegalState", `Cannot ${decision} a photo that is ${expected}`);
    }

    const updated = await this.deps.photos.updateApprovalIf(photoId, expected, rule.to, {
      moderatedBy: actor.host.id,
      moderatedAt: this.now()
    });

    if (!updated) {
      return this.staleFailure(photoId, `photo.${decision}`);
    }

    actionSuccess("photo-moderation", `photo.${decision}`, { photoId, eventId, moderatedBy: actor.host.id });
    await this.announce(updated, target.value.event, actor);

    return succeed(updated);
  }

  async updateCaption(actor: Actor, eventId: string, photoId: string, caption: string | null): Promise<Result<PhotoRow>> {
    const target = await this.authorize(actor, eventId, photoId, "photo.update");

    if (!target.ok) {
      return target;
    }

    const updated = await this.deps.photos.updateCaption(photoId, caption);
    return updated ? succeed(updated) : fail("NotFound", "Photo not found");
  }

  /** Hard delete. Conditional on the status so it cannot race a moderation decision. */
  async remove(
    actor: Actor,
    eventId: string,
    photoId: string,
    expectedStatus?: ApprovalStatus
  ): Promise<Result<{ id: string }>> {
    const target = await this.authorize(actor, eventId, photoId, "photo.remove");

    if (!target.ok) {
      return target;
    }

    const removed = await this.deps.photos.deleteIf(photoId, expectedStatus ?? target.value.photo.approvalStatus);

    if (!removed) {
      return this.staleFailure(photoId, "photo.remove");
    }

    actionSuccess("photo-moderation", "photo.remove", { photoId, eventId });
    return succeed({ id: photoId });
  }

  async removeMany(actor: Actor, eventId: string, photoIds: string[]): Promise<BatchItemOutcome[]> {
    const outcomes: BatchItemOutcome[] = [];

    for (const photoId of photoIds) {
      const result = await this.remove(actor, eventId, photoId);
      outcomes.push(result.ok ? { id: photoId, ok: true, status: "removed" } : { id: photoId, ok: false, reason: result.reason });
    }

    return outcomes;
  }

  async moderateMany(
    actor: Actor,
    eventId: string,
    photoIds: string[],
    decision: ModerationDecision
  ): Promise<BatchItemOutcome[]> {
    const outcomes: BatchItemOutcome[] = [];

    for (const photoId of photoIds) {
      const result = await this.moderate(actor, eventId, photoId, decision);
      outcomes.push(
        result.ok
          ? { id: photoId, ok: true, status: result.value.approvalStatus }
          : { id: photoId, ok: false, reason: result.reason }
      );
    }

    return outcomes;
  }

  /** Resolves photo -> owning event explicitly, then asks the guard about that event. */
  private async authorize(
    actor: Actor,
    eventId: string,
    photoId: string,
    operation: OperationKind
  ): Promise<Result<PhotoTarget>> {
    const photo = await this.deps.photos.findById(photoId);

    if (!photo || photo.eventId !== eventId) {
      return fail("NotFound", "Photo not found");
    }

    const event = await this.deps.events.findById(photo.eventId);

    if (!event) {
      return fail("NotFound", "Photo not found");
    }

    if (event.status === "deleted") {
      actionFailure("photo-moderation", operation, { photoId, reason: "IllegalState" });
      return fail("IllegalState", "Photos of a deleted event cannot be moderated");
    }

    const decision = this.deps.guard.check(actor, operation, { kind: "photo", photo, event });

    if (!decision.allowed) {
      actionFailure("photo-moderation", operation, { photoId, reason: decision.reason });
      return fail(decision.reason, "You do not have access to this photo");
    }

    return succeed({ photo, event });
  }

  private async staleFailure(photoId: string, action: string) {
    const current = await this.deps.photos.findById(photoId);

    if (!current) {
      return fail("NotFound", "Photo not found");
    }

    actionFailure("photo-moderation", action, { photoId, reason: "IllegalState", current: current.approvalStatus });
    return fail("IllegalState", `Photo is now ${current.approvalStatus}; reload and try again`);
  }

  private async announce(photo: PhotoRow, event: EventRow, actor: Actor) {
    const owner = await this.deps.hosts.findById(event.hostId);

    if (!owner) {
      return;
    }

    this.deps.notifier.notify({
      type: photo.approvalStatus === "approved" ? "PhotoApproved" : "PhotoRejected",
      photoId: photo.id,
      eventId: event.id,
      hostEmail: owner.email,
      moderatedBy: actor.host.id
    });
  }
}

import type { EventSummary, PublicEventSummary } from "@eventfolio/shared";
import type { EventRow } from "../db/schema.js";
import type { TransitionOutcome } from "./event-lifecycle.js";

export function serializeEvent(event: EventRow): EventSummary {
  return {
    id: event.id,
    hostId: event.hostId,
    title: event.title,
    description: event.description,
    status: event.status,
    hasPassword: event.accessPasswordHash !== null,
    shareToken: event.shareToken,
    coverImageRef: event.coverImageRef,
    createdAt: event.createdAt.toISOString(),
    updatedAt: event.updatedAt.toISOString()
  };
}

export function serializePublicEvent(event: EventRow, photoCount: number): PublicEventSummary {
  return {
    title: event.title,
    description: event.description,
    coverImageRef: event.coverImageRef,
    hasPassword: event.accessPasswordHash !== null,
    photoCount
  };
}

export function serializeTransition(outcome: TransitionOutcome) {
  if (outcome.kind === "purged") {
    return { eventId: outcome.eventId, purged: true, photosRemoved: outcome.photosRemoved };
  }

  return { event: serializeEvent(outcome.event) };
}

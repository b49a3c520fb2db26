import type { EventRow, PhotoRow } from "../db/schema.js";
import type { Actor } from "./actor.js";

export type OperationKind =
  | "event.read"
  | "event.update"
  | "event.publish"
  | "event.delete"
  | "event.export"
  | "event.suspend"
  | "event.reactivate"
  | "event.forceDelete"
  | "photo.read"
  | "photo.update"
  | "photo.moderate"
  | "photo.remove";

export type GuardedResource =
  | { kind: "event"; event: EventRow }
  | { kind: "photo"; photo: PhotoRow; event: EventRow };

export type DenyReason = "NotOwner" | "HostSuspended" | "AdminRequired";

export type Decision = { allowed: true } | { allowed: false; reason: DenyReason };

const ADMIN_ONLY: ReadonlySet<OperationKind> = new Set([
  "event.suspend",
  "event.reactivate",
  "event.forceDelete"
]);

const ALLOW: Decision = { allowed: true };

function deny(reason: DenyReason): Decision {
  return { allowed: false, reason };
}

/**
 * Ownership and role rules. Admin wins first; after that a Host must be active
 * and must own the Event (for a Photo, the Photo's owning Event, which the
 * caller has already looked up explicitly).
 */
export class AuthorizationGuard {
  check(actor: Actor, operation: OperationKind, resource: GuardedResource): Decision {
    if (actor.isAdmin) {
      return ALLOW;
    }

    if (ADMIN_ONLY.has(operation)) {
      return deny("AdminRequired");
    }

    if (actor.host.status === "suspended") {
      return deny("HostSuspended");
    }

    if (resource.kind === "photo" && resource.photo.eventId !== resource.event.id) {
      return deny("NotOwner");
    }

    return resource.event.hostId === actor.host.id ? ALLOW : deny("NotOwner");
  }

  /**
   * Host-only actions that target no existing resource, such as creating an
   * event. Admin membership does not lift a suspension here.
   */
  checkActiveHost(actor: Actor): Decision {
    return actor.host.status === "active" ? ALLOW : deny("HostSuspended");
  }

  checkAdmin(actor: Actor): Decision {
    return actor.isAdmin ? ALLOW : deny("AdminRequired");
  }
}

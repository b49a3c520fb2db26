import { describe, expect, it } from "vitest";
import type { EventRow, HostRow, PhotoRow } from "../db/schema.js";
import type { Actor } from "./actor.js";
import { AuthorizationGuard } from "./authorization-guard.js";

const createdAt = new Date("2026-01-10T12:00:00.000Z");

function host(id: string, status: HostRow["status"] = "active"): HostRow {
  return {
    id,
    subjectId: `subject-${id}`,
    email: `${id}@example.test`,
    displayName: null,
    status,
    createdAt,
    updatedAt: createdAt
  };
}

function event(id: string, hostId: string, status: EventRow["status"] = "active"): EventRow {
  return {
    id,
    hostId,
    title: "Launch party",
    description: null,
    status,
    accessPasswordHash: null,
    shareToken: `token-${id}`,
    coverImageRef: null,
    createdAt,
    updatedAt: createdAt
  };
}

function photo(id: string, eventId: string): PhotoRow {
  return {
    id,
    eventId,
    storageRef: `events/${eventId}/uploads/${id}.jpg`,
    caption: null,
    mimeType: "image/jpeg",
    fileSize: 1024,
    approvalStatus: "pending",
    uploadedAt: createdAt,
    moderatedBy: null,
    moderatedAt: null
  };
}

describe("authorization guard", () => {
  const guard = new AuthorizationGuard();
  const owner: Actor = { host: host("owner"), isAdmin: false };
  const stranger: Actor = { host: host("stranger"), isAdmin: false };
  const admin: Actor = { host: host("admin"), isAdmin: true };
  const ownedEvent = event("event-1", "owner");

  it("allows the owner to update their own event", () => {
    expect(guard.check(owner, "event.update", { kind: "event", event: ownedEvent })).toEqual({ allowed: true });
  });

  it("denies another host with NotOwner", () => {
    expect(guard.check(stranger, "event.update", { kind: "event", event: ownedEvent })).toEqual({
      allowed: false,
      reason: "NotOwner"
    });
  });

  it("lets an admin act on any event", () => {
    expect(guard.check(admin, "event.forceDelete", { kind: "event", event: ownedEvent })).toEqual({ allowed: true });
  });

  it("keeps suspend and force delete admin-only even for owners", () => {
    expect(guard.check(owner, "event.suspend", { kind: "event", event: ownedEvent })).toEqual({
      allowed: false,
      reason: "AdminRequired"
    });
    expect(guard.check(owner, "event.forceDelete", { kind: "event", event: ownedEvent })).toEqual({
      allowed: false,
      reason: "AdminRequired"
    });
  });

  it("denies a suspended host on their own event", () => {
    const suspended: Actor = { host: host("owner", "suspended"), isAdmin: false };

    expect(guard.check(suspended, "event.read", { kind: "event", event: ownedEvent })).toEqual({
      allowed: false,
      reason: "HostSuspended"
    });
  });

  it("lets an admin keep admin rights while their host record is suspended", () => {
    const suspendedAdmin: Actor = { host: host("admin", "suspended"), isAdmin: true };

    expect(guard.check(suspendedAdmin, "event.suspend", { kind: "event", event: ownedEvent })).toEqual({
      allowed: true
    });
    expect(guard.checkActiveHost(suspendedAdmin)).toEqual({ allowed: false, reason: "HostSuspended" });
  });

  it("authorizes photos through their owning event", () => {
    expect(
      guard.check(owner, "photo.moderate", { kind: "photo", photo: photo("photo-1", "event-1"), event: ownedEvent })
    ).toEqual({ allowed: true });
    expect(
      guard.check(owner, "photo.moderate", { kind: "photo", photo: photo("photo-2", "event-9"), event: ownedEvent })
    ).toEqual({ allowed: false, reason: "NotOwner" });
  });

  it("requires admin membership for admin checks", () => {
    expect(guard.checkAdmin(owner)).toEqual({ allowed: false, reason: "AdminRequired" });
    expect(guard.checkAdmin(admin)).toEqual({ allowed: true });
  });
});

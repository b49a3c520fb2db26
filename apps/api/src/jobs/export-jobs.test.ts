import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Actor } from "../auth/actor.js";
import { ADMIN_EMAIL, actorFor, createTestContext, type TestContext } from "../testing/harness.js";

describe("export jobs", () => {
  let context: TestContext;
  let host: Actor;

  beforeEach(async () => {
    context = createTestContext();
    host = await actorFor(context, "subject-host", "host@example.test");
  });

  afterEach(() => {
    context.close();
  });

  it("collects the storage refs of approved photos for an event export", async () => {
    const created = await context.services.lifecycle.create(host, { title: "Conference" });

    if (!created.ok) {
      throw new Error("Unable to create event");
    }

    const approved = await context.services.moderation.createPending(created.value, { storageRef: "events/c/keep.jpg" });
    await context.services.moderation.createPending(created.value, { storageRef: "events/c/skip.jpg" });
    await context.services.moderation.moderate(host, created.value.id, approved.id, "approve");

    const submitted = await context.services.exports.submitEventExport(host, created.value.id);

    if (!submitted.ok) {
      throw new Error("Unable to submit export");
    }

    expect(submitted.value.state).toBe("queued");

    await context.services.exports.drain();
    const polled = context.services.exports.poll(host, submitted.value.id);

    expect(polled).toMatchObject({
      ok: true,
      value: {
        state: "completed",
        result: { kind: "event-photos", storageRefs: ["events/c/keep.jpg"] }
      }
    });
    expect(context.published.at(-1)).toMatchObject({
      type: "ExportReady",
      jobId: submitted.value.id,
      kind: "event-photos",
      requesterEmail: "host@example.test"
    });
  });

  it("keeps exports private to the requester and admins", async () => {
    const created = await context.services.lifecycle.create(host, { title: "Conference" });

    if (!created.ok) {
      throw new Error("Unable to create event");
    }

    const submitted = await context.services.exports.submitEventExport(host, created.value.id);

    if (!submitted.ok) {
      throw new Error("Unable to submit export");
    }

    const stranger = await actorFor(context, "subject-stranger", "stranger@example.test");
    const admin = await actorFor(context, "subject-admin", ADMIN_EMAIL);

    expect(context.services.exports.poll(stranger, submitted.value.id)).toMatchObject({ ok: false, reason: "NotOwner" });
    expect(context.services.exports.poll(admin, submitted.value.id)).toMatchObject({ ok: true });
    expect(context.services.exports.poll(host, "export-missing")).toMatchObject({ ok: false, reason: "NotFound" });
  });

  it("refuses exports of another host's event", async () => {
    const created = await context.services.lifecycle.create(host, { title: "Conference" });
    const stranger = await actorFor(context, "subject-stranger", "stranger@example.test");

    if (!created.ok) {
      throw new Error("Unable to create event");
    }

    expect(await context.services.exports.submitEventExport(stranger, created.value.id)).toMatchObject({
      ok: false,
      reason: "NotOwner"
    });
  });

  it("runs system snapshots for admins only", async () => {
    const admin = await actorFor(context, "subject-admin", ADMIN_EMAIL);
    await context.services.lifecycle.create(host, { title: "Conference" });

    expect(context.services.exports.submitSystemExport(host)).toMatchObject({ ok: false, reason: "AdminRequired" });

    const submitted = context.services.exports.submitSystemExport(admin);

    if (!submitted.ok) {
      throw new Error("Unable to submit export");
    }

    await context.services.exports.drain();

    expect(context.services.exports.poll(admin, submitted.value.id)).toMatchObject({
      ok: true,
      value: {
        state: "completed",
        result: {
          kind: "system-snapshot",
          hosts: 2,
          events: { draft: 1, active: 0, suspended: 0, deleted: 0 },
          photos: { pending: 0, approved: 0, rejected: 0 }
        }
      }
    });
  });
});

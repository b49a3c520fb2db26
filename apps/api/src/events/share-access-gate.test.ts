import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Actor } from "../auth/actor.js";
import { HOST_UPLOAD_QUOTA_BYTES } from "./share-access-gate.js";
import { ADMIN_EMAIL, actorFor, createTestContext, type TestContext } from "../testing/harness.js";

describe("share access gate", () => {
  let context: TestContext;
  let host: Actor;

  beforeEach(async () => {
    context = createTestContext();
    host = await actorFor(context, "subject-host", "host@example.test");
  });

  afterEach(() => {
    context.close();
  });

  async function createEvent(options: { password?: string; publish?: boolean } = {}) {
    const created = await context.services.lifecycle.create(host, { title: "Reunion", password: options.password });

    if (!created.ok) {
      throw new Error("Unable to create event");
    }

    if (options.publish ?? true) {
      await context.services.lifecycle.transition(host, created.value.id, "publish");
    }

    const event = await context.services.lifecycle.get(host, created.value.id);

    if (!event.ok) {
      throw new Error("Unable to reload event");
    }

    return event.value;
  }

  it("reports unknown tokens as not available", async () => {
    expect(await context.services.shareGate.evaluate("no-such-token")).toMatchObject({
      ok: false,
      reason: "NotAvailable"
    });
  });

  it("reports draft events as not available", async () => {
    const event = await createEvent({ publish: false });

    expect(await context.services.shareGate.evaluate(event.shareToken)).toMatchObject({
      ok: false,
      reason: "NotAvailable"
    });
  });

  it("closes suspended events to the public", async () => {
    const event = await createEvent();
    const admin = await actorFor(context, "subject-admin", ADMIN_EMAIL);
    await context.services.lifecycle.transition(admin, event.id, "suspend");

    expect(await context.services.shareGate.describe(event.shareToken)).toMatchObject({
      ok: false,
      reason: "NotAvailable"
    });
  });

  it("checks the password and shows only approved photos", async () => {
    const event = await createEvent({ password: "test-secret" });
    const approved = await context.services.moderation.createPending(event, { storageRef: "events/e/approved.jpg" });
    const rejected = await context.services.moderation.createPending(event, { storageRef: "events/e/rejected.jpg" });
    await context.services.moderation.createPending(event, { storageRef: "events/e/pending.jpg" });
    await context.services.moderation.moderate(host, event.id, approved.id, "approve");
    await context.services.moderation.moderate(host, event.id, rejected.id, "reject");

    expect(await context.services.shareGate.evaluate(event.shareToken, "wrong-secret")).toMatchObject({
      ok: false,
      reason: "WrongPassword"
    });
    expect(await context.services.shareGate.evaluate(event.shareToken)).toMatchObject({
      ok: false,
      reason: "WrongPassword"
    });

    const granted = await context.services.shareGate.evaluate(event.shareToken, "test-secret");

    expect(granted.ok && granted.value.photos.map((photo) => photo.storageRef)).toEqual(["events/e/approved.jpg"]);
  });

  it("applies the password to uploads", async () => {
    const event = await createEvent({ password: "test-secret" });

    expect(await context.services.shareGate.admitUpload(event.shareToken, undefined, 2048)).toMatchObject({
      ok: false,
      reason: "WrongPassword"
    });
    expect(await context.services.shareGate.admitUpload(event.shareToken, "test-secret", 2048)).toMatchObject({
      ok: true,
      value: { id: event.id }
    });
  });

  it("refuses uploads that would take the host past the storage quota", async () => {
    const event = await createEvent();
    const other = await createEvent();
    await context.services.moderation.createPending(event, {
      storageRef: "events/e/big.jpg",
      fileSize: HOST_UPLOAD_QUOTA_BYTES - 5000
    });
    await context.services.moderation.createPending(other, { storageRef: "events/o/small.jpg", fileSize: 3000 });

    expect(await context.services.shareGate.admitUpload(event.shareToken, undefined, 2000)).toMatchObject({
      ok: true,
      value: { id: event.id }
    });
    expect(await context.services.shareGate.admitUpload(other.shareToken, undefined, 2001)).toMatchObject({
      ok: false,
      reason: "QuotaExceeded"
    });
  });

  it("describes an open event with its approved photo count", async () => {
    const event = await createEvent();
    const photo = await context.services.moderation.createPending(event, { storageRef: "events/e/one.jpg" });
    await context.services.moderation.createPending(event, { storageRef: "events/e/two.jpg" });
    await context.services.moderation.moderate(host, event.id, photo.id, "approve");

    expect(await context.services.shareGate.describe(event.shareToken)).toMatchObject({
      ok: true,
      value: { approvedCount: 1, event: { id: event.id } }
    });
  });
});

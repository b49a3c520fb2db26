import { afterEach, describe, expect, it } from "vitest";
import { actorFor, createTestContext, identityFor, type TestContext } from "../testing/harness.js";

describe("actor resolver", () => {
  let context: TestContext | undefined;

  afterEach(() => {
    context?.close();
    context = undefined;
  });

  it("creates a host on first sight and welcomes it once", async () => {
    context = createTestContext();

    const first = await actorFor(context, "subject-1", "host@example.test");
    const second = await actorFor(context, "subject-1", "host@example.test");

    expect(first.host.id).toBe(second.host.id);
    expect(first.host.status).toBe("active");
    expect(first.isAdmin).toBe(false);
    expect(context.published.filter((notification) => notification.type === "HostWelcomed")).toHaveLength(1);
  });

  it("creates exactly one host when two first requests race", async () => {
    context = createTestContext();
    const identity = identityFor("subject-race", "race@example.test");

    const [left, right] = await Promise.all([
      context.services.resolver.resolve(identity),
      context.services.resolver.resolve(identity)
    ]);

    expect(left.host.id).toBe(right.host.id);
    expect(context.published.filter((notification) => notification.type === "HostWelcomed")).toHaveLength(1);
  });

  it("matches admin emails without regard to case", async () => {
    context = createTestContext({ adminEmails: ["Owner@Example.Test"] });

    const actor = await actorFor(context, "subject-admin", "owner@example.test");

    expect(actor.isAdmin).toBe(true);
  });

  it("evaluates admin membership on every resolution", async () => {
    context = createTestContext({ adminEmails: ["ops@example.test"] });

    const asHost = await actorFor(context, "subject-2", "someone@example.test");
    const asAdmin = await actorFor(context, "subject-2", "ops@example.test");

    expect(asHost.isAdmin).toBe(false);
    expect(asAdmin.isAdmin).toBe(true);
    expect(asAdmin.host.id).toBe(asHost.host.id);
  });
});

import { describe, expect, it, vi } from "vitest";
import { NotificationBus } from "./notification-bus.js";

describe("notification bus", () => {
  it("publishes signals to subscribed listeners", () => {
    const bus = new NotificationBus();
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(listener);

    bus.notify({
      type: "PhotoApproved",
      photoId: "photo_1",
      eventId: "event_1",
      hostEmail: "host@example.test",
      moderatedBy: "host_1"
    });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0]?.[0]).toMatchObject({
      type: "PhotoApproved",
      photoId: "photo_1",
      eventId: "event_1"
    });
    expect(typeof listener.mock.calls[0]?.[0].timestamp).toBe("string");

    unsubscribe();
  });

  it("stops sending signals after unsubscribe", () => {
    const bus = new NotificationBus();
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(listener);

    unsubscribe();

    bus.notify({ type: "ExportReady", jobId: "export-1", kind: "event-photos", requesterEmail: "host@example.test" });

    expect(listener).not.toHaveBeenCalled();
  });

  it("keeps delivering when one subscriber throws", () => {
    const bus = new NotificationBus();
    const listener = vi.fn();

    bus.subscribe(() => {
      throw new Error("mailer offline");
    });
    bus.subscribe(listener);

    expect(() =>
      bus.notify({ type: "HostWelcomed", hostId: "host_1", email: "host@example.test", displayName: null })
    ).not.toThrow();
    expect(listener).toHaveBeenCalledTimes(1);
  });
});

import type { ExportJobKind } from "@eventfolio/shared";
import { withComponent } from "../lib/logger.js";

export type NotificationSignal =
  | { type: "HostWelcomed"; hostId: string; email: string; displayName: string | null }
  | { type: "PhotoApproved"; photoId: string; eventId: string; hostEmail: string; moderatedBy: string }
  | { type: "PhotoRejected"; photoId: string; eventId: string; hostEmail: string; moderatedBy: string }
  | { type: "ExportReady"; jobId: string; kind: ExportJobKind; requesterEmail: string };

export type PublishedNotification = NotificationSignal & { timestamp: string };

export type NotificationListener = (notification: PublishedNotification) => void;

export interface Notifier {
  notify(signal: NotificationSignal): void;
}

const log = withComponent("notifications");

/**
 * Fire-and-forget fan-out of domain signals. A failing subscriber is logged
 * and never propagates back into the operation that emitted the signal.
 */
export class NotificationBus implements Notifier {
  private readonly listeners = new Set<NotificationListener>();

  notify(signal: NotificationSignal) {
    const payload: PublishedNotification = { ...signal, timestamp: new Date().toISOString() };

    for (const listener of [...this.listeners]) {
      try {
        listener(payload);
      } catch (error) {
        log.error(
          { type: signal.type, message: error instanceof Error ? error.message : String(error) },
          "Notification subscriber failed"
        );
      }
    }
  }

  subscribe(listener: NotificationListener) {
    this.listeners.add(listener);

    return () => {
      this.listeners.delete(listener);
    };
  }
}

export function logNotifications(bus: NotificationBus) {
  return bus.subscribe((notification) => {
    log.info({ notification }, `Notification ${notification.type}`);
  });
}

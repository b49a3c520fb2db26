import { AdminConsole } from "../admin/admin-console.js";
import { ActorResolver } from "../auth/actor-resolver.js";
import { AdminAllowList } from "../auth/admin-allow-list.js";
import { AuthorizationGuard } from "../auth/authorization-guard.js";
import { IdentityVerifier } from "../auth/identity-verifier.js";
import type { SigningKeySource } from "../auth/signing-keys.js";
import type { AppDatabase } from "../db/client.js";
import { EventRepository } from "../db/events.repository.js";
import { HostRepository } from "../db/hosts.repository.js";
import { PhotoRepository } from "../db/photos.repository.js";
import { EventLifecycle } from "../events/event-lifecycle.js";
import { ShareAccessGate } from "../events/share-access-gate.js";
import { ExportJobs } from "../jobs/export-jobs.js";
import type { PhotoStorage } from "../lib/storage.js";
import { NotificationBus } from "../notifications/notification-bus.js";
import { PhotoModeration } from "../photos/photo-moderation.js";

export interface AppServices {
  webUrl: string;
  verifier: IdentityVerifier;
  resolver: ActorResolver;
  guard: AuthorizationGuard;
  hosts: HostRepository;
  lifecycle: EventLifecycle;
  moderation: PhotoModeration;
  shareGate: ShareAccessGate;
  exports: ExportJobs;
  adminConsole: AdminConsole;
  storage: PhotoStorage;
  notifications: NotificationBus;
}

export interface ServiceOptions {
  db: AppDatabase;
  webUrl: string;
  adminEmails: string[];
  identity: { keys: SigningKeySource; audience: string; issuer: string };
  storage: PhotoStorage;
  notifications?: NotificationBus;
  now?: () => Date;
}

export function createServices(options: ServiceOptions): AppServices {
  const hosts = new HostRepository(options.db);
  const events = new EventRepository(options.db);
  const photos = new PhotoRepository(options.db);
  const guard = new AuthorizationGuard();
  const notifications = options.notifications ?? new NotificationBus();
  const { now } = options;

  return {
    webUrl: options.webUrl,
    verifier: new IdentityVerifier(options.identity),
    resolver: new ActorResolver({
      hosts,
      adminAllowList: new AdminAllowList(options.adminEmails),
      notifier: notifications,
      now
    }),
    guard,
    hosts,
    lifecycle: new EventLifecycle({ events, guard, now }),
    moderation: new PhotoModeration({ photos, events, hosts, guard, notifier: notifications, now }),
    shareGate: new ShareAccessGate({ events, photos }),
    exports: new ExportJobs({ events, photos, hosts, guard, notifier: notifications, now }),
    adminConsole: new AdminConsole({ hosts, events, photos, guard, now }),
    storage: options.storage,
    notifications
  };
}

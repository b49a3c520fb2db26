import crypto from "node:crypto";
import type { HostRepository } from "../db/hosts.repository.js";
import { actionSuccess } from "../lib/logger.js";
import type { Notifier } from "../notifications/notification-bus.js";
import type { Actor } from "./actor.js";
import type { AdminAllowList } from "./admin-allow-list.js";
import type { VerifiedIdentity } from "./identity-verifier.js";

export interface ActorResolverDeps {
  hosts: HostRepository;
  adminAllowList: AdminAllowList;
  notifier: Notifier;
  now?: () => Date;
}

export class ActorResolver {
  private readonly now: () => Date;

  constructor(private readonly deps: ActorResolverDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async resolve(identity: VerifiedIdentity): Promise<Actor> {
    const isAdmin = this.deps.adminAllowList.includes(identity.email);
    const existing = await this.deps.hosts.findBySubject(identity.subjectId);

    if (existing) {
      return { host: existing, isAdmin };
    }

    const { host, created } = await this.deps.hosts.insertIfAbsent({
      id: crypto.randomUUID(),
      subjectId: identity.subjectId,
      email: identity.email,
      displayName: identity.displayName,
      createdAt: this.now()
    });

    if (created) {
      actionSuccess("actor-resolver", "host.create", { hostId: host.id, isAdmin });
      this.deps.notifier.notify({
        type: "HostWelcomed",
        hostId: host.id,
        email: host.email,
        displayName: host.displayName
      });
    }

    return { host, isAdmin };
  }
}

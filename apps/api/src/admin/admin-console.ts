import type { ApprovalStatus, EventStatus, HostStatus, Page } from "@eventfolio/shared";
import type { Actor } from "../auth/actor.js";
import type { AuthorizationGuard } from "../auth/authorization-guard.js";
import type { PageRequest } from "../core/page.js";
import { toPage } from "../core/page.js";
import { fail, succeed, type Result } from "../core/result.js";
import type { EventRepository } from "../db/events.repository.js";
import type { HostRepository } from "../db/hosts.repository.js";
import type { PhotoRepository } from "../db/photos.repository.js";
import type { EventRow, HostRow, PhotoRow } from "../db/schema.js";
import { actionSuccess } from "../lib/logger.js";

export interface Overview {
  hosts: number;
  events: Record<EventStatus, number>;
  photos: Record<ApprovalStatus, number>;
}

export interface HostWithEventCount {
  host: HostRow;
  eventCount: number;
}

export interface EventInspection {
  event: EventRow;
  host: HostRow | null;
  photos: Record<ApprovalStatus, number>;
}

export interface RecentUpload {
  photo: PhotoRow;
  hostEmail: string;
  eventTitle: string;
}

const ADMIN_REQUIRED = "Admin access required";

/** Read-mostly oversight of every host and event. Every call requires an admin actor. */
export class AdminConsole {
  constructor(
    private readonly deps: {
      hosts: HostRepository;
      events: EventRepository;
      photos: PhotoRepository;
      guard: AuthorizationGuard;
      now?: () => Date;
    }
  ) {}

  async overview(actor: Actor): Promise<Result<Overview>> {
    const decision = this.deps.guard.checkAdmin(actor);

    if (!decision.allowed) {
      return fail(decision.reason, ADMIN_REQUIRED);
    }

    return succeed({
      hosts: await this.deps.hosts.count(),
      events: await this.deps.events.countByStatus(),
      photos: await this.deps.photos.countAll()
    });
  }

  async listHosts(actor: Actor, page: PageRequest): Promise<Result<Page<HostWithEventCount>>> {
    const decision = this.deps.guard.checkAdmin(actor);

    if (!decision.allowed) {
      return fail(decision.reason, ADMIN_REQUIRED);
    }

    const { rows, total } = await this.deps.hosts.list(page);
    const counts = await this.deps.hosts.countEvents(rows.map((host) => host.id));
    const items = rows.map((host) => ({ host, eventCount: counts.get(host.id) ?? 0 }));

    return succeed(toPage(items, total, page));
  }

  async getHost(actor: Actor, hostId: string): Promise<Result<HostWithEventCount>> {
    const decision = this.deps.guard.checkAdmin(actor);

    if (!decision.allowed) {
      return fail(decision.reason, ADMIN_REQUIRED);
    }

    const host = await this.deps.hosts.findById(hostId);

    if (!host) {
      return fail("NotFound", "Host not found");
    }

    const counts = await this.deps.hosts.countEvents([host.id]);
    return succeed({ host, eventCount: counts.get(host.id) ?? 0 });
  }

  async setHostStatus(actor: Actor, hostId: string, status: HostStatus): Promise<Result<HostRow>> {
    const decision = this.deps.guard.checkAdmin(actor);

    if (!decision.allowed) {
      return fail(decision.reason, ADMIN_REQUIRED);
    }

    const host = await this.deps.hosts.setStatus(hostId, status, this.deps.now?.() ?? new Date());

    if (!host) {
      return fail("NotFound", "Host not found");
    }

    actionSuccess("admin-console", "host.status", { hostId, status, adminHostId: actor.host.id });
    return succeed(host);
  }

  async listEvents(actor: Actor, filter: { status?: EventStatus }, page: PageRequest): Promise<Result<Page<EventRow>>> {
    const decision = this.deps.guard.checkAdmin(actor);

    if (!decision.allowed) {
      return fail(decision.reason, ADMIN_REQUIRED);
    }

    const { rows, total } = await this.deps.events.listAll(filter, page);
    return succeed(toPage(rows, total, page));
  }

  async inspectEvent(actor: Actor, eventId: string): Promise<Result<EventInspection>> {
    const decision = this.deps.guard.checkAdmin(actor);

    if (!decision.allowed) {
      return fail(decision.reason, ADMIN_REQUIRED);
    }

    const event = await this.deps.events.findById(eventId);

    if (!event) {
      return fail("NotFound", "Event not found");
    }

    return succeed({
      event,
      host: await this.deps.hosts.findById(event.hostId),
      photos: await this.deps.photos.countByEvent(event.id)
    });
  }

  async recentUploads(actor: Actor, page: PageRequest): Promise<Result<Page<RecentUpload>>> {
    const decision = this.deps.guard.checkAdmin(actor);

    if (!decision.allowed) {
      return fail(decision.reason, ADMIN_REQUIRED);
    }

    const { rows, total } = await this.deps.photos.listRecent(page);
    return succeed(toPage(rows, total, page));
  }
}

import type { ApprovalStatus, EventStatus, ExportJobKind, ExportJobState } from "@eventfolio/shared";
import crypto from "node:crypto";
import type { Actor } from "../auth/actor.js";
import type { AuthorizationGuard } from "../auth/authorization-guard.js";
import { fail, succeed, type Result } from "../core/result.js";
import type { EventRepository } from "../db/events.repository.js";
import type { HostRepository } from "../db/hosts.repository.js";
import type { PhotoRepository } from "../db/photos.repository.js";
import { actionSuccess, withComponent } from "../lib/logger.js";
import type { Notifier } from "../notifications/notification-bus.js";

export type ExportJobResult =
  | { kind: "event-photos"; storageRefs: string[] }
  | {
      kind: "system-snapshot";
      hosts: number;
      events: Record<EventStatus, number>;
      photos: Record<ApprovalStatus, number>;
    };

export interface ExportJob {
  id: string;
  kind: ExportJobKind;
  state: ExportJobState;
  requestedBy: string;
  requesterEmail: string;
  eventId: string | null;
  createdAt: Date;
  finishedAt: Date | null;
  result: ExportJobResult | null;
  error: string | null;
}

export interface ExportJobsDeps {
  events: EventRepository;
  photos: PhotoRepository;
  hosts: HostRepository;
  guard: AuthorizationGuard;
  notifier: Notifier;
  now?: () => Date;
}

const JOB_RETENTION_MS = 24 * 60 * 60 * 1000;

const log = withComponent("export-jobs");

/**
 * Background exports behind a submit/poll contract. Jobs run one at a time
 * in-process and never touch moderation state.
 */
export class ExportJobs {
  private readonly jobs = new Map<string, ExportJob>();
  private queue: Promise<void> = Promise.resolve();
  private readonly now: () => Date;

  constructor(private readonly deps: ExportJobsDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async submitEventExport(actor: Actor, eventId: string): Promise<Result<ExportJob>> {
    const event = await this.deps.events.findById(eventId);

    if (!event) {
      return fail("NotFound", "Event not found");
    }

    if (event.status === "deleted") {
      return fail("IllegalState", "Deleted events cannot be exported");
    }

    const decision = this.deps.guard.check(actor, "event.export", { kind: "event", event });

    if (!decision.allowed) {
      return fail(decision.reason, "You do not have access to this event");
    }

    return succeed(this.enqueue(actor, "event-photos", event.id));
  }

  submitSystemExport(actor: Actor): Result<ExportJob> {
    const decision = this.deps.guard.checkAdmin(actor);

    if (!decision.allowed) {
      return fail(decision.reason, "Admin access required");
    }

    return succeed(this.enqueue(actor, "system-snapshot", null));
  }

  poll(actor: Actor, jobId: string): Result<ExportJob> {
    const job = this.jobs.get(jobId);

    if (!job) {
      return fail("NotFound", "Export job not found");
    }

    if (!actor.isAdmin && job.requestedBy !== actor.host.id) {
      return fail("NotOwner", "This export belongs to another host");
    }

    return succeed({ ...job });
  }

  /** Resolves once every job submitted so far has finished. */
  drain() {
    return this.queue;
  }

  private enqueue(actor: Actor, kind: ExportJobKind, eventId: string | null) {
    this.prune();

    const job: ExportJob = {
      id: `export-${crypto.randomUUID()}`,
      kind,
      state: "queued",
      requestedBy: actor.host.id,
      requesterEmail: actor.host.email,
      eventId,
      createdAt: this.now(),
      finishedAt: null,
      result: null,
      error: null
    };

    this.jobs.set(job.id, job);
    this.queue = this.queue.then(() => this.run(job));
    actionSuccess("export-jobs", "job.submit", { jobId: job.id, kind, eventId });

    return { ...job };
  }

  private async run(job: ExportJob) {
    job.state = "running";

    try {
      job.result = await this.produce(job);
      job.state = "completed";
      this.deps.notifier.notify({
        type: "ExportReady",
        jobId: job.id,
        kind: job.kind,
        requesterEmail: job.requesterEmail
      });
    } catch (error) {
      job.state = "failed";
      job.error = error instanceof Error ? error.message : "Unknown error";
      log.error({ jobId: job.id, message: job.error }, "Export job failed");
    } finally {
      job.finishedAt = this.now();
    }
  }

  private async produce(job: ExportJob): Promise<ExportJobResult> {
    if (job.kind === "event-photos") {
      if (!job.eventId) {
        throw new Error("Event export has no event");
      }

      const photos = await this.deps.photos.listApproved(job.eventId);
      return { kind: "event-photos", storageRefs: photos.map((photo) => photo.storageRef) };
    }

    return {
      kind: "system-snapshot",
      hosts: await this.deps.hosts.count(),
      events: await this.deps.events.countByStatus(),
      photos: await this.deps.photos.countAll()
    };
  }

  private prune() {
    const cutoff = this.now().getTime() - JOB_RETENTION_MS;

    for (const [id, job] of this.jobs) {
      if (job.finishedAt && job.finishedAt.getTime() < cutoff) {
        this.jobs.delete(id);
      }
    }
  }
}

export function serializeExportJob(job: ExportJob) {
  return {
    id: job.id,
    kind: job.kind,
    state: job.state,
    eventId: job.eventId,
    createdAt: job.createdAt.toISOString(),
    finishedAt: job.finishedAt?.toISOString() ?? null,
    result: job.result,
    error: job.error
  };
}

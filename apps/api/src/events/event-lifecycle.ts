import type { BatchItemOutcome, EventStatus } from "@eventfolio/shared";
import bcrypt from "bcryptjs";
import crypto from "node:crypto";
import type { Actor } from "../auth/actor.js";
import type { AuthorizationGuard, OperationKind } from "../auth/authorization-guard.js";
import type { PageRequest } from "../core/page.js";
import { toPage } from "../core/page.js";
import { fail, succeed, type Result } from "../core/result.js";
import { isUniqueViolation } from "../db/client.js";
import type { EventMetadataPatch, EventRepository } from "../db/events.repository.js";
import type { EventRow } from "../db/schema.js";
import { actionFailure, actionSuccess } from "../lib/logger.js";
import { generateShareToken } from "./share-token.js";

export type EventAction = "publish" | "suspend" | "reactivate" | "delete" | "force-delete";

interface TransitionRule {
  from: readonly EventStatus[];
  to: EventStatus;
  operation: OperationKind;
}

const LIVE_STATES: readonly EventStatus[] = ["draft", "active", "suspended"];

export const EVENT_TRANSITIONS: Record<EventAction, TransitionRule> = {
  publish: { from: ["draft"], to: "active", operation: "event.publish" },
  suspend: { from: ["active"], to: "suspended", operation: "event.suspend" },
  reactivate: { from: ["suspended"], to: "active", operation: "event.reactivate" },
  delete: { from: LIVE_STATES, to: "deleted", operation: "event.delete" },
  "force-delete": { from: LIVE_STATES, to: "deleted", operation: "event.forceDelete" }
};

export type TransitionOutcome =
  | { kind: "updated"; event: EventRow }
  | { kind: "purged"; eventId: string; photosRemoved: number };

export interface CreateEventInput {
  title: string;
  description?: string | null;
  password?: string | null;
  coverImageRef?: string | null;
}

export interface UpdateEventInput {
  title?: string;
  description?: string | null;
  coverImageRef?: string | null;
  /** `null` clears the password, a string replaces it. */
  password?: string | null;
}

export interface EventLifecycleDeps {
  events: EventRepository;
  guard: AuthorizationGuard;
  now?: () => Date;
  generateToken?: () => string;
}

const PASSWORD_HASH_ROUNDS = 10;
const SHARE_TOKEN_ATTEMPTS = 3;

export class EventLifecycle {
  private readonly now: () => Date;
  private readonly generateToken: () => string;

  constructor(private readonly deps: EventLifecycleDeps) {
    this.now = deps.now ?? (() => new Date());
    this.generateToken = deps.generateToken ?? generateShareToken;
  }

  async create(actor: Actor, input: CreateEventInput): Promise<Result<EventRow>> {
    const decision = this.deps.guard.checkActiveHost(actor);

    if (!decision.allowed) {
      actionFailure("event-lifecycle", "event.create", { hostId: actor.host.id, reason: decision.reason });
      return fail(decision.reason, "Suspended hosts cannot create events");
    }

    const accessPasswordHash = input.password ? await bcrypt.hash(input.password, PASSWORD_HASH_ROUNDS) : null;

    for (let attempt = 0; attempt < SHARE_TOKEN_ATTEMPTS; attempt += 1) {
      try {
        const event = await this.deps.events.insert({
          id: crypto.randomUUID(),
          hostId: actor.host.id,
          title: input.title,
          description: input.description ?? null,
          status: "draft",
          accessPasswordHash,
          shareToken: this.generateToken(),
          coverImageRef: input.coverImageRef ?? null,
          createdAt: this.now()
        });

        actionSuccess("event-lifecycle", "event.create", { eventId: event.id, hostId: actor.host.id });
        return succeed(event);
      } catch (error) {
        if (isUniqueViolation(error)) {
          continue;
        }

        throw error;
      }
    }

    throw new Error("Unable to generate a unique share token");
  }

  /** Deleted events read as missing for everyone but admins. */
  async get(actor: Actor, eventId: string): Promise<Result<EventRow>> {
    const event = await this.deps.events.findById(eventId);

    if (!event || (event.status === "deleted" && !actor.isAdmin)) {
      return fail("NotFound", "Event not found");
    }

    const decision = this.deps.guard.check(actor, "event.read", { kind: "event", event });

    if (!decision.allowed) {
      return fail(decision.reason, "You do not have access to this event");
    }

    return succeed(event);
  }

  async listOwn(actor: Actor, page: PageRequest) {
    const { rows, total } = await this.deps.events.listByHost(actor.host.id, page);
    return toPage(rows, total, page);
  }

  async updateMetadata(actor: Actor, eventId: string, input: UpdateEventInput): Promise<Result<EventRow>> {
    const event = await this.deps.events.findById(eventId);

    if (!event) {
      return fail("NotFound", "Event not found");
    }

    if (event.status === "deleted") {
      return fail("IllegalState", "Deleted events cannot be changed");
    }

    const decision = this.deps.guard.check(actor, "event.update", { kind: "event", event });

    if (!decision.allowed) {
      actionFailure("event-lifecycle", "event.update", { eventId, reason: decision.reason });
      return fail(decision.reason, "You do not have access to this event");
    }

    const patch: EventMetadataPatch = {
      title: input.title,
      description: input.description,
      coverImageRef: input.coverImageRef
    };

    if (input.password !== undefined) {
      patch.accessPasswordHash = input.password
        ? await bcrypt.hash(input.password, PASSWORD_HASH_ROUNDS)
        : null;
    }

    const updated = await this.deps.events.updateMetadataUnlessDeleted(eventId, patch, this.now());

    if (!updated) {
      return fail("IllegalState", "Event was deleted while it was being updated");
    }

    actionSuccess("event-lifecycle", "event.update", { eventId });
    return succeed(updated);
  }

  async transition(actor: Actor, eventId: string, action: EventAction): Promise<Result<TransitionOutcome>> {
    const rule = EVENT_TRANSITIONS[action];
    const event = await this.deps.events.findById(eventId);

    if (!event) {
      return fail("NotFound", "Event not found");
    }

    // Checked before ownership.
    if (event.status === "deleted") {
      actionFailure("event-lifecycle", `event.${action}`, { eventId, reason: "IllegalState" });
      return fail("IllegalState", "Deleted events cannot change state");
    }

    const decision = this.deps.guard.check(actor, rule.operation, { kind: "event", event });

    if (!decision.allowed) {
      actionFailure("event-lifecycle", `event.${action}`, { eventId, reason: decision.reason });
      return fail(decision.reason, `You are not allowed to ${action} this event`);
    }

    if (!rule.from.includes(event.status)) {
      actionFailure("event-lifecycle", `event.${action}`, { eventId, reason: "IllegalState", from: event.status });
      return fail("IllegalState", `Cannot ${action} an event that is ${event.status}`);
    }

    if (action === "force-delete") {
      const purged = await this.deps.events.hardDeleteIf(eventId, event.status);

      if (!purged) {
        return fail("IllegalState", "Event changed state while it was being deleted");
      }

      actionSuccess("event-lifecycle", "event.force-delete", { eventId, photosRemoved: purged.photosRemoved });
      return succeed({ kind: "purged", eventId, photosRemoved: purged.photosRemoved });
    }

    const updated = await this.deps.events.updateStatusIf(eventId, event.status, rule.to, this.now());

    if (!updated) {
      return fail("IllegalState", "Event changed state while it was being updated");
    }

    actionSuccess("event-lifecycle", `event.${action}`, { eventId, from: event.status, to: updated.status });
    return succeed({ kind: "updated", event: updated });
  }

  /**
   * Applies one transition per id, independently. A bad id never aborts the
   * rest of the batch, and items already applied stay applied.
   */
  async transitionMany(actor: Actor, eventIds: string[], action: EventAction): Promise<BatchItemOutcome[]> {
    const outcomes: BatchItemOutcome[] = [];

    for (const eventId of eventIds) {
      const result = await this.transition(actor, eventId, action);

      if (result.ok) {
        outcomes.push({
          id: eventId,
          ok: true,
          status: result.value.kind === "updated" ? result.value.event.status : "purged"
        });
      } else {
        outcomes.push({ id: eventId, ok: false, reason: result.reason });
      }
    }

    return outcomes;
  }
}

import type { EventStatus } from "@eventfolio/shared";
import { and, count, desc, eq, ne } from "drizzle-orm";
import type { PageRequest } from "../core/page.js";
import { pageOffset } from "../core/page.js";
import type { AppDatabase } from "./client.js";
import { events, photos, type EventRow } from "./schema.js";

export type NewEvent = Omit<EventRow, "updatedAt">;

export interface EventMetadataPatch {
  title?: string;
  description?: string | null;
  coverImageRef?: string | null;
  accessPasswordHash?: string | null;
}

export class EventRepository {
  constructor(private readonly db: AppDatabase) {}

  async insert(input: NewEvent) {
    return this.db
      .insert(events)
      .values({ ...input, updatedAt: input.createdAt })
      .returning()
      .get();
  }

  async findById(id: string) {
    return this.db.select().from(events).where(eq(events.id, id)).get() ?? null;
  }

  async findByShareToken(shareToken: string) {
    return this.db.select().from(events).where(eq(events.shareToken, shareToken)).get() ?? null;
  }

  async listByHost(hostId: string, request: PageRequest) {
    const where = and(eq(events.hostId, hostId), ne(events.status, "deleted"));
    const rows = this.db
      .select()
      .from(events)
      .where(where)
      .orderBy(desc(events.createdAt))
      .limit(request.pageSize)
      .offset(pageOffset(request))
      .all();
    const total = this.db.select({ value: count() }).from(events).where(where).get()?.value ?? 0;

    return { rows, total };
  }

  async listAll(filter: { status?: EventStatus }, request: PageRequest) {
    const where = filter.status ? eq(events.status, filter.status) : undefined;
    const rows = this.db
      .select()
      .from(events)
      .where(where)
      .orderBy(desc(events.createdAt))
      .limit(request.pageSize)
      .offset(pageOffset(request))
      .all();
    const total = this.db.select({ value: count() }).from(events).where(where).get()?.value ?? 0;

    return { rows, total };
  }

  /** Applies the status change only while the stored status still equals `expected`. */
  async updateStatusIf(id: string, expected: EventStatus, next: EventStatus, now: Date) {
    return (
      this.db
        .update(events)
        .set({ status: next, updatedAt: now })
        .where(and(eq(events.id, id), eq(events.status, expected)))
        .returning()
        .get() ?? null
    );
  }

  async updateMetadataUnlessDeleted(id: string, patch: EventMetadataPatch, now: Date) {
    return (
      this.db
        .update(events)
        .set({ ...patch, updatedAt: now })
        .where(and(eq(events.id, id), ne(events.status, "deleted")))
        .returning()
        .get() ?? null
    );
  }

  /**
   * Removes the event row and every photo row beneath it in one transaction,
   * provided the event is still in `expected`. Returns null when the status
   * moved underneath the caller.
   */
  async hardDeleteIf(id: string, expected: EventStatus) {
    return this.db.transaction((tx) => {
      const current = tx
        .select({ id: events.id })
        .from(events)
        .where(and(eq(events.id, id), eq(events.status, expected)))
        .get();

      if (!current) {
        return null;
      }

      const removedPhotos = tx.delete(photos).where(eq(photos.eventId, id)).returning({ id: photos.id }).all();
      tx.delete(events).where(eq(events.id, id)).run();

      return { photosRemoved: removedPhotos.length };
    });
  }

  async countByStatus() {
    const rows = this.db
      .select({ status: events.status, value: count() })
      .from(events)
      .groupBy(events.status)
      .all();
    const totals: Record<EventStatus, number> = { draft: 0, active: 0, suspended: 0, deleted: 0 };

    for (const row of rows) {
      totals[row.status] = row.value;
    }

    return totals;
  }
}

import type { ApprovalStatus } from "@eventfolio/shared";
import { and, count, desc, eq, sum } from "drizzle-orm";
import type { PageRequest } from "../core/page.js";
import { pageOffset } from "../core/page.js";
import type { AppDatabase } from "./client.js";
import { events, hosts, photos, type PhotoRow } from "./schema.js";

export type NewPhoto = Omit<PhotoRow, "approvalStatus" | "moderatedBy" | "moderatedAt">;

export class PhotoRepository {
  constructor(private readonly db: AppDatabase) {}

  async insert(input: NewPhoto) {
    return this.db
      .insert(photos)
      .values({ ...input, approvalStatus: "pending", moderatedBy: null, moderatedAt: null })
      .returning()
      .get();
  }

  async findById(id: string) {
    return this.db.select().from(photos).where(eq(photos.id, id)).get() ?? null;
  }

  async listByEvent(eventId: string, filter: { status?: ApprovalStatus }, request: PageRequest) {
    const where = filter.status
      ? and(eq(photos.eventId, eventId), eq(photos.approvalStatus, filter.status))
      : eq(photos.eventId, eventId);
    const rows = this.db
      .select()
      .from(photos)
      .where(where)
      .orderBy(desc(photos.uploadedAt))
      .limit(request.pageSize)
      .offset(pageOffset(request))
      .all();
    const total = this.db.select({ value: count() }).from(photos).where(where).get()?.value ?? 0;

    return { rows, total };
  }

  async listApproved(eventId: string) {
    return this.db
      .select()
      .from(photos)
      .where(and(eq(photos.eventId, eventId), eq(photos.approvalStatus, "approved")))
      .orderBy(desc(photos.uploadedAt))
      .all();
  }

  async countByEvent(eventId: string) {
    const rows = this.db
      .select({ status: photos.approvalStatus, value: count() })
      .from(photos)
      .where(eq(photos.eventId, eventId))
      .groupBy(photos.approvalStatus)
      .all();

    return tallyByStatus(rows);
  }

  async countAll() {
    const rows = this.db
      .select({ status: photos.approvalStatus, value: count() })
      .from(photos)
      .groupBy(photos.approvalStatus)
      .all();

    return tallyByStatus(rows);
  }

  /** Declared bytes of every stored photo across all of the host's events. */
  async sumFileSizeByHost(hostId: string) {
    const row = this.db
      .select({ value: sum(photos.fileSize) })
      .from(photos)
      .innerJoin(events, eq(photos.eventId, events.id))
      .where(eq(events.hostId, hostId))
      .get();

    return Number(row?.value ?? 0);
  }

  /** Compare-and-swap on `approval_status`; null means the row moved or vanished. */
  async updateApprovalIf(
    id: string,
    expected: ApprovalStatus,
    next: ApprovalStatus,
    moderation: { moderatedBy: string; moderatedAt: Date }
  ) {
    return (
      this.db
        .update(photos)
        .set({ approvalStatus: next, ...moderation })
        .where(and(eq(photos.id, id), eq(photos.approvalStatus, expected)))
        .returning()
        .get() ?? null
    );
  }

  async updateCaption(id: string, caption: string | null) {
    return this.db.update(photos).set({ caption }).where(eq(photos.id, id)).returning().get() ?? null;
  }

  async deleteIf(id: string, expected: ApprovalStatus) {
    const removed = this.db
      .delete(photos)
      .where(and(eq(photos.id, id), eq(photos.approvalStatus, expected)))
      .returning({ id: photos.id })
      .get();

    return Boolean(removed);
  }

  async listRecent(request: PageRequest) {
    const rows = this.db
      .select({ photo: photos, hostEmail: hosts.email, eventTitle: events.title })
      .from(photos)
      .innerJoin(events, eq(photos.eventId, events.id))
      .innerJoin(hosts, eq(events.hostId, hosts.id))
      .orderBy(desc(photos.uploadedAt))
      .limit(request.pageSize)
      .offset(pageOffset(request))
      .all();
    const total = this.db.select({ value: count() }).from(photos).get()?.value ?? 0;

    return { rows, total };
  }
}

function tallyByStatus(rows: { status: ApprovalStatus; value: number }[]) {
  const totals: Record<ApprovalStatus, number> = { pending: 0, approved: 0, rejected: 0 };

  for (const row of rows) {
    totals[row.status] = row.value;
  }

  return totals;
}

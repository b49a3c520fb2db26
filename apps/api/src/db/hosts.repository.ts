import type { HostStatus } from "@eventfolio/shared";
import { count, desc, eq, inArray } from "drizzle-orm";
import type { PageRequest } from "../core/page.js";
import { pageOffset } from "../core/page.js";
import type { AppDatabase } from "./client.js";
import { events, hosts, type HostRow } from "./schema.js";

export interface NewHost {
  id: string;
  subjectId: string;
  email: string;
  displayName: string | null;
  createdAt: Date;
}

export class HostRepository {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string) {
    return this.db.select().from(hosts).where(eq(hosts.id, id)).get() ?? null;
  }

  async findBySubject(subjectId: string) {
    return this.db.select().from(hosts).where(eq(hosts.subjectId, subjectId)).get() ?? null;
  }

  /**
   * Inserts the host unless a row with the same subject already exists, then
   * returns whichever row is stored. `created` is false when another request
   * won the insert.
   */
  async insertIfAbsent(input: NewHost): Promise<{ host: HostRow; created: boolean }> {
    const inserted = this.db
      .insert(hosts)
      .values({
        ...input,
        status: "active",
        updatedAt: input.createdAt
      })
      .onConflictDoNothing({ target: hosts.subjectId })
      .returning()
      .get();

    if (inserted) {
      return { host: inserted, created: true };
    }

    const existing = await this.findBySubject(input.subjectId);

    if (!existing) {
      throw new Error(`Host for subject ${input.subjectId} vanished after conflicting insert`);
    }

    return { host: existing, created: false };
  }

  async updateDisplayName(id: string, displayName: string | null, now: Date) {
    return (
      this.db
        .update(hosts)
        .set({ displayName, updatedAt: now })
        .where(eq(hosts.id, id))
        .returning()
        .get() ?? null
    );
  }

  async setStatus(id: string, status: HostStatus, now: Date) {
    return (
      this.db
        .update(hosts)
        .set({ status, updatedAt: now })
        .where(eq(hosts.id, id))
        .returning()
        .get() ?? null
    );
  }

  async list(request: PageRequest) {
    const rows = this.db
      .select()
      .from(hosts)
      .orderBy(desc(hosts.createdAt))
      .limit(request.pageSize)
      .offset(pageOffset(request))
      .all();

    return { rows, total: await this.count() };
  }

  async countEvents(hostIds: string[]) {
    const counts = new Map<string, number>();

    if (hostIds.length === 0) {
      return counts;
    }

    const rows = this.db
      .select({ hostId: events.hostId, value: count() })
      .from(events)
      .where(inArray(events.hostId, hostIds))
      .groupBy(events.hostId)
      .all();

    for (const row of rows) {
      counts.set(row.hostId, row.value);
    }

    return counts;
  }

  async count() {
    return this.db.select({ value: count() }).from(hosts).get()?.value ?? 0;
  }
}

import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const hosts = sqliteTable("hosts", {
  id: text("id").primaryKey(),
  subjectId: text("subject_id").notNull().unique(),
  email: text("email").notNull(),
  displayName: text("display_name"),
  status: text("status", { enum: ["active", "suspended"] }).notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull()
});

export const events = sqliteTable(
  "events",
  {
    id: text("id").primaryKey(),
    hostId: text("host_id")
      .notNull()
      .references(() => hosts.id),
    title: text("title").notNull(),
    description: text("description"),
    status: text("status", { enum: ["draft", "active", "suspended", "deleted"] }).notNull(),
    accessPasswordHash: text("access_password_hash"),
    shareToken: text("share_token").notNull().unique(),
    coverImageRef: text("cover_image_ref"),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull()
  },
  (table) => [index("events_host_idx").on(table.hostId)]
);

export const photos = sqliteTable(
  "photos",
  {
    id: text("id").primaryKey(),
    eventId: text("event_id")
      .notNull()
      .references(() => events.id, { onDelete: "cascade" }),
    storageRef: text("storage_ref").notNull(),
    caption: text("caption"),
    mimeType: text("mime_type"),
    fileSize: integer("file_size"),
    approvalStatus: text("approval_status", { enum: ["pending", "approved", "rejected"] }).notNull(),
    uploadedAt: integer("uploaded_at", { mode: "timestamp_ms" }).notNull(),
    moderatedBy: text("moderated_by"),
    moderatedAt: integer("moderated_at", { mode: "timestamp_ms" })
  },
  (table) => [index("photos_event_idx").on(table.eventId, table.approvalStatus)]
);

export type HostRow = typeof hosts.$inferSelect;
export type EventRow = typeof events.$inferSelect;
export type PhotoRow = typeof photos.$inferSelect;

import { bigint, boolean, index, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";
import { jobErrorKindEnum, jobStatusEnum, mediaFormatEnum } from "./enums.js";

export const jobs = pgTable(
  "jobs",
  {
    id: uuid("id").primaryKey(),
    artifact_hash: text("artifact_hash").notNull(),
    artifact_size: bigint("artifact_size", { mode: "number" }).notNull(),
    filename: text("filename"),
    declared_mime: text("declared_mime"),
    format: mediaFormatEnum("format"),
    status: jobStatusEnum("status").notNull().default("queued"),
    error_kind: jobErrorKindEnum("error_kind"),
    error_message: text("error_message"),
    error_detail: text("error_detail"),
    has_partial_result: boolean("has_partial_result").notNull().default(false),
    enqueued_at: timestamp("enqueued_at", { withTimezone: true }).notNull().defaultNow(),
    started_at: timestamp("started_at", { withTimezone: true }),
    finished_at: timestamp("finished_at", { withTimezone: true }),
  },
  (table) => [
    index("jobs_status_enqueued_at_idx").on(table.status, table.enqueued_at),
    index("jobs_artifact_hash_idx").on(table.artifact_hash),
  ],
);

export type JobRow = typeof jobs.$inferSelect;

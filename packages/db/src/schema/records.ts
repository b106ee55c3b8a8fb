import { pgTable, text, bigint, timestamp } from 'drizzle-orm/pg-core';

// ── Queue Records (storage-agnostic key/value layout) ───────────
// Keys: `location#{id}` and `ticket#{locationId}#{number}`.
// `version` is the compare-and-swap token; it starts at 1 and is
// bumped on every write.

export const queueRecords = pgTable('queue_records', {
  key: text('key').primaryKey(),
  data: text('data').notNull(),
  version: bigint('version', { mode: 'number' }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export type QueueRecordRow = typeof queueRecords.$inferSelect;

import { blob, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { BLOBS_TABLE } from "./constants";

export const blobs = sqliteTable(BLOBS_TABLE, {
  key: text("key").primaryKey().notNull(),
  value: blob("value", { mode: "buffer" }).notNull(),
  updatedAt: integer("updated_at").notNull(),
});

export const schema = {
  blobs,
};

import { blob, sqliteTable, text } from "drizzle-orm/sqlite-core";

// ---------------------------------------------------------------------------
// Browser cookie stores (read-only; only the columns we query)
// ---------------------------------------------------------------------------

/** Firefox-family `cookies.sqlite`. Values are plain text. */
export const mozCookies = sqliteTable("moz_cookies", {
  host: text("host").notNull(),
  name: text("name").notNull(),
  value: text("value").notNull(),
});

/** Chromium-family `Cookies`. `value` is empty when `encrypted_value` is set. */
export const chromiumCookies = sqliteTable("cookies", {
  hostKey: text("host_key").notNull(),
  name: text("name").notNull(),
  value: text("value").notNull(),
  encryptedValue: blob("encrypted_value", { mode: "buffer" }),
});

/** Chromium `meta` key/value table; `version` is the schema version. */
export const chromiumMeta = sqliteTable("meta", {
  key: text("key").primaryKey(),
  value: text("value"),
});

import { blob, index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * One row per banned or failing address.
 * Timestamps are unix epoch milliseconds. `state` holds the numeric codes
 * from ban/address-state.ts; the codes are part of the file format.
 */
export const ipAddresses = sqliteTable(
  "ip_addresses",
  {
    /** Network-order address bytes: 4 for IPv4, 16 for IPv6 */
    ipAddress: blob("ip_address", { mode: "buffer" }).primaryKey(),
    /** Canonical display form, derived from ipAddress */
    ipAddressText: text("ip_address_text").notNull(),
    lastFailedLogin: integer("last_failed_login").notNull(),
    failedLoginCount: integer("failed_login_count").notNull(),
    /** Ban start, null when not banned */
    banDate: integer("ban_date"),
    state: integer("state").notNull().default(0),
    /** Ban end, null when not banned; may lie in the past */
    banEndDate: integer("ban_end_date"),
  },
  (table) => [
    index("idx_ip_addresses_last_failed_login").on(table.lastFailedLogin),
    index("idx_ip_addresses_ban_date").on(table.banDate),
    index("idx_ip_addresses_ban_end_date").on(table.banEndDate),
    index("idx_ip_addresses_state").on(table.state),
  ],
);

export type IpAddressRow = typeof ipAddresses.$inferSelect;
export type NewIpAddressRow = typeof ipAddresses.$inferInsert;

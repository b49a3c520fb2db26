import type { HostRow } from "../db/schema.js";

/**
 * The resolved caller. Every actor carries its Host record; `isAdmin` is
 * derived from the allow-list for this request only and never stored.
 */
export interface Actor {
  host: HostRow;
  isAdmin: boolean;
}

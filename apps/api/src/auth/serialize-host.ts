import type { HostSummary } from "@eventfolio/shared";
import type { HostRow } from "../db/schema.js";

export function serializeHost(host: HostRow): HostSummary {
  return {
    id: host.id,
    email: host.email,
    displayName: host.displayName,
    status: host.status,
    createdAt: host.createdAt.toISOString()
  };
}

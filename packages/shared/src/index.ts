export type HostStatus = "active" | "suspended";

export type EventStatus = "draft" | "active" | "suspended" | "deleted";

export type ApprovalStatus = "pending" | "approved" | "rejected";

export type FailureReason =
  | "NotFound"
  | "NotOwner"
  | "AdminRequired"
  | "HostSuspended"
  | "IllegalState"
  | "WrongPassword"
  | "NotAvailable"
  | "QuotaExceeded";

export interface HostSummary {
  id: string;
  email: string;
  displayName: string | null;
  status: HostStatus;
  createdAt: string;
}

export interface EventSummary {
  id: string;
  hostId: string;
  title: string;
  description: string | null;
  status: EventStatus;
  hasPassword: boolean;
  shareToken: string;
  coverImageRef: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface PhotoSummary {
  id: string;
  eventId: string;
  storageRef: string;
  caption: string | null;
  approvalStatus: ApprovalStatus;
  uploadedAt: string;
  moderatedBy: string | null;
  moderatedAt: string | null;
}

export interface PublicEventSummary {
  title: string;
  description: string | null;
  coverImageRef: string | null;
  hasPassword: boolean;
  photoCount: number;
}

export interface BatchItemOutcome {
  id: string;
  ok: boolean;
  reason?: FailureReason;
  status?: string;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  hasMore: boolean;
}

export type ExportJobKind = "event-photos" | "system-snapshot";

export type ExportJobState = "queued" | "running" | "completed" | "failed";

import type { FailureReason } from "@eventfolio/shared";
import type { Response } from "express";
import type { Failure } from "../core/result.js";

const STATUS_BY_REASON: Record<FailureReason, number> = {
  NotFound: 404,
  NotOwner: 403,
  AdminRequired: 403,
  HostSuspended: 403,
  IllegalState: 409,
  WrongPassword: 401,
  NotAvailable: 404,
  QuotaExceeded: 413
};

function statusForReason(reason: FailureReason) {
  return STATUS_BY_REASON[reason];
}

export function sendFailure(res: Response, failure: Failure) {
  res.status(statusForReason(failure.reason)).json({ error: failure.message, reason: failure.reason });
}

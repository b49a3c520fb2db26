import type { FailureReason } from "@eventfolio/shared";

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  reason: FailureReason;
  message: string;
}

export type Result<T> = Success<T> | Failure;

export function succeed<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(reason: FailureReason, message: string): Failure {
  return { ok: false, reason, message };
}

import pino from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime
});

export function withComponent(component: string) {
  return logger.child({ component });
}

export function actionSuccess(component: string, action: string, extra?: Record<string, unknown>) {
  withComponent(component).info({ step: `${action}.success`, ...extra }, "Action succeeded");
}

export function actionFailure(component: string, action: string, extra?: Record<string, unknown>) {
  withComponent(component).warn({ step: `${action}.failure`, ...extra }, "Action failed");
}

import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import { isUniqueViolation } from "../db/client.js";
import { withComponent } from "../lib/logger.js";

const log = withComponent("http");

export const errorHandler: ErrorRequestHandler = (error, _req, res, _next) => {
  if (error instanceof ZodError) {
    res.status(400).json({
      error: "Validation failed",
      issues: error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message
      }))
    });
    return;
  }

  if (error instanceof SyntaxError && "body" in error) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  if (isUniqueViolation(error)) {
    res.status(409).json({ error: "Resource already exists" });
    return;
  }

  log.error(
    {
      name: error instanceof Error ? error.name : "UnknownError",
      message: error instanceof Error ? error.message : "Unknown error"
    },
    "Unhandled API error"
  );

  res.status(500).json({ error: "Internal server error" });
};

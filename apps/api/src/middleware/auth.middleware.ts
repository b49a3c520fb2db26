import type { NextFunction, Request, Response } from "express";
import { IdentityProviderUnavailableError, InvalidCredentialError } from "../auth/identity-errors.js";
import { actionFailure } from "../lib/logger.js";
import { asyncHandler } from "../server/async-handler.js";
import type { AppServices } from "../server/services.js";

/** Bearer header first, then a `token` field in the JSON body. */
export function extractCredential(req: Request): string | null {
  const authHeader = req.header("authorization");

  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice("Bearer ".length).trim();
  }

  const bodyToken: unknown = req.body?.token;
  return typeof bodyToken === "string" ? bodyToken : null;
}

export function createRequireActor(services: Pick<AppServices, "verifier" | "resolver">) {
  return asyncHandler(async (req, res, next) => {
    const credential = extractCredential(req);

    if (!credential) {
      actionFailure("auth", "authenticate", { cause: "missing" });
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    try {
      const identity = await services.verifier.verify(credential);
      req.actor = await services.resolver.resolve(identity);
    } catch (error) {
      if (error instanceof InvalidCredentialError) {
        actionFailure("auth", "authenticate", { cause: error.credentialCause, message: error.message });
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      if (error instanceof IdentityProviderUnavailableError) {
        actionFailure("auth", "authenticate", { cause: "provider_unavailable" });
        res.status(503).json({ error: "Identity provider unavailable" });
        return;
      }

      throw error;
    }

    next();
  });
}

export function requireAdmin(req: Request, res: Response, next: NextFunction) {
  if (!req.actor?.isAdmin) {
    actionFailure("auth", "require-admin", { hostId: req.actor?.host.id });
    res.status(403).json({ error: "Admin access required", reason: "AdminRequired" });
    return;
  }

  next();
}

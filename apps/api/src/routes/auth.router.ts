import { Router } from "express";
import { z } from "zod";
import { serializeHost } from "../auth/serialize-host.js";
import { fail } from "../core/result.js";
import { actionFailure } from "../lib/logger.js";
import { asyncHandler } from "../server/async-handler.js";
import { sendFailure } from "../server/send-failure.js";
import type { AppServices } from "../server/services.js";

const updateProfileSchema = z.object({
  displayName: z.string().trim().min(1).max(120).nullable()
});

/** Mounted behind the actor middleware. */
export function createAuthRouter(services: AppServices) {
  const router = Router();

  // Sign-in and "who am I" both answer with the resolved actor; the first
  // call for a new identity is what creates its host record.
  router.post("/session", (req, res) => {
    const actor = req.actor;

    if (!actor) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    res.json({ user: serializeHost(actor.host), isAdmin: actor.isAdmin });
  });

  router.get("/me", (req, res) => {
    const actor = req.actor;

    if (!actor) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    res.json({ user: serializeHost(actor.host), isAdmin: actor.isAdmin });
  });

  router.patch(
    "/me",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const input = updateProfileSchema.parse(req.body);
      const decision = services.guard.checkActiveHost(actor);

      if (!decision.allowed) {
        actionFailure("auth", "profile.update", { hostId: actor.host.id, reason: decision.reason });
        sendFailure(res, fail(decision.reason, "Suspended hosts cannot change their profile"));
        return;
      }

      const host = await services.hosts.updateDisplayName(actor.host.id, input.displayName, new Date());

      if (!host) {
        sendFailure(res, fail("NotFound", "Host not found"));
        return;
      }

      res.json({ user: serializeHost(host), isAdmin: actor.isAdmin });
    })
  );

  return router;
}

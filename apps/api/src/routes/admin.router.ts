import { Router } from "express";
import { z } from "zod";
import { serializeHost } from "../auth/serialize-host.js";
import type { EventAction } from "../events/event-lifecycle.js";
import { serializeEvent, serializeTransition } from "../events/serialize-event.js";
import { serializeExportJob } from "../jobs/export-jobs.js";
import { serializePhoto } from "../photos/serialize-photo.js";
import { asyncHandler } from "../server/async-handler.js";
import { sendFailure } from "../server/send-failure.js";
import type { AppServices } from "../server/services.js";
import { bulkIdsSchema, paginationSchema } from "./pagination.js";

const eventParamsSchema = z.object({
  eventId: z.string().min(1)
});

const hostParamsSchema = z.object({
  hostId: z.string().min(1)
});

const eventQuerySchema = paginationSchema.extend({
  status: z.enum(["draft", "active", "suspended", "deleted"]).optional()
});

const hostStatusSchema = z.object({
  status: z.enum(["active", "suspended"])
});

const bulkActionSchema = z.object({
  action: z.enum(["suspend", "reactivate", "delete", "force-delete"]),
  eventIds: bulkIdsSchema
});

/** Platform oversight. Mounted behind the actor and admin middleware. */
export function createAdminRouter(services: AppServices) {
  const router = Router();

  router.post("/session", (req, res) => {
    const actor = req.actor;

    if (!actor) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    res.json({ user: serializeHost(actor.host), isAdmin: actor.isAdmin });
  });

  router.get(
    "/overview",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const result = await services.adminConsole.overview(actor);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      const { hosts, events, photos } = result.value;
      const totalEvents = Object.values(events).reduce((sum, count) => sum + count, 0);
      const totalPhotos = Object.values(photos).reduce((sum, count) => sum + count, 0);

      res.json({
        hosts,
        events: { total: totalEvents, ...events },
        photos: { total: totalPhotos, ...photos }
      });
    })
  );

  router.get(
    "/events",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { status, ...page } = eventQuerySchema.parse(req.query);
      const result = await services.adminConsole.listEvents(actor, { status }, page);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      const { items, ...meta } = result.value;
      res.json({ events: items.map(serializeEvent), ...meta });
    })
  );

  router.post(
    "/events/actions/bulk",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const input = bulkActionSchema.parse(req.body);
      const results = await services.lifecycle.transitionMany(actor, input.eventIds, input.action);

      res.json({ action: input.action, results });
    })
  );

  router.get(
    "/events/:eventId",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const result = await services.adminConsole.inspectEvent(actor, eventId);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      const { event, host, photos } = result.value;
      res.json({
        event: serializeEvent(event),
        host: host ? serializeHost(host) : null,
        photos
      });
    })
  );

  function transitionHandler(action: EventAction) {
    return asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const result = await services.lifecycle.transition(actor, eventId, action);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json(serializeTransition(result.value));
    });
  }

  router.post("/events/:eventId/suspend", transitionHandler("suspend"));
  router.post("/events/:eventId/reactivate", transitionHandler("reactivate"));
  router.delete("/events/:eventId", transitionHandler("force-delete"));

  router.get(
    "/hosts",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const page = paginationSchema.parse(req.query);
      const result = await services.adminConsole.listHosts(actor, page);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      const { items, ...meta } = result.value;
      res.json({
        hosts: items.map(({ host, eventCount }) => ({ ...serializeHost(host), eventCount })),
        ...meta
      });
    })
  );

  router.get(
    "/hosts/:hostId",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { hostId } = hostParamsSchema.parse(req.params);
      const result = await services.adminConsole.getHost(actor, hostId);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json({ host: { ...serializeHost(result.value.host), eventCount: result.value.eventCount } });
    })
  );

  router.patch(
    "/hosts/:hostId/status",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { hostId } = hostParamsSchema.parse(req.params);
      const input = hostStatusSchema.parse(req.body);
      const result = await services.adminConsole.setHostStatus(actor, hostId, input.status);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json({ host: serializeHost(result.value) });
    })
  );

  router.get(
    "/uploads/recent",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const page = paginationSchema.parse(req.query);
      const result = await services.adminConsole.recentUploads(actor, page);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      const { items, ...meta } = result.value;
      res.json({
        uploads: items.map((upload) => ({
          photo: serializePhoto(upload.photo),
          hostEmail: upload.hostEmail,
          eventTitle: upload.eventTitle
        })),
        ...meta
      });
    })
  );

  router.post("/system/export", (req, res) => {
    const actor = req.actor;

    if (!actor) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    const result = services.exports.submitSystemExport(actor);

    if (!result.ok) {
      sendFailure(res, result);
      return;
    }

    res.status(202).json({ job: serializeExportJob(result.value) });
  });

  return router;
}

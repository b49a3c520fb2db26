import { Router } from "express";
import { z } from "zod";
import { serializePhoto } from "../photos/serialize-photo.js";
import { asyncHandler } from "../server/async-handler.js";
import { sendFailure } from "../server/send-failure.js";
import type { AppServices } from "../server/services.js";
import { bulkIdsSchema, paginationSchema } from "./pagination.js";

const approvalStatusSchema = z.enum(["pending", "approved", "rejected"]);

const eventParamsSchema = z.object({
  eventId: z.string().min(1)
});

const photoParamsSchema = z.object({
  eventId: z.string().min(1),
  photoId: z.string().min(1)
});

const photoQuerySchema = paginationSchema.extend({
  status: approvalStatusSchema.optional()
});

const moderationBodySchema = z
  .object({
    expectedStatus: approvalStatusSchema.optional()
  })
  .default({});

const captionSchema = z.object({
  caption: z.string().trim().max(500).nullable()
});

const bulkDeleteSchema = z.object({
  photoIds: bulkIdsSchema
});

const bulkModerateSchema = z.object({
  photoIds: bulkIdsSchema,
  decision: z.enum(["approve", "reject"])
});

/** Host moderation of an event's photos. Mounted under /events behind the actor middleware. */
export function createEventPhotosRouter(services: AppServices) {
  const router = Router();

  router.get(
    "/:eventId/photos",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const { status, ...page } = photoQuerySchema.parse(req.query);
      const result = await services.moderation.list(actor, eventId, { status }, page);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      const { items, ...meta } = result.value;
      res.json({ photos: items.map(serializePhoto), ...meta });
    })
  );

  router.post(
    "/:eventId/photos/bulk-delete",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const input = bulkDeleteSchema.parse(req.body);
      const results = await services.moderation.removeMany(actor, eventId, input.photoIds);

      res.json({ results });
    })
  );

  router.post(
    "/:eventId/photos/bulk-moderate",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const input = bulkModerateSchema.parse(req.body);
      const results = await services.moderation.moderateMany(actor, eventId, input.photoIds, input.decision);

      res.json({ decision: input.decision, results });
    })
  );

  for (const decision of ["approve", "reject"] as const) {
    router.post(
      `/:eventId/photos/:photoId/${decision}`,
      asyncHandler(async (req, res) => {
        const actor = req.actor;

        if (!actor) {
          res.status(401).json({ error: "Unauthorized" });
          return;
        }

        const { eventId, photoId } = photoParamsSchema.parse(req.params);
        const { expectedStatus } = moderationBodySchema.parse(req.body);
        const result = await services.moderation.moderate(actor, eventId, photoId, decision, expectedStatus);

        if (!result.ok) {
          sendFailure(res, result);
          return;
        }

        res.json({ photo: serializePhoto(result.value) });
      })
    );
  }

  router.patch(
    "/:eventId/photos/:photoId",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId, photoId } = photoParamsSchema.parse(req.params);
      const input = captionSchema.parse(req.body);
      const result = await services.moderation.updateCaption(actor, eventId, photoId, input.caption || null);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json({ photo: serializePhoto(result.value) });
    })
  );

  router.delete(
    "/:eventId/photos/:photoId",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId, photoId } = photoParamsSchema.parse(req.params);
      const result = await services.moderation.remove(actor, eventId, photoId);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json({ deleted: true, photoId: result.value.id });
    })
  );

  return router;
}

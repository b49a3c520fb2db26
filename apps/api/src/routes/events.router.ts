import { Router } from "express";
import { z } from "zod";
import { serializeEvent, serializeTransition } from "../events/serialize-event.js";
import { buildShareUrl } from "../events/share-token.js";
import { serializeExportJob } from "../jobs/export-jobs.js";
import { createCoverStorageKey } from "../photos/storage-key.js";
import { asyncHandler } from "../server/async-handler.js";
import { sendFailure } from "../server/send-failure.js";
import type { AppServices } from "../server/services.js";
import { bulkIdsSchema, paginationSchema } from "./pagination.js";

const passwordSchema = z.string().min(4).max(128);

const createEventSchema = z.object({
  title: z.string().trim().min(1).max(120),
  description: z.string().trim().max(2000).optional().nullable(),
  password: passwordSchema.optional().nullable(),
  coverImageRef: z.string().trim().min(1).max(500).optional().nullable()
});

const updateEventSchema = z
  .object({
    title: z.string().trim().min(1).max(120).optional(),
    description: z.string().trim().max(2000).nullable().optional(),
    password: passwordSchema.nullable().optional(),
    coverImageRef: z.string().trim().min(1).max(500).nullable().optional()
  })
  .refine((value) => Object.keys(value).length > 0, {
    message: "At least one field must be provided"
  });

const bulkActionSchema = z.object({
  action: z.enum(["publish", "delete"]),
  eventIds: bulkIdsSchema
});

const coverUploadSchema = z.object({
  fileName: z.string().trim().min(1).max(255),
  mimeType: z
    .string()
    .trim()
    .regex(/^image\/[a-z0-9.+-]+$/i, "Cover must be an image")
});

const eventParamsSchema = z.object({
  eventId: z.string().min(1)
});

/** Host-facing event management. Mounted behind the actor middleware. */
export function createEventsRouter(services: AppServices) {
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const input = createEventSchema.parse(req.body);
      const result = await services.lifecycle.create(actor, input);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.status(201).json({ event: serializeEvent(result.value) });
    })
  );

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const page = paginationSchema.parse(req.query);
      const { items, ...meta } = await services.lifecycle.listOwn(actor, page);

      res.json({ events: items.map(serializeEvent), ...meta });
    })
  );

  router.post(
    "/actions/bulk",
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
    "/:eventId",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const result = await services.lifecycle.get(actor, eventId);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json({ event: serializeEvent(result.value) });
    })
  );

  router.patch(
    "/:eventId",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const input = updateEventSchema.parse(req.body);
      const result = await services.lifecycle.updateMetadata(actor, eventId, input);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json({ event: serializeEvent(result.value) });
    })
  );

  router.post(
    "/:eventId/publish",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const result = await services.lifecycle.transition(actor, eventId, "publish");

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json(serializeTransition(result.value));
    })
  );

  router.delete(
    "/:eventId",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const result = await services.lifecycle.transition(actor, eventId, "delete");

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json(serializeTransition(result.value));
    })
  );

  router.get(
    "/:eventId/share",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const result = await services.lifecycle.get(actor, eventId);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json({
        shareToken: result.value.shareToken,
        url: buildShareUrl(services.webUrl, result.value.shareToken),
        status: result.value.status
      });
    })
  );

  router.post(
    "/:eventId/cover-upload",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const input = coverUploadSchema.parse(req.body);
      const coverImageRef = createCoverStorageKey({ eventId, filename: input.fileName });
      const result = await services.lifecycle.updateMetadata(actor, eventId, { coverImageRef });

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      const uploadUrl = await services.storage.createUploadUrl({
        key: coverImageRef,
        contentType: input.mimeType
      });

      res.status(201).json({
        upload: {
          method: "PUT",
          url: uploadUrl,
          headers: {
            "Content-Type": input.mimeType
          }
        },
        event: serializeEvent(result.value)
      });
    })
  );

  router.post(
    "/:eventId/export",
    asyncHandler(async (req, res) => {
      const actor = req.actor;

      if (!actor) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const { eventId } = eventParamsSchema.parse(req.params);
      const result = await services.exports.submitEventExport(actor, eventId);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.status(202).json({ job: serializeExportJob(result.value) });
    })
  );

  return router;
}

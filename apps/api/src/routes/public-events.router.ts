import type { Request } from "express";
import { Router } from "express";
import { z } from "zod";
import { serializePublicEvent } from "../events/serialize-event.js";
import { serializePublicPhoto } from "../photos/serialize-photo.js";
import { createPhotoStorageKey } from "../photos/storage-key.js";
import { asyncHandler } from "../server/async-handler.js";
import { sendFailure } from "../server/send-failure.js";
import type { AppServices } from "../server/services.js";

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

const tokenParamsSchema = z.object({
  shareToken: z.string().min(1)
});

const accessSchema = z
  .object({
    password: z.string().max(128).optional()
  })
  .default({});

const uploadInitSchema = z.object({
  fileName: z.string().trim().min(1).max(255),
  mimeType: z
    .string()
    .trim()
    .regex(/^image\/[a-z0-9.+-]+$/i, "Only image uploads are allowed"),
  fileSize: z.coerce.number().int().min(1).max(MAX_UPLOAD_BYTES),
  caption: z.string().trim().max(500).optional(),
  password: z.string().max(128).optional()
});

function getPasswordFromRequest(req: Request) {
  return req.header("x-event-password") ?? null;
}

/** Visitor routes keyed by share token. No identity is required. */
export function createPublicEventsRouter(services: AppServices) {
  const router = Router();

  router.get(
    "/:shareToken",
    asyncHandler(async (req, res) => {
      const { shareToken } = tokenParamsSchema.parse(req.params);
      const result = await services.shareGate.describe(shareToken);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json({ event: serializePublicEvent(result.value.event, result.value.approvedCount) });
    })
  );

  router.post(
    "/:shareToken/access",
    asyncHandler(async (req, res) => {
      const { shareToken } = tokenParamsSchema.parse(req.params);
      const { password } = accessSchema.parse(req.body);
      const result = await services.shareGate.admit(shareToken, password);

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      res.json({ granted: true });
    })
  );

  router.get(
    "/:shareToken/photos",
    asyncHandler(async (req, res) => {
      const { shareToken } = tokenParamsSchema.parse(req.params);
      const result = await services.shareGate.evaluate(shareToken, getPasswordFromRequest(req));

      if (!result.ok) {
        sendFailure(res, result);
        return;
      }

      const photos = await Promise.all(
        result.value.photos.map((photo) => serializePublicPhoto(photo, services.storage))
      );

      res.json({ photos });
    })
  );

  router.post(
    "/:shareToken/photos",
    asyncHandler(async (req, res) => {
      const { shareToken } = tokenParamsSchema.parse(req.params);
      const input = uploadInitSchema.parse(req.body);
      const admitted = await services.shareGate.admitUpload(
        shareToken,
        input.password ?? getPasswordFromRequest(req),
        input.fileSize
      );

      if (!admitted.ok) {
        sendFailure(res, admitted);
        return;
      }

      const storageRef = createPhotoStorageKey({
        eventId: admitted.value.id,
        filename: input.fileName
      });

      const uploadUrl = await services.storage.createUploadUrl({
        key: storageRef,
        contentType: input.mimeType,
        contentLength: input.fileSize
      });

      const photo = await services.moderation.createPending(admitted.value, {
        storageRef,
        caption: input.caption || null,
        mimeType: input.mimeType,
        fileSize: input.fileSize
      });

      res.status(201).json({
        upload: {
          method: "PUT",
          url: uploadUrl,
          headers: {
            "Content-Type": input.mimeType
          }
        },
        photo: {
          id: photo.id,
          caption: photo.caption,
          approvalStatus: photo.approvalStatus
        }
      });
    })
  );

  return router;
}

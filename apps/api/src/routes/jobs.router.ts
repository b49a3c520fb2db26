import { Router } from "express";
import { z } from "zod";
import { serializeExportJob } from "../jobs/export-jobs.js";
import { sendFailure } from "../server/send-failure.js";
import type { AppServices } from "../server/services.js";

const jobParamsSchema = z.object({
  jobId: z.string().min(1)
});

export function createJobsRouter(services: AppServices) {
  const router = Router();

  router.get("/:jobId", (req, res) => {
    const actor = req.actor;

    if (!actor) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    const { jobId } = jobParamsSchema.parse(req.params);
    const result = services.exports.poll(actor, jobId);

    if (!result.ok) {
      sendFailure(res, result);
      return;
    }

    res.json({ job: serializeExportJob(result.value) });
  });

  return router;
}

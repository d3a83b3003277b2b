import { Router } from "express";
import { sendError } from "../lib/httpErrors";
import { cacheInvalidateBodySchema } from "../lib/validators";
import type { ReportService } from "../services/reportService";

export default function cacheRouter(service: ReportService): Router {
  const router = Router();

  /**
   * POST /cache/invalidate
   * body: { key? } (sem key limpa tudo)
   */
  router.post("/invalidate", (req, res) => {
    try {
      const { key } = cacheInvalidateBodySchema.parse(req.body ?? {});
      const removed = service.invalidate(key);
      res.json({ ok: true, removed });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

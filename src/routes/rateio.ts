import { Router } from "express";
import { sendError } from "../lib/httpErrors";
import {
  allocationTotalsBodySchema,
  categoryAllocationBodySchema,
  fixedAllocationBodySchema,
} from "../lib/validators";
import { checkAllocationRuleTotals, checkCategoryAllocationTotals } from "../services/records/integrity";
import type { ReportService } from "../services/reportService";

export default function rateioRouter(service: ReportService): Router {
  const router = Router();

  /**
   * POST /rateio/fixed
   * body: { start?, end?, period?, netResult? }
   * sem netResult usa o caixa atual do período
   */
  router.post("/fixed", async (req, res) => {
    try {
      const body = fixedAllocationBodySchema.parse(req.body ?? {});
      const result = await service.allocateFixed(body);
      res.json({ ok: true, ...result });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post("/category", async (req, res) => {
    try {
      const body = categoryAllocationBodySchema.parse(req.body ?? {});
      const result = await service.allocateByCategory(body);
      res.json({ ok: true, ...result });
    } catch (err) {
      sendError(res, err);
    }
  });

  // checagem dos percentuais antes de gravar as regras
  router.post("/validate", (req, res) => {
    try {
      const body = allocationTotalsBodySchema.parse(req.body ?? {});
      const issues = [
        ...(body.fixed ? checkAllocationRuleTotals(body.fixed) : []),
        ...(body.category ? checkCategoryAllocationTotals(body.category) : []),
      ];
      res.json({ ok: issues.length === 0, issues });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

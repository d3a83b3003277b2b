import { Router } from "express";
import { sendError } from "../lib/httpErrors";
import { categoryQuerySchema, reportQuerySchema } from "../lib/validators";
import type { ReportService } from "../services/reportService";

const XLSX_MIME = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export default function reportRouter(service: ReportService): Router {
  const router = Router();

  /**
   * GET /report/kpis?start=&end=&period=
   */
  router.get("/kpis", async (req, res) => {
    try {
      const query = reportQuerySchema.parse(req.query);
      const report = await service.getKpiReport(query);
      res.json({ ok: true, ...report });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/shows", async (req, res) => {
    try {
      const query = reportQuerySchema.parse(req.query);
      const result = await service.getEventProfitability(query);
      res.json({ ok: true, period: result.period, count: result.shows.length, shows: result.shows });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/cash-flow", async (req, res) => {
    try {
      const query = reportQuerySchema.parse(req.query);
      const result = await service.getCashFlow(query);
      res.json({ ok: true, ...result });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/categories", async (req, res) => {
    try {
      const query = categoryQuerySchema.parse(req.query);
      const result = await service.getCategoryDistribution(query);
      res.json({ ok: true, ...result });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/warnings", async (_req, res) => {
    try {
      const warnings = await service.getWarnings();
      res.json({ ok: true, count: warnings.length, warnings });
    } catch (err) {
      sendError(res, err);
    }
  });

  // download do relatório em .xlsx
  router.get("/export", async (req, res) => {
    try {
      const query = reportQuerySchema.parse(req.query);
      const file = await service.buildExport(query);

      res.setHeader("Content-Type", XLSX_MIME);
      res.setHeader("Content-Disposition", 'attachment; filename="relatorio-financeiro.xlsx"');
      res.send(file);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

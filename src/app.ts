import express from "express";
import cors from "cors";

import healthRouter from "./routes/health";
import reportRouter from "./routes/report";
import rateioRouter from "./routes/rateio";
import cacheRouter from "./routes/cache";
import type { ReportService } from "./services/reportService";

export interface AppDeps {
  service: ReportService;
}

export function createApp({ service }: AppDeps) {
  const app = express();

  /* =========================
     Middlewares
  ========================= */
  app.use(cors());
  app.use(express.json());

  /* =========================
     Rotas públicas
  ========================= */
  app.use("/health", healthRouter);

  /* =========================
     Relatórios
  ========================= */
  app.use("/report", reportRouter(service));

  /* =========================
     Rateio
  ========================= */
  app.use("/rateio", rateioRouter(service));

  /* =========================
     Manutenção
  ========================= */
  app.use("/cache", cacheRouter(service));

  return app;
}

import "dotenv/config";

import { createApp } from "./app";
import { TableCache } from "./lib/cache";
import { loadConfig, toKpiSettings } from "./lib/config";
import { logger } from "./lib/logger";
import { ReportService } from "./services/reportService";
import { WorkbookSource } from "./services/sheets/workbookSource";

const config = loadConfig();

const service = new ReportService({
  source: new WorkbookSource({ url: config.sheetUrl, path: config.xlsxPath }),
  cache: new TableCache(config.cacheTtlSeconds),
  settings: toKpiSettings(config),
});

/* =========================
   Start server
========================= */
const app = createApp({ service });

app.listen(config.port, () => {
  logger.info(`band-finance-report rodando na porta ${config.port}`, {
    source: config.sheetUrl ? "url" : config.xlsxPath ? "file" : "nenhuma",
  });
});

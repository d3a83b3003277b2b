import "dotenv/config";
import { TableCache } from "../src/lib/cache";
import { loadConfig, toKpiSettings } from "../src/lib/config";
import { ReportService } from "../src/services/reportService";
import { WorkbookSource } from "../src/services/sheets/workbookSource";

// Lê a planilha configurada, valida as tabelas e mostra os KPIs
async function main() {
  console.log("🔍 Testando leitura da planilha financeira...");

  const config = loadConfig();
  const cache = new TableCache(config.cacheTtlSeconds);
  const service = new ReportService({
    source: new WorkbookSource({ url: config.sheetUrl, path: config.xlsxPath }),
    cache,
    settings: toKpiSettings(config),
  });

  try {
    const report = await service.getKpiReport();
    const warnings = await service.getWarnings();

    console.log("✅ OK! Planilha válida.");
    console.table(report.explanations.map((e) => ({ kpi: e.label, valor: e.value })));
    if (warnings.length) console.log("⚠️ Avisos:", warnings);
  } finally {
    cache.close();
  }
}

main().catch((err: unknown) => {
  console.error("❌ FALHOU na leitura da planilha:");
  console.error(err);
  process.exitCode = 1;
});

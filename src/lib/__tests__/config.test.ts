import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ConfigError, loadConfig, toKpiSettings } from "../config";

describe("loadConfig", () => {
  it("usa os padrões quando nada é definido", () => {
    assert.deepEqual(loadConfig({}), {
      nodeEnv: "development",
      port: 4001,
      sheetUrl: null,
      xlsxPath: null,
      cacheTtlSeconds: 300,
      attendanceTarget: 100,
      attendanceWindowDays: 90,
      musicianPayoutCategories: ["CACHÊS-MÚSICOS", "PAYOUT_MUSICOS"],
      fixedExpenseCategories: ["ALUGUEL", "INTERNET", "ENERGIA", "ÁGUA", "MANUTENÇÃO", "ASSINATURAS", "SEGURO"],
    });
  });

  it("lê as variáveis definidas", () => {
    const config = loadConfig({
      PORT: "8080",
      ATTENDANCE_TARGET: "150",
      MUSICIAN_PAYOUT_CATEGORIES: " A , B ,",
      FINANCE_SHEET_URL: "https://example.com/financas.xlsx",
      FINANCE_XLSX_PATH: "  ",
    });

    assert.equal(config.port, 8080);
    assert.equal(config.attendanceTarget, 150);
    assert.deepEqual(config.musicianPayoutCategories, ["A", "B"]);
    assert.equal(config.sheetUrl, "https://example.com/financas.xlsx");
    assert.equal(config.xlsxPath, null);
  });

  it("configuração inválida lança ConfigError", () => {
    assert.throws(() => loadConfig({ PORT: "abc" }), ConfigError);
    assert.throws(() => loadConfig({ FINANCE_SHEET_URL: "não é url" }), /FINANCE_SHEET_URL/);
  });

  it("toKpiSettings repassa os parâmetros do cálculo", () => {
    const settings = toKpiSettings(loadConfig({ ATTENDANCE_WINDOW_DAYS: "60" }));
    assert.equal(settings.attendanceWindowDays, 60);
    assert.equal(settings.attendanceTarget, 100);
    assert.deepEqual(settings.musicianPayoutCategories, ["CACHÊS-MÚSICOS", "PAYOUT_MUSICOS"]);
  });
});

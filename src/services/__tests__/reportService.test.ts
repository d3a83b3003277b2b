import { after, describe, it } from "node:test";
import assert from "node:assert/strict";
import * as XLSX from "xlsx";
import { EnumError, RecordRangeError } from "../../domain/errors";
import type { KpiSettings } from "../../domain/types";
import { TableCache } from "../../lib/cache";
import { loadConfig, toKpiSettings } from "../../lib/config";
import { tableFromRows } from "../records/validateRecords";
import { ReportService } from "../reportService";
import { InMemorySource } from "../sheets/workbookSource";
import { sampleTables, withInvalidEvent } from "./financeTables";
import { assertClose } from "./fixtures";

const NOW = new Date("2025-03-31T12:00:00Z");

describe("ReportService", () => {
  const caches: TableCache[] = [];
  after(() => caches.forEach((c) => c.close()));

  function setup(tables = sampleTables(), settings?: KpiSettings) {
    const source = new InMemorySource(tables);
    const cache = new TableCache(60);
    caches.push(cache);
    const service = new ReportService({ source, cache, settings, clock: () => NOW });
    return { source, service };
  }

  it("KPIs a partir da planilha validada", async () => {
    const { service } = setup();
    const report = await service.getKpiReport();

    assert.equal(report.period, null);
    assert.equal(report.kpis.totalIncome, 2000);
    assert.equal(report.kpis.totalExpenses, 1900);
    assert.equal(report.kpis.currentCash, 100);
    assert.equal(report.kpis.totalMusicianPayout, 900);
    assert.equal(report.kpis.estimatedCash, 3100);
    assert.equal(report.kpis.completedEventCount, 1);
    assert.equal(report.explanations.length, 14);
  });

  it("lê a planilha uma vez e reaproveita o cache", async () => {
    const { service, source } = setup();
    await service.getKpiReport();
    await service.getEventProfitability();
    assert.equal(source.reads, 1);
  });

  it("invalidate força nova leitura", async () => {
    const { service, source } = setup();
    await service.getKpiReport();
    assert.equal(service.invalidate(), 1);
    await service.getKpiReport();
    assert.equal(source.reads, 2);
  });

  it("erro de validação aborta o cálculo e não é cacheado", async () => {
    const { service, source } = setup(withInvalidEvent());
    await assert.rejects(service.getKpiReport(), EnumError);
    await assert.rejects(service.getKpiReport(), EnumError);
    assert.equal(source.reads, 2);
  });

  it("preset de período é resolvido pelo relógio do serviço", async () => {
    const { service } = setup();
    const report = await service.getKpiReport({ period: "previous_month" });

    assert.deepEqual(report.period, { start: "2025-02-01", end: "2025-02-28" });
    assert.equal(report.kpis.totalIncome, 0);
    assert.equal(report.kpis.totalExpenses, 1000);
  });

  it("rateio fixo usa o caixa do período quando não há netResult", async () => {
    const { service } = setup();

    const byCash = await service.allocateFixed();
    assert.equal(byCash.netResult, 100);
    assert.equal(byCash.rules.length, 2);
    assertClose(byCash.payouts.Alice, 60);
    assertClose(byCash.payouts.Bob, 40);

    const explicit = await service.allocateFixed({ netResult: 1000 });
    assert.deepEqual(explicit.payouts, { Alice: 600, Bob: 400 });
  });

  it("rateio por categoria com totais do período", async () => {
    const { service } = setup();

    const all = await service.allocateByCategory();
    assert.deepEqual(all.categoryTotals, { SHOWS: 2000, "CACHÊS-MÚSICOS": -900, ALUGUEL: -1000 });
    assert.deepEqual(all.payouts, { Alice: 0, Bob: 1000 });
    assert.equal(all.lines.length, 3);

    const march = await service.allocateByCategory({ period: "current_month" });
    assert.deepEqual(march.payouts, { Alice: 1000, Bob: 1000 });
  });

  it("fluxo de caixa, categorias e avisos", async () => {
    const { service } = setup();

    const flow = await service.getCashFlow();
    assert.deepEqual(
      flow.rows.map((r) => [r.month, r.balance, r.projection]),
      [
        ["2025-02", -1000, -1000],
        ["2025-03", 1100, 1100],
      ]
    );
    assertClose(flow.rows[1].balanceChangePct, 210);

    const categories = await service.getCategoryDistribution();
    assert.deepEqual(categories.categories, [
      { category: "ALUGUEL", total: 1000 },
      { category: "CACHÊS-MÚSICOS", total: 900 },
    ]);

    assert.deepEqual(await service.getWarnings(), []);
  });

  it("shows do período", async () => {
    const { service } = setup();
    const { shows } = await service.getEventProfitability({ start: "2025-03-01", end: "2025-03-31" });

    assert.equal(shows.length, 1);
    assert.equal(shows[0].eventId, "E1");
    assert.equal(shows[0].netResult, 1100);
    assert.equal(shows[0].profitPerAttendee, 1100 / 150);
  });

  it("categoria de cachê configurada na grafia antiga", async () => {
    const settings = toKpiSettings(loadConfig({ MUSICIAN_PAYOUT_CATEGORIES: "PAYOUT_MUSICOS" }));
    const { service } = setup(sampleTables(), settings);

    const report = await service.getKpiReport();
    assert.equal(report.kpis.totalMusicianPayout, 900);
  });

  it("mapa de rateio na grafia antiga casa com a categoria das transações", async () => {
    const { service } = setup({
      ...sampleTables(),
      categoryAllocations: tableFromRows([{ category: "PAYOUT_MUSICOS", member: "Alice", percentage: 100 }]),
    });

    const report = await service.allocateByCategory();
    assert.deepEqual(report.payouts, { Alice: -900 });
    assert.deepEqual(report.lines, [
      { category: "CACHÊS-MÚSICOS", member: "Alice", percentage: 100, categoryTotal: -900, amount: -900 },
    ]);
  });

  it("membro com ativo em branco entra no rateio fixo", async () => {
    const { service } = setup({
      ...sampleTables(),
      allocationRules: tableFromRows([
        { member: "Alice", percentage: 60, active: null },
        { member: "Bob", percentage: 40, active: "" },
      ]),
    });

    const report = await service.allocateFixed({ netResult: 1000 });
    assert.deepEqual(report.payouts, { Alice: 600, Bob: 400 });
  });

  describe("aba de rateio inválida", () => {
    const invalidRule = () => ({
      ...sampleTables(),
      allocationRules: tableFromRows([{ member: "Alice", percentage: 150, active: "SIM" }]),
    });

    it("não impede KPIs, shows e fluxo de caixa", async () => {
      const { service } = setup(invalidRule());

      assert.equal((await service.getKpiReport()).kpis.totalIncome, 2000);
      assert.equal((await service.getEventProfitability()).shows.length, 1);
      assert.equal((await service.getCashFlow()).rows.length, 2);
    });

    it("o rateio fixo falha com RecordRangeError", async () => {
      const { service } = setup(invalidRule());
      await assert.rejects(service.allocateFixed({ netResult: 1000 }), RecordRangeError);
    });

    it("a exportação sai com a aba Rateio vazia", async () => {
      const { service } = setup(invalidRule());
      const wb = XLSX.read(await service.buildExport(), { type: "buffer" });

      assert.deepEqual(wb.SheetNames, ["KPIs", "Shows", "Fluxo de caixa", "Rateio"]);
      assert.deepEqual(XLSX.utils.sheet_to_json(wb.Sheets.Rateio), []);
      assert.equal(XLSX.utils.sheet_to_json(wb.Sheets.Shows).length, 1);
    });
  });

  it("exporta o relatório em .xlsx", async () => {
    const { service } = setup();
    const file = await service.buildExport();
    const wb = XLSX.read(file, { type: "buffer" });
    assert.deepEqual(wb.SheetNames, ["KPIs", "Shows", "Fluxo de caixa", "Rateio"]);
  });
});

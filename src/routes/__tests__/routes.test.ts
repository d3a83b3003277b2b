import { after, describe, it } from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import type { Server } from "node:http";
import * as XLSX from "xlsx";
import { createApp } from "../../app";
import { SheetSourceError } from "../../domain/errors";
import { TableCache } from "../../lib/cache";
import { ReportService } from "../../services/reportService";
import { sampleTables, withInvalidEvent } from "../../services/__tests__/financeTables";
import type { FinanceSource, FinanceTables } from "../../services/sheets/financeWorkbook";
import { tableFromRows } from "../../services/records/validateRecords";
import { InMemorySource } from "../../services/sheets/workbookSource";

const NOW = new Date("2025-03-31T12:00:00Z");

class BrokenSource implements FinanceSource {
  async readTables(): Promise<FinanceTables> {
    throw new SheetSourceError("Falha ao baixar a planilha: https://example.com/financas.xlsx");
  }
}

/** Navega num JSON sem tipo: field(body, "kpis", "totalIncome") */
function field(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== "object" || current === null) return undefined;
    current = Object.entries(current).find(([k]) => k === key)?.[1];
  }
  return current;
}

const servers: Server[] = [];
const caches: TableCache[] = [];

after(async () => {
  caches.forEach((c) => c.close());
  await Promise.all(
    servers.map(
      (s) =>
        new Promise<void>((resolve, reject) => {
          s.closeAllConnections();
          s.close((err) => (err ? reject(err) : resolve()));
        })
    )
  );
});

async function startApp(source: FinanceSource = new InMemorySource(sampleTables())): Promise<string> {
  const cache = new TableCache(60);
  caches.push(cache);

  const service = new ReportService({ source, cache, clock: () => NOW });
  const server = createApp({ service }).listen(0, "127.0.0.1");
  servers.push(server);
  await once(server, "listening");

  const address = server.address();
  assert.ok(address !== null && typeof address === "object");
  return `http://127.0.0.1:${address.port}`;
}

async function postJson(url: string, body: unknown) {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("rotas HTTP", () => {
  it("GET /health", async () => {
    const base = await startApp();
    const res = await fetch(`${base}/health`);
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { ok: true, service: "band-finance-report" });
  });

  it("GET /report/kpis", async () => {
    const base = await startApp();
    const res = await fetch(`${base}/report/kpis`);
    const body: unknown = await res.json();

    assert.equal(res.status, 200);
    assert.equal(field(body, "ok"), true);
    assert.equal(field(body, "kpis", "totalIncome"), 2000);
    assert.equal(field(body, "kpis", "currentCash"), 100);
  });

  it("GET /report/kpis com período do mês atual", async () => {
    const base = await startApp();
    const res = await fetch(`${base}/report/kpis?period=current_month`);
    const body: unknown = await res.json();

    assert.deepEqual(field(body, "period"), { start: "2025-03-01", end: "2025-03-31" });
    assert.equal(field(body, "kpis", "totalExpenses"), 900);
  });

  it("query inválida devolve 400", async () => {
    const base = await startApp();

    const badDate = await fetch(`${base}/report/kpis?start=2025-13`);
    assert.equal(badDate.status, 400);
    assert.equal(field(await badDate.json(), "error"), "Dados inválidos");

    const inverted = await fetch(`${base}/report/kpis?start=2025-03-31&end=2025-03-01`);
    assert.equal(inverted.status, 400);
    assert.deepEqual(field(await inverted.json(), "details"), [
      { path: "start", message: "start deve ser anterior ou igual a end" },
    ]);
  });

  it("GET /report/shows e /report/categories", async () => {
    const base = await startApp();

    const shows: unknown = await (await fetch(`${base}/report/shows`)).json();
    assert.equal(field(shows, "count"), 1);

    const categories: unknown = await (await fetch(`${base}/report/categories?direction=INCOME`)).json();
    assert.deepEqual(field(categories, "categories"), [{ category: "SHOWS", total: 2000 }]);
  });

  it("POST /rateio/fixed", async () => {
    const base = await startApp();
    const res = await postJson(`${base}/rateio/fixed`, { netResult: 1000 });
    const body: unknown = await res.json();

    assert.equal(res.status, 200);
    assert.equal(field(body, "netResult"), 1000);
    assert.deepEqual(field(body, "payouts"), { Alice: 600, Bob: 400 });
  });

  it("POST /rateio/category", async () => {
    const base = await startApp();
    const res = await postJson(`${base}/rateio/category`, { period: "current_month" });
    assert.deepEqual(field(await res.json(), "payouts"), { Alice: 1000, Bob: 1000 });
  });

  it("POST /rateio/validate aponta soma diferente de 100", async () => {
    const base = await startApp();
    const res = await postJson(`${base}/rateio/validate`, {
      fixed: [
        { member: "Alice", percentage: 60 },
        { member: "Bob", percentage: 30 },
      ],
    });

    assert.deepEqual(await res.json(), {
      ok: false,
      issues: [{ scope: "fixed", category: null, total: 90, message: "Percentuais ativos somam 90% (esperado 100%)" }],
    });
  });

  it("POST /rateio/validate sem regras devolve 400", async () => {
    const base = await startApp();
    const res = await postJson(`${base}/rateio/validate`, {});
    assert.equal(res.status, 400);
  });

  it("GET /report/export devolve .xlsx", async () => {
    const base = await startApp();
    const res = await fetch(`${base}/report/export`);

    assert.equal(res.status, 200);
    assert.equal(res.headers.get("content-type"), "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet");

    const wb = XLSX.read(Buffer.from(await res.arrayBuffer()), { type: "buffer" });
    assert.deepEqual(wb.SheetNames, ["KPIs", "Shows", "Fluxo de caixa", "Rateio"]);
  });

  it("planilha inválida devolve 422 com o tipo do erro", async () => {
    const base = await startApp(new InMemorySource(withInvalidEvent()));
    const res = await fetch(`${base}/report/kpis`);
    const body: unknown = await res.json();

    assert.equal(res.status, 422);
    assert.equal(field(body, "error"), "enum");
    assert.equal(field(body, "table"), "events");
  });

  it("regra de rateio inválida só afeta as rotas de rateio", async () => {
    const base = await startApp(
      new InMemorySource({
        ...sampleTables(),
        allocationRules: tableFromRows([{ member: "Alice", percentage: 150, active: "SIM" }]),
      })
    );

    const kpis = await fetch(`${base}/report/kpis`);
    assert.equal(kpis.status, 200);

    const fixed = await postJson(`${base}/rateio/fixed`, { netResult: 1000 });
    const body: unknown = await fixed.json();
    assert.equal(fixed.status, 422);
    assert.equal(field(body, "error"), "range");
    assert.equal(field(body, "table"), "allocationRules");
  });

  it("falha na origem devolve 502", async () => {
    const base = await startApp(new BrokenSource());
    const res = await fetch(`${base}/report/warnings`);

    assert.equal(res.status, 502);
    assert.equal(field(await res.json(), "error"), "sheet_source");
  });

  it("POST /cache/invalidate", async () => {
    const base = await startApp();
    await fetch(`${base}/report/kpis`);

    const res = await postJson(`${base}/cache/invalidate`, {});
    assert.deepEqual(await res.json(), { ok: true, removed: 1 });
  });
});

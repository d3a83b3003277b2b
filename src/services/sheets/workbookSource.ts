import axios from "axios";
import { readFile } from "node:fs/promises";
import { SheetSourceError } from "../../domain/errors";
import { logger } from "../../lib/logger";
import { parseFinanceWorkbook, type FinanceSource, type FinanceTables } from "./financeWorkbook";

export interface WorkbookLocation {
  url: string | null;
  path: string | null;
}

/**
 * Planilha financeira exportada como .xlsx.
 * URL (download com axios) tem prioridade sobre o arquivo local.
 */
export class WorkbookSource implements FinanceSource {
  constructor(private readonly location: WorkbookLocation) {}

  private async download(url: string): Promise<Buffer> {
    try {
      const response = await axios.get<ArrayBuffer>(url, { responseType: "arraybuffer", timeout: 30_000 });
      return Buffer.from(response.data);
    } catch (err) {
      throw new SheetSourceError(`Falha ao baixar a planilha: ${url}`, { cause: err });
    }
  }

  private async readLocal(path: string): Promise<Buffer> {
    try {
      return await readFile(path);
    } catch (err) {
      throw new SheetSourceError(`Falha ao ler a planilha: ${path}`, { cause: err });
    }
  }

  async readTables(): Promise<FinanceTables> {
    const { url, path } = this.location;

    let data: Buffer;
    if (url) {
      data = await this.download(url);
    } else if (path) {
      data = await this.readLocal(path);
    } else {
      throw new SheetSourceError("Defina FINANCE_SHEET_URL ou FINANCE_XLSX_PATH");
    }

    const tables = parseFinanceWorkbook(data);
    logger.info("Planilha financeira lida", {
      source: url ? "url" : "file",
      transactions: tables.transactions.rows.length,
      events: tables.events.rows.length,
    });
    return tables;
  }
}

/** Tabelas fixas em memória (testes e execução local sem planilha) */
export class InMemorySource implements FinanceSource {
  reads = 0;

  constructor(private tables: FinanceTables) {}

  replace(tables: FinanceTables): void {
    this.tables = tables;
  }

  async readTables(): Promise<FinanceTables> {
    this.reads += 1;
    return this.tables;
  }
}

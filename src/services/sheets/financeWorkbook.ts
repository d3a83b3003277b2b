import * as XLSX from "xlsx";
import { SheetSourceError } from "../../domain/errors";
import type { RawTable } from "../../domain/types";
import { toText } from "../../lib/normalize";

export interface FinanceTables {
  transactions: RawTable;
  events: RawTable;
  allocationRules: RawTable;
  categoryAllocations: RawTable;
}

/** Qualquer origem das quatro tabelas (planilha remota, arquivo, memória nos testes) */
export interface FinanceSource {
  readTables(): Promise<FinanceTables>;
}

// Abas da planilha
export const SHEET_NAMES = {
  transactions: "transactions",
  events: "shows",
  allocationRules: "rateio_fixo",
  categoryAllocations: "rateio_centro_custo",
} as const satisfies Record<keyof FinanceTables, string>;

const REQUIRED_SHEETS: (keyof FinanceTables)[] = ["transactions", "events"];

/**
 * Cabeçalho da planilha -> nome canônico da coluna.
 * Cabeçalhos já canônicos passam direto.
 */
export const HEADER_MAPS: Record<keyof FinanceTables, Record<string, string>> = {
  transactions: {
    data: "date",
    tipo: "direction",
    categoria: "category",
    subcategoria: "subcategory",
    descricao: "description",
    valor: "amount",
    show_id: "event_id",
    conta: "account",
  },
  events: {
    show_id: "id",
    data_show: "date",
    data: "date",
    casa: "venue",
    cidade: "city",
    publico: "attendance",
    cache_acordado: "agreed_fee",
  },
  allocationRules: {
    membro: "member",
    percentual: "percentage",
    ativo: "active",
    ativa: "active",
  },
  categoryAllocations: {
    categoria: "category",
    membro: "member",
    percentual: "percentage",
  },
};

/** "Público " -> "publico", "Show ID" -> "show_id" */
export function normalizeHeader(raw: unknown): string | null {
  const text = toText(raw);
  if (!text) return null;
  return text
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/\s+/g, "_");
}

export function sheetToTable(sheet: XLSX.WorkSheet, headerMap: Record<string, string>): RawTable {
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: false });
  const [header = [], ...body] = matrix;

  const columns = header.map((h) => {
    const key = normalizeHeader(h);
    return key ? (headerMap[key] ?? key) : null;
  });

  const rows = body.map((cells) => {
    const row: Record<string, unknown> = {};
    columns.forEach((col, i) => {
      if (col) row[col] = cells[i] ?? null;
    });
    return row;
  });

  return { columns: columns.flatMap((c) => (c ? [c] : [])), rows };
}

/** Lê as quatro abas da pasta de trabalho (.xlsx já em memória) */
export function parseFinanceWorkbook(data: Buffer): FinanceTables {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: "buffer" });
  } catch (err) {
    throw new SheetSourceError("Planilha financeira ilegível", { cause: err });
  }

  const missing = REQUIRED_SHEETS.filter((k) => !workbook.Sheets[SHEET_NAMES[k]]).map((k) => SHEET_NAMES[k]);
  if (missing.length) {
    throw new SheetSourceError(`Abas obrigatórias ausentes na planilha: ${missing.join(", ")}`);
  }

  const read = (key: keyof FinanceTables): RawTable => {
    const sheet = workbook.Sheets[SHEET_NAMES[key]];
    return sheet ? sheetToTable(sheet, HEADER_MAPS[key]) : { columns: [], rows: [] };
  };

  return {
    transactions: read("transactions"),
    events: read("events"),
    allocationRules: read("allocationRules"),
    categoryAllocations: read("categoryAllocations"),
  };
}

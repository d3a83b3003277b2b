import type { z } from "zod";
import { CATEGORY_ALIASES } from "../../domain/constants";
import {
  EnumError,
  RecordRangeError,
  RecordTypeError,
  SchemaError,
  type FieldOffense,
  type TableName,
} from "../../domain/errors";
import type { AllocationRule, CategoryAllocation, RawTable, ShowEvent, Transaction } from "../../domain/types";
import { canonicalCategory, toText } from "../../lib/normalize";
import {
  allocationRuleRowSchema,
  categoryAllocationRowSchema,
  eventRowSchema,
  transactionRowSchema,
} from "../../lib/validators";

export const TRANSACTION_REQUIRED_COLUMNS = [
  "id",
  "date",
  "direction",
  "category",
  "description",
  "amount",
  "payment_status",
];

export const EVENT_REQUIRED_COLUMNS = ["id", "date", "venue", "status"];

export const ALLOCATION_RULE_REQUIRED_COLUMNS = ["member", "percentage", "active"];

export const CATEGORY_ALLOCATION_REQUIRED_COLUMNS = ["category", "member", "percentage"];

interface FieldClasses {
  enumFields: readonly string[];
  rangeFields: readonly string[];
}

/** Monta uma RawTable a partir de linhas soltas (colunas = união das chaves) */
export function tableFromRows(rows: Record<string, unknown>[]): RawTable {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return { columns: [...columns], rows };
}

/**
 * Valida a tabela inteira contra o schema da linha.
 * Ordem: colunas -> enumerações -> tipos -> intervalos. A primeira classe
 * com problemas é lançada com todas as ocorrências daquela classe.
 */
function parseTable<S extends z.ZodTypeAny>(
  name: TableName,
  table: RawTable,
  requiredColumns: readonly string[],
  schema: S,
  classes: FieldClasses
): z.output<S>[] {
  if (table.rows.length === 0) return [];

  const present = new Set(table.columns);
  const missing = requiredColumns.filter((c) => !present.has(c));
  if (missing.length) throw new SchemaError(name, missing);

  const enumOffenses: FieldOffense[] = [];
  const typeOffenses: FieldOffense[] = [];
  const rangeOffenses: FieldOffense[] = [];
  const parsed: z.output<S>[] = [];

  for (const row of table.rows) {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
      continue;
    }

    const rowId = toText(row.id);
    const seen = new Set<string>();

    for (const issue of result.error.issues) {
      const field = String(issue.path[0] ?? "");
      if (seen.has(field)) continue;
      seen.add(field);

      const offense: FieldOffense = { field, rowId, value: row[field] ?? null };

      if (classes.enumFields.includes(field)) {
        enumOffenses.push(offense);
      } else if (classes.rangeFields.includes(field) && (issue.code === "too_small" || issue.code === "too_big")) {
        rangeOffenses.push(offense);
      } else {
        typeOffenses.push(offense);
      }
    }
  }

  if (enumOffenses.length) throw new EnumError(name, enumOffenses);
  if (typeOffenses.length) throw new RecordTypeError(name, typeOffenses);
  if (rangeOffenses.length) throw new RecordRangeError(name, rangeOffenses);

  return parsed;
}

export interface CategoryValidationOptions {
  categoryAliases?: Record<string, string[]>;
}

export function validateTransactions(table: RawTable, options: CategoryValidationOptions = {}): Transaction[] {
  const aliases = options.categoryAliases ?? CATEGORY_ALIASES;

  const rows = parseTable("transactions", table, TRANSACTION_REQUIRED_COLUMNS, transactionRowSchema, {
    enumFields: ["direction", "payment_status"],
    rangeFields: [],
  });

  return rows.map((row): Transaction => ({ ...row, category: canonicalCategory(row.category, aliases) }));
}

export function validateEvents(table: RawTable): ShowEvent[] {
  const rows: ShowEvent[] = parseTable("events", table, EVENT_REQUIRED_COLUMNS, eventRowSchema, {
    enumFields: ["status"],
    rangeFields: ["attendance", "agreed_fee"],
  });
  return rows;
}

export function validateAllocationRules(table: RawTable): AllocationRule[] {
  const rows = parseTable("allocationRules", table, ALLOCATION_RULE_REQUIRED_COLUMNS, allocationRuleRowSchema, {
    enumFields: [],
    rangeFields: ["percentage"],
  });
  return rows.map((row): AllocationRule => ({ ...row, method: "fixed" }));
}

/** Mesma normalização de categoria das transações, para o join do rateio */
export function validateCategoryAllocations(
  table: RawTable,
  options: CategoryValidationOptions = {}
): CategoryAllocation[] {
  const aliases = options.categoryAliases ?? CATEGORY_ALIASES;

  const rows = parseTable(
    "categoryAllocations",
    table,
    CATEGORY_ALLOCATION_REQUIRED_COLUMNS,
    categoryAllocationRowSchema,
    { enumFields: [], rangeFields: ["percentage"] }
  );
  return rows.map(
    (row): CategoryAllocation => ({ ...row, category: canonicalCategory(row.category, aliases) ?? row.category })
  );
}

import { ALLOCATION_TOTAL_TOLERANCE } from "../../domain/constants";
import type { AllocationRule, CategoryAllocation, ShowEvent, Transaction } from "../../domain/types";
import { canonicalCategory } from "../../lib/normalize";
import { roundMoney } from "../money";

export interface AllocationTotalIssue {
  scope: "fixed" | "category";
  category: string | null;
  total: number;
  message: string;
}

/**
 * Checagem feita ao gravar as regras: percentuais ativos devem somar 100.
 * Os motores de rateio não repetem essa checagem.
 */
export function checkAllocationRuleTotals(
  rules: readonly Pick<AllocationRule, "member" | "percentage" | "active">[]
): AllocationTotalIssue[] {
  const total = roundMoney(
    rules.filter((r) => r.active).reduce((acc, r) => acc + r.percentage, 0),
    4
  );

  if (Math.abs(total - 100) <= ALLOCATION_TOTAL_TOLERANCE) return [];

  return [
    {
      scope: "fixed",
      category: null,
      total,
      message: `Percentuais ativos somam ${total}% (esperado 100%)`,
    },
  ];
}

/** Grafias antigas da mesma categoria somam juntas */
export function checkCategoryAllocationTotals(rows: readonly CategoryAllocation[]): AllocationTotalIssue[] {
  const byCategory = new Map<string, number>();
  for (const row of rows) {
    const category = canonicalCategory(row.category) ?? row.category;
    byCategory.set(category, (byCategory.get(category) ?? 0) + row.percentage);
  }

  const issues: AllocationTotalIssue[] = [];
  for (const [category, sum] of byCategory) {
    const total = roundMoney(sum, 4);
    if (Math.abs(total - 100) > ALLOCATION_TOTAL_TOLERANCE) {
      issues.push({
        scope: "category",
        category,
        total,
        message: `Categoria ${category}: percentuais somam ${total}% (esperado 100%)`,
      });
    }
  }
  return issues;
}

export type IntegrityWarningCode =
  | "duplicate_transaction_id"
  | "duplicate_event_id"
  | "unknown_event_reference"
  | "completed_without_attendance";

export interface IntegrityWarning {
  code: IntegrityWarningCode;
  message: string;
  ids: string[];
}

function duplicates(ids: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) repeated.add(id);
    seen.add(id);
  }
  return [...repeated].sort();
}

/** Avisos que não impedem o cálculo, mas merecem revisão na planilha */
export function collectIntegrityWarnings(
  transactions: readonly Transaction[],
  events: readonly ShowEvent[]
): IntegrityWarning[] {
  const warnings: IntegrityWarning[] = [];

  const dupTx = duplicates(transactions.map((t) => t.id));
  if (dupTx.length) {
    warnings.push({
      code: "duplicate_transaction_id",
      message: `${dupTx.length} id(s) de transação repetido(s)`,
      ids: dupTx,
    });
  }

  const dupEvents = duplicates(events.map((e) => e.id));
  if (dupEvents.length) {
    warnings.push({
      code: "duplicate_event_id",
      message: `${dupEvents.length} id(s) de show repetido(s)`,
      ids: dupEvents,
    });
  }

  const eventIds = new Set(events.map((e) => e.id));
  const orphans = transactions.filter((t) => t.event_id && !eventIds.has(t.event_id)).map((t) => t.id);
  if (orphans.length) {
    warnings.push({
      code: "unknown_event_reference",
      message: `${orphans.length} transação(ões) apontam para show inexistente`,
      ids: orphans,
    });
  }

  const noAttendance = events.filter((e) => e.status === "COMPLETED" && e.attendance === null).map((e) => e.id);
  if (noAttendance.length) {
    warnings.push({
      code: "completed_without_attendance",
      message: `${noAttendance.length} show(s) realizado(s) sem público informado`,
      ids: noAttendance,
    });
  }

  return warnings;
}

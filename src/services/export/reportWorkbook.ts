import * as XLSX from "xlsx";
import type {
  AllocationResult,
  CategoryAllocationLine,
  EventProfitability,
  KpiExplanation,
  MonthlyCashFlow,
  Period,
} from "../../domain/types";
import { formatMoney } from "../money";
import { formatPercentageChange } from "../safeMath";

export interface ReportExportInput {
  period: Period | null;
  explanations: KpiExplanation[];
  shows: EventProfitability[];
  cashFlow: MonthlyCashFlow;
  fixedPayouts: AllocationResult;
  categoryLines: CategoryAllocationLine[];
}

export const EXPORT_SHEETS = {
  kpis: "KPIs",
  shows: "Shows",
  cashFlow: "Fluxo de caixa",
  allocation: "Rateio",
} as const;

function displayValue(e: KpiExplanation): string {
  if (e.unit === "R$") return formatMoney(e.value);
  if (e.unit === "%") return formatPercentageChange(e.value, 1, false);
  return Number.isInteger(e.value) ? String(e.value) : e.value.toFixed(1);
}

function kpiRows(input: ReportExportInput) {
  const periodLabel = input.period ? `${input.period.start} a ${input.period.end}` : "Todo o período";
  return [
    { indicador: "Período", valor: null, exibicao: periodLabel, formula: null },
    ...input.explanations.map((e) => ({
      indicador: e.label,
      valor: e.value,
      exibicao: displayValue(e),
      formula: e.formula,
    })),
  ];
}

function showRows(shows: EventProfitability[]) {
  return shows.map((s) => ({
    show_id: s.eventId,
    data: s.date,
    casa: s.venue,
    cidade: s.city,
    publico: s.attendance,
    receita: s.recognizedRevenue,
    despesa: s.eventExpense,
    resultado: s.netResult,
    margem: formatPercentageChange(s.margin, 1, false),
  }));
}

function cashFlowRows(cashFlow: MonthlyCashFlow) {
  return cashFlow.rows.map((r) => ({
    mes: r.month,
    entradas: r.income,
    saidas: r.expense,
    saldo: r.balance,
    projecao: r.projection,
    variacao: formatPercentageChange(r.balanceChangePct),
  }));
}

function allocationRows(fixed: AllocationResult, lines: CategoryAllocationLine[]) {
  return [
    ...Object.entries(fixed).map(([member, amount]) => ({
      modelo: "fixo",
      categoria: null,
      membro: member,
      percentual: null,
      valor: amount,
      exibicao: formatMoney(amount),
    })),
    ...lines.map((l) => ({
      modelo: "centro de custo",
      categoria: l.category,
      membro: l.member,
      percentual: l.percentage,
      valor: l.amount,
      exibicao: formatMoney(l.amount),
    })),
  ];
}

/** Monta o .xlsx do relatório (uma aba por bloco) */
export function buildReportWorkbook(input: ReportExportInput): Buffer {
  const wb = XLSX.utils.book_new();

  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(kpiRows(input)), EXPORT_SHEETS.kpis);
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(showRows(input.shows)), EXPORT_SHEETS.shows);
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(cashFlowRows(input.cashFlow)), EXPORT_SHEETS.cashFlow);
  XLSX.utils.book_append_sheet(
    wb,
    XLSX.utils.json_to_sheet(allocationRows(input.fixedPayouts, input.categoryLines)),
    EXPORT_SHEETS.allocation
  );

  const out: unknown = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(out)) throw new Error("Falha ao gerar o arquivo .xlsx");
  return out;
}

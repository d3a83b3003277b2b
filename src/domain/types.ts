// Tipos de domínio do relatório financeiro da banda.
// Campos de registro seguem as colunas da planilha; resultados calculados usam camelCase.

export type Direction = "INCOME" | "EXPENSE";

export type PaymentStatus = "PAID" | "UNRECEIVED" | "REVERSED";

export type EventStatus = "PLANNED" | "CONFIRMED" | "COMPLETED" | "CANCELLED";

/** YYYY-MM-DD */
export type ISODate = string;

export interface Transaction {
  id: string;
  date: ISODate;
  direction: Direction;
  category: string | null; // obrigatório para EXPENSE
  subcategory: string | null;
  description: string;
  amount: number; // sempre positivo; o sinal vem de direction
  event_id: string | null;
  payment_status: PaymentStatus;
  account: string | null;
}

export interface ShowEvent {
  id: string;
  date: ISODate;
  venue: string;
  city: string | null;
  status: EventStatus;
  attendance: number | null;
  agreed_fee: number | null;
}

export interface AllocationRule {
  member: string;
  percentage: number; // 0-100
  active: boolean;
  method: "fixed";
}

export interface CategoryAllocation {
  category: string;
  member: string;
  percentage: number; // 0-100
}

/** Tabela crua vinda da planilha (colunas já renomeadas para os nomes canônicos) */
export interface RawTable {
  columns: string[];
  rows: Record<string, unknown>[];
}

export interface KpiSet {
  completedEventCount: number;
  totalIncome: number;
  averageIncomePerEvent: number;
  totalMusicianPayout: number;
  totalExpenses: number;
  currentCash: number;
  receivable: number;
  totalAttendance: number;
  averageAttendance: number;
  cashToIncomeRatioPct: number;
  estimatedCash: number;
  completedEventsWithoutPaidIncome: number;
  attendanceScore: number;
  averageMonthlyFixedExpenses: number;
}

export type KpiKey = keyof KpiSet;

export interface KpiSettings {
  musicianPayoutCategories: readonly string[];
  fixedExpenseCategories: readonly string[];
  attendanceTarget: number; // público por show
  attendanceWindowDays: number;
}

export interface KpiExplanation {
  key: KpiKey;
  value: number;
  label: string;
  explanation: string;
  formula: string;
  unit: string;
}

export interface EventProfitability {
  eventId: string;
  date: ISODate;
  venue: string;
  city: string | null;
  attendance: number | null;
  recognizedRevenue: number;
  eventExpense: number;
  netResult: number;
  margin: number | null; // % ou null quando a receita é desprezível
  profitPerAttendee: number;
}

export interface MonthlyCashFlowRow {
  month: string; // YYYY-MM
  income: number;
  expense: number;
  balance: number;
  projection: number;
  balanceChangePct: number | null;
}

export interface MonthlyCashFlow {
  rows: MonthlyCashFlowRow[];
  reliableTrend: boolean;
}

export interface CategoryTotal {
  category: string;
  total: number;
}

/** membro -> valor a receber (negativo = rateio de custo) */
export type AllocationResult = Record<string, number>;

export interface CategoryAllocationLine {
  category: string;
  member: string;
  percentage: number;
  categoryTotal: number;
  amount: number;
}

export interface Period {
  start: ISODate;
  end: ISODate;
}

import { DEFAULT_KPI_SETTINGS } from "../domain/constants";
import type {
  CategoryTotal,
  Direction,
  EventProfitability,
  ISODate,
  KpiExplanation,
  KpiKey,
  KpiSet,
  KpiSettings,
  MonthlyCashFlow,
  MonthlyCashFlowRow,
  ShowEvent,
  Transaction,
} from "../domain/types";
import { canonicalCategory, shiftDays } from "../lib/normalize";
import { roundMoney } from "./money";
import { calculateMarginSafely, isReliableTrend, safeDivide, safePercentage, safePercentageChange } from "./safeMath";

export interface KpiOptions {
  periodStart?: ISODate | null;
  periodEnd?: ISODate | null;
  now?: Date;
  settings?: KpiSettings;
}

/* =========================
   Helpers
========================= */

const isPaid = (t: Transaction) => t.payment_status === "PAID";
const isPaidIncome = (t: Transaction) => t.direction === "INCOME" && isPaid(t);
const isPaidExpense = (t: Transaction) => t.direction === "EXPENSE" && isPaid(t);

function sumAmount(rows: readonly Transaction[]): number {
  return roundMoney(rows.reduce((acc, t) => acc + t.amount, 0));
}

function inRange(date: ISODate, start: ISODate, end: ISODate) {
  return date >= start && date <= end;
}

/** Filtra pelas datas só quando os dois limites foram informados (inclusivo) */
export function filterByPeriod<T extends { date: ISODate }>(
  rows: readonly T[],
  start?: ISODate | null,
  end?: ISODate | null
): T[] {
  if (!start || !end) return [...rows];
  return rows.filter((r) => inRange(r.date, start, end));
}

function monthOf(date: ISODate): string {
  return date.slice(0, 7);
}

/* =========================
   KPIs
========================= */

/**
 * Índice de público (0-100) dos shows realizados na janela recente.
 * média de público * shows por mês, relativo à meta por show.
 */
export function computeAttendanceScore(
  events: readonly ShowEvent[],
  now: Date,
  settings: Pick<KpiSettings, "attendanceTarget" | "attendanceWindowDays">
): number {
  const since = shiftDays(now, -settings.attendanceWindowDays);
  const recent = events.filter((e) => e.status === "COMPLETED" && e.date >= since);
  if (!recent.length) return 0;

  const known = recent.flatMap((e) => (e.attendance === null ? [] : [e.attendance]));
  const mean = safeDivide(
    known.reduce((acc, n) => acc + n, 0),
    known.length
  );

  const months = settings.attendanceWindowDays / 30;
  const frequency = safeDivide(recent.length, months);

  const score = safePercentage(mean * frequency, settings.attendanceTarget);
  return Math.min(100, score);
}

// lista configurada e lançamento comparados na grafia canônica
function inCategories(categories: readonly string[]): (t: Transaction) => boolean {
  const wanted = new Set(categories.map((c) => canonicalCategory(c) ?? c));
  return (t) => {
    const category = canonicalCategory(t.category);
    return category !== null && wanted.has(category);
  };
}

/** Média, entre os meses com lançamento, das despesas fixas pagas */
export function computeAverageMonthlyFixedExpenses(
  transactions: readonly Transaction[],
  fixedCategories: readonly string[]
): number {
  const byMonth = new Map<string, number>();
  const isFixed = inCategories(fixedCategories);

  for (const t of transactions) {
    if (!isPaidExpense(t) || !isFixed(t)) continue;
    const month = monthOf(t.date);
    byMonth.set(month, (byMonth.get(month) ?? 0) + t.amount);
  }

  if (!byMonth.size) return 0;

  const total = [...byMonth.values()].reduce((acc, v) => acc + v, 0);
  return total / byMonth.size;
}

export function computeKpis(
  transactions: readonly Transaction[],
  events: readonly ShowEvent[],
  options: KpiOptions = {}
): KpiSet {
  const settings = options.settings ?? DEFAULT_KPI_SETTINGS;
  const now = options.now ?? new Date();

  const tx = filterByPeriod(transactions, options.periodStart, options.periodEnd);
  const shows = filterByPeriod(events, options.periodStart, options.periodEnd);

  const completed = shows.filter((e) => e.status === "COMPLETED");
  const paidIncome = tx.filter(isPaidIncome);
  const paidExpense = tx.filter(isPaidExpense);

  const completedEventCount = completed.length;
  const totalIncome = sumAmount(paidIncome);
  const averageIncomePerEvent = safeDivide(totalIncome, completedEventCount);

  const totalMusicianPayout = sumAmount(paidExpense.filter(inCategories(settings.musicianPayoutCategories)));

  const totalExpenses = sumAmount(paidExpense);
  const currentCash = roundMoney(totalIncome - totalExpenses);

  const receivable = sumAmount(
    tx.filter((t) => t.direction === "INCOME" && t.payment_status === "UNRECEIVED")
  );

  const totalAttendance = completed.reduce((acc, e) => acc + (e.attendance ?? 0), 0);
  const averageAttendance = safeDivide(totalAttendance, completedEventCount);

  const cashToIncomeRatioPct = safePercentage(currentCash, totalIncome);

  const confirmedFees = shows
    .filter((e) => e.status === "CONFIRMED")
    .reduce((acc, e) => acc + (e.agreed_fee ?? 0), 0);
  const estimatedCash = roundMoney(currentCash + confirmedFees);

  const paidEventIds = new Set(paidIncome.flatMap((t) => (t.event_id ? [t.event_id] : [])));
  const completedEventsWithoutPaidIncome = completed.filter((e) => !paidEventIds.has(e.id)).length;

  const attendanceScore = computeAttendanceScore(shows, now, settings);
  const averageMonthlyFixedExpenses = computeAverageMonthlyFixedExpenses(tx, settings.fixedExpenseCategories);

  return {
    completedEventCount,
    totalIncome,
    averageIncomePerEvent,
    totalMusicianPayout,
    totalExpenses,
    currentCash,
    receivable,
    totalAttendance,
    averageAttendance,
    cashToIncomeRatioPct,
    estimatedCash,
    completedEventsWithoutPaidIncome,
    attendanceScore,
    averageMonthlyFixedExpenses,
  };
}

/* =========================
   Lucratividade por show
========================= */

/**
 * Resultado de cada show REALIZADO. Receita só é reconhecida na realização,
 * então shows planejados/confirmados não aparecem.
 * Ordenado por data desc, casa asc.
 */
export function computeEventProfitability(
  events: readonly ShowEvent[],
  transactions: readonly Transaction[]
): EventProfitability[] {
  const revenue = new Map<string, number>();
  const expense = new Map<string, number>();

  for (const t of transactions) {
    if (!t.event_id || !isPaid(t)) continue;
    const target = t.direction === "INCOME" ? revenue : expense;
    target.set(t.event_id, (target.get(t.event_id) ?? 0) + t.amount);
  }

  const rows = events
    .filter((e) => e.status === "COMPLETED")
    .map((e): EventProfitability => {
      const recognizedRevenue = roundMoney(revenue.get(e.id) ?? 0);
      const eventExpense = roundMoney(expense.get(e.id) ?? 0);
      const netResult = roundMoney(recognizedRevenue - eventExpense);

      return {
        eventId: e.id,
        date: e.date,
        venue: e.venue,
        city: e.city,
        attendance: e.attendance,
        recognizedRevenue,
        eventExpense,
        netResult,
        margin: calculateMarginSafely(recognizedRevenue, eventExpense),
        profitPerAttendee: safeDivide(netResult, e.attendance ?? 0),
      };
    });

  return rows.sort((a, b) => {
    if (a.date !== b.date) return a.date < b.date ? 1 : -1;
    return a.venue.localeCompare(b.venue);
  });
}

/* =========================
   Explicações dos KPIs
========================= */

const KPI_TEXTS: Record<KpiKey, Omit<KpiExplanation, "key" | "value">> = {
  completedEventCount: {
    label: "Shows realizados",
    explanation: "Número de shows com status REALIZADO no período",
    formula: 'COUNT(shows.status == "COMPLETED")',
    unit: "shows",
  },
  totalIncome: {
    label: "Entradas",
    explanation: "Soma de todas as entradas com status PAGO",
    formula: "SUM(entradas pagas)",
    unit: "R$",
  },
  averageIncomePerEvent: {
    label: "Receita média por show",
    explanation: "Média de receita por show realizado",
    formula: "totalIncome / completedEventCount",
    unit: "R$",
  },
  totalMusicianPayout: {
    label: "Cachês de músicos",
    explanation: "Total pago em cachês para músicos",
    formula: "SUM(saídas pagas na categoria de cachês)",
    unit: "R$",
  },
  totalExpenses: {
    label: "Saídas",
    explanation: "Total de todas as despesas pagas",
    formula: "SUM(saídas pagas)",
    unit: "R$",
  },
  currentCash: {
    label: "Caixa atual",
    explanation: "Saldo atual: entradas pagas - saídas pagas",
    formula: "totalIncome - totalExpenses",
    unit: "R$",
  },
  receivable: {
    label: "A receber",
    explanation: "Valor total de entradas com status NÃO RECEBIDO",
    formula: "SUM(entradas não recebidas)",
    unit: "R$",
  },
  totalAttendance: {
    label: "Público total",
    explanation: "Total de público em todos os shows realizados",
    formula: "SUM(shows realizados.publico)",
    unit: "pessoas",
  },
  averageAttendance: {
    label: "Público médio",
    explanation: "Média de público por show realizado",
    formula: "totalAttendance / completedEventCount",
    unit: "pessoas",
  },
  cashToIncomeRatioPct: {
    label: "Caixa / entradas",
    explanation: "Percentual do caixa em relação às entradas totais",
    formula: "(currentCash / totalIncome) * 100",
    unit: "%",
  },
  estimatedCash: {
    label: "Caixa estimado",
    explanation: "Caixa atual + cachês de shows CONFIRMADOS",
    formula: "currentCash + SUM(shows confirmados.cache_acordado)",
    unit: "R$",
  },
  completedEventsWithoutPaidIncome: {
    label: "Shows sem recebimento",
    explanation: "Shows realizados sem recebimento registrado",
    formula: "COUNT(shows realizados sem entrada paga vinculada)",
    unit: "shows",
  },
  attendanceScore: {
    label: "Índice de público",
    explanation: "Índice de performance de público (0-100)",
    formula: "(público médio * shows por mês) / meta de público * 100",
    unit: "pontos",
  },
  averageMonthlyFixedExpenses: {
    label: "Despesas fixas / mês",
    explanation: "Média mensal de despesas fixas",
    formula: "MÉDIA(despesas fixas agrupadas por mês)",
    unit: "R$",
  },
};

const KPI_ORDER: KpiKey[] = [
  "completedEventCount",
  "totalIncome",
  "averageIncomePerEvent",
  "totalMusicianPayout",
  "totalExpenses",
  "currentCash",
  "receivable",
  "totalAttendance",
  "averageAttendance",
  "cashToIncomeRatioPct",
  "estimatedCash",
  "completedEventsWithoutPaidIncome",
  "attendanceScore",
  "averageMonthlyFixedExpenses",
];

export function explainKpis(kpis: KpiSet): KpiExplanation[] {
  return KPI_ORDER.map((key) => ({ key, value: kpis[key], ...KPI_TEXTS[key] }));
}

/* =========================
   Fluxo de caixa mensal
========================= */

export function computeMonthlyCashFlow(transactions: readonly Transaction[]): MonthlyCashFlow {
  const months = new Map<string, { income: number; expense: number }>();

  for (const t of transactions) {
    if (!isPaid(t)) continue;
    const key = monthOf(t.date);
    const bucket = months.get(key) ?? { income: 0, expense: 0 };
    if (t.direction === "INCOME") bucket.income += t.amount;
    else bucket.expense += t.amount;
    months.set(key, bucket);
  }

  const ordered = [...months.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const balances = ordered.map(([, v]) => roundMoney(v.income - v.expense));
  const withProjection = ordered.length >= 3;

  const rows = ordered.map(([month, v], i): MonthlyCashFlowRow => {
    const balance = balances[i];
    const recent = balances.slice(Math.max(0, i - 2), i + 1);
    const projection = withProjection ? recent.reduce((acc, b) => acc + b, 0) / recent.length : balance;

    return {
      month,
      income: roundMoney(v.income),
      expense: roundMoney(v.expense),
      balance,
      projection,
      balanceChangePct: i === 0 ? null : safePercentageChange(balance, balances[i - 1]),
    };
  });

  return { rows, reliableTrend: isReliableTrend(balances) };
}

/* =========================
   Distribuição por categoria
========================= */

export const UNCATEGORIZED = "SEM CATEGORIA";

export function computeCategoryDistribution(
  transactions: readonly Transaction[],
  direction: Direction = "EXPENSE"
): CategoryTotal[] {
  const totals = new Map<string, number>();

  for (const t of transactions) {
    if (t.direction !== direction || !isPaid(t)) continue;
    const category = t.category ?? UNCATEGORIZED;
    totals.set(category, (totals.get(category) ?? 0) + t.amount);
  }

  return [...totals.entries()]
    .map(([category, total]) => ({ category, total: roundMoney(total) }))
    .sort((a, b) => b.total - a.total || a.category.localeCompare(b.category));
}

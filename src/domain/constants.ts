import type { Direction, EventStatus, KpiSettings, PaymentStatus } from "./types";

export const DIRECTIONS = ["INCOME", "EXPENSE"] as const satisfies readonly Direction[];

export const PAYMENT_STATUSES = ["PAID", "UNRECEIVED", "REVERSED"] as const satisfies readonly PaymentStatus[];

export const EVENT_STATUSES = [
  "PLANNED",
  "CONFIRMED",
  "COMPLETED",
  "CANCELLED",
] as const satisfies readonly EventStatus[];

/**
 * Grafias aceitas na planilha -> valor canônico.
 * Consultado uma única vez, na validação de entrada.
 */
export const DIRECTION_ALIASES: Record<string, Direction> = {
  ENTRADA: "INCOME",
  SAIDA: "EXPENSE",
  "SAÍDA": "EXPENSE",
  INCOME: "INCOME",
  EXPENSE: "EXPENSE",
};

export const PAYMENT_STATUS_ALIASES: Record<string, PaymentStatus> = {
  PAGO: "PAID",
  "NÃO RECEBIDO": "UNRECEIVED",
  "NAO RECEBIDO": "UNRECEIVED",
  ESTORNADO: "REVERSED",
  PAID: "PAID",
  UNRECEIVED: "UNRECEIVED",
  REVERSED: "REVERSED",
};

export const EVENT_STATUS_ALIASES: Record<string, EventStatus> = {
  PLANEJADO: "PLANNED",
  CONFIRMADO: "CONFIRMED",
  REALIZADO: "COMPLETED",
  CANCELADO: "CANCELLED",
  PLANNED: "PLANNED",
  CONFIRMED: "CONFIRMED",
  COMPLETED: "COMPLETED",
  CANCELLED: "CANCELLED",
};

export const MUSICIAN_PAYOUT_CATEGORY = "CACHÊS-MÚSICOS";

/** categoria canônica -> grafias históricas */
export const CATEGORY_ALIASES: Record<string, string[]> = {
  [MUSICIAN_PAYOUT_CATEGORY]: ["PAYOUT_MUSICOS", "CACHES-MUSICOS", "CACHÊ MÚSICOS"],
};

export const FIXED_EXPENSE_CATEGORIES = [
  "ALUGUEL",
  "INTERNET",
  "ENERGIA",
  "ÁGUA",
  "MANUTENÇÃO",
  "ASSINATURAS",
  "SEGURO",
];

export const DEFAULT_KPI_SETTINGS: KpiSettings = {
  musicianPayoutCategories: [MUSICIAN_PAYOUT_CATEGORY, "PAYOUT_MUSICOS"],
  fixedExpenseCategories: FIXED_EXPENSE_CATEGORIES,
  attendanceTarget: 100,
  attendanceWindowDays: 90,
};

// tolerância para a soma dos percentuais de rateio
export const ALLOCATION_TOTAL_TOLERANCE = 0.01;

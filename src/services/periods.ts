import type { Period } from "../domain/types";
import { shiftDays, toISODateOnly } from "../lib/normalize";

// Filtros de período do relatório
export const PERIOD_PRESETS = [
  "current_month",
  "previous_month",
  "last_6_months",
  "current_year",
  "previous_year",
  "all",
] as const;

export type PeriodPreset = (typeof PERIOD_PRESETS)[number];

/**
 * Datas de início e fim de um período nomeado, relativas a `now` (UTC).
 * "all" devolve null (todo o período, sem filtro).
 */
export function resolvePeriod(preset: PeriodPreset, now: Date = new Date()): Period | null {
  const y = now.getUTCFullYear();
  const m = now.getUTCMonth();
  const today = toISODateOnly(now);

  switch (preset) {
    case "current_month":
      return { start: toISODateOnly(new Date(Date.UTC(y, m, 1))), end: today };
    case "previous_month":
      return {
        start: toISODateOnly(new Date(Date.UTC(y, m - 1, 1))),
        end: toISODateOnly(new Date(Date.UTC(y, m, 0))),
      };
    case "last_6_months":
      return { start: shiftDays(now, -180), end: today };
    case "current_year":
      return { start: `${y}-01-01`, end: today };
    case "previous_year":
      return { start: `${y - 1}-01-01`, end: `${y - 1}-12-31` };
    case "all":
      return null;
  }
}

/**
 * Período efetivo de uma requisição: start/end explícitos têm prioridade
 * sobre o preset; só filtra quando os dois limites existem.
 */
export function pickPeriod(
  params: { start?: string; end?: string; period?: PeriodPreset },
  now: Date = new Date()
): Period | null {
  if (params.start && params.end) return { start: params.start, end: params.end };
  if (params.period) return resolvePeriod(params.period, now);
  return null;
}

/**
 * Aritmética segura para indicadores financeiros.
 *
 * Nenhuma função lança: resultados não confiáveis (denominador ~0,
 * variação extrema sobre base pequena) viram `null` ou o valor padrão.
 */

export function safeDivide(
  numerator: number,
  denominator: number,
  fallback = 0,
  minThreshold = 0.01
): number {
  if (!(Math.abs(denominator) >= minThreshold)) return fallback;

  const result = numerator / denominator;
  return Number.isFinite(result) ? result : fallback;
}

export function safePercentage(part: number, total: number, fallback = 0, minThreshold = 0.01): number {
  return safeDivide(part, total, fallback, minThreshold) * 100;
}

/**
 * Variação percentual de `previous` para `current`, limitada a [capMin, capMax].
 *
 * Retorna 0 quando os dois valores são ~0 e `null` quando a base não permite
 * uma leitura confiável:
 * - `previous` abaixo de `minThreshold`;
 * - queda para ~0 a partir de uma base menor que 10;
 * - variação acima de 99,9% a partir de uma base menor que 10.
 */
export function safePercentageChange(
  current: number,
  previous: number,
  minThreshold = 0.01,
  capMin = -100,
  capMax = 1000
): number | null {
  const absCurrent = Math.abs(current);
  const absPrevious = Math.abs(previous);

  if (absCurrent < minThreshold && absPrevious < minThreshold) return 0;
  if (absPrevious < minThreshold) return null;
  if (absCurrent < minThreshold && absPrevious < 10) return null;

  const pct = ((current - previous) / absPrevious) * 100;
  if (!Number.isFinite(pct)) return null;

  if (Math.abs(pct) > 99.9 && absPrevious < 10) return null;

  return Math.max(capMin, Math.min(capMax, pct));
}

/** ((receita - despesa) / |receita|) * 100, ou null se a receita for desprezível */
export function calculateMarginSafely(
  revenue: number,
  expenses: number,
  minRevenueThreshold = 0.01
): number | null {
  if (!(Math.abs(revenue) >= minRevenueThreshold)) return null;

  const margin = ((revenue - expenses) / Math.abs(revenue)) * 100;
  return Number.isFinite(margin) ? margin : null;
}

export function isReliableTrend(
  values: readonly number[],
  minValues = 2,
  minValueThreshold = 1
): boolean {
  const significant = values.filter((v) => Math.abs(v) >= minValueThreshold);
  return significant.length >= minValues;
}

/** 15.5 -> "+15.5%", null -> "N/A" */
export function formatPercentageChange(value: number | null, decimals = 1, showPlus = true): string {
  if (value === null || !Number.isFinite(value)) return "N/A";

  const sign = value >= 0 && showPlus ? "+" : "";
  return `${sign}${value.toFixed(decimals)}%`;
}

/**
 * Conversão entre o texto monetário da planilha (padrão BR) e number.
 */

/**
 * Converte "R$ 1.234,56" / "1.234,56" / "1234.56" para number.
 * Nunca lança: vazio, null ou lixo viram 0.
 */
export function parseMoney(raw: unknown): number {
  if (raw === null || raw === undefined || raw === "") return 0;
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : 0;

  let s = String(raw)
    .replace(/\u00a0/g, "")
    .replace(/[^\d.,-]/g, "");

  // com vírgula: ponto é milhar
  if (s.includes(",")) {
    s = s.replace(/\./g, "").replace(",", ".");
  }

  if (!s) return 0;
  const n = Number(s);
  return Number.isFinite(n) ? n : 0;
}

/** 1234.5 -> "R$ 1.234,50" */
export function formatMoney(value: number): string {
  // a partir de 1e21 toFixed usa notação exponencial
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return `R$ ${value}`;

  const [intPart, decPart] = Math.abs(value).toFixed(2).split(".");
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ".");
  const sign = value < 0 && Number(value.toFixed(2)) !== 0 ? "-" : "";
  return `R$ ${sign}${grouped},${decPart}`;
}

export function roundMoney(value: number, decimals = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

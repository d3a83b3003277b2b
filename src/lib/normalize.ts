import * as XLSX from "xlsx";
import { CATEGORY_ALIASES } from "../domain/constants";

/**
 * Normaliza textos vindos da planilha:
 * - trim()
 * - colapsa espaços múltiplos
 * - null se vazio
 */
export function toText(v: unknown): string | null {
  if (v === null || v === undefined) return null;
  const s = String(v).trim();
  return s.length ? s.replace(/\s+/g, " ") : null;
}

/** "SIM", "Ativo", "true", "1", "x"... -> true */
export function parseBool(v: unknown): boolean {
  if (typeof v === "boolean") return v;
  const s = String(v ?? "").trim().toLowerCase();
  return ["sim", "s", "ativo", "ok", "true", "1", "y", "yes", "x"].includes(s);
}

/** "PAGO " / "pago" -> "PAGO", aplicando o mapa de grafias */
export function resolveAlias(aliases: Record<string, string>, v: unknown): unknown {
  if (typeof v !== "string") return v;
  const key = v.trim().toUpperCase();
  return Object.prototype.hasOwnProperty.call(aliases, key) ? aliases[key] : v;
}

/**
 * Normaliza categoria usando o mapa de grafias:
 * - procura a grafia no dicionário
 * - se encontrar, retorna a chave canônica
 * - se não, retorna o valor original
 */
export function canonicalCategory(
  raw: string | null,
  aliases: Record<string, string[]> = CATEGORY_ALIASES
): string | null {
  if (!raw) return null;

  for (const [canon, variants] of Object.entries(aliases)) {
    if (canon === raw) return canon;
    if (variants.includes(raw)) return canon;
  }
  return raw;
}

/**
 * Converte valores de data vindos do XLSX para "YYYY-MM-DD" ou null.
 * Pode vir como:
 * - string ("2025-01-10", "10/01/2025")
 * - número serial do Excel
 * - Date
 */
export function toDateISO(value: unknown): string | null {
  if (value === null || value === undefined || value === "") return null;

  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
  }

  // Excel serial number
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    const parsed = XLSX.SSF.parse_date_code(value);
    if (!parsed) return null;
    return isoFromParts(parsed.y, parsed.m, parsed.d);
  }

  const s = String(value).trim();
  if (!s) return null;

  // ISO, com ou sem horário
  const iso = s.match(/^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/);
  if (iso) return isoFromParts(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  // dd/mm/aaaa ou dd-mm-aaaa (ano com 2 dígitos vira 19xx/20xx)
  const br = s.match(/^(\d{1,2})[/-](\d{1,2})[/-](\d{2}|\d{4})$/);
  if (br) {
    let year = Number(br[3]);
    if (br[3].length === 2) year += year < 50 ? 2000 : 1900;
    return isoFromParts(year, Number(br[2]), Number(br[1]));
  }

  return null;
}

function isoFromParts(y: number, m: number, d: number): string | null {
  if (m < 1 || m > 12 || d < 1) return null;

  const daysInMonth = new Date(Date.UTC(y, m, 0)).getUTCDate();
  if (d > daysInMonth) return null;

  const yyyy = String(y).padStart(4, "0");
  const mm = String(m).padStart(2, "0");
  const dd = String(d).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}

/** Soma dias a uma data (UTC) e devolve YYYY-MM-DD */
export function shiftDays(date: Date, days: number): string {
  return new Date(date.getTime() + days * 86_400_000).toISOString().slice(0, 10);
}

export function toISODateOnly(d: Date): string {
  return d.toISOString().slice(0, 10);
}

import { z } from "zod";
import { FIXED_EXPENSE_CATEGORIES, MUSICIAN_PAYOUT_CATEGORY } from "../domain/constants";
import type { KpiSettings } from "../domain/types";

// "A, B ,C" -> ["A", "B", "C"]
const csvList = (fallback: readonly string[]) =>
  z
    .string()
    .optional()
    .transform((v) => {
      if (v === undefined || !v.trim()) return [...fallback];
      return v
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean);
    });

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : null));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(4001),
  FINANCE_SHEET_URL: optionalString.pipe(z.string().url("FINANCE_SHEET_URL deve ser uma URL").nullable()),
  FINANCE_XLSX_PATH: optionalString,
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  ATTENDANCE_TARGET: z.coerce.number().positive().default(100),
  ATTENDANCE_WINDOW_DAYS: z.coerce.number().int().positive().default(90),
  MUSICIAN_PAYOUT_CATEGORIES: csvList([MUSICIAN_PAYOUT_CATEGORY, "PAYOUT_MUSICOS"]),
  FIXED_EXPENSE_CATEGORIES: csvList(FIXED_EXPENSE_CATEGORIES),
});

export interface AppConfig {
  nodeEnv: "development" | "production" | "test";
  port: number;
  sheetUrl: string | null;
  xlsxPath: string | null;
  cacheTtlSeconds: number;
  attendanceTarget: number;
  attendanceWindowDays: number;
  musicianPayoutCategories: string[];
  fixedExpenseCategories: string[];
}

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(`Configuração inválida: ${issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Lê e valida as variáveis de ambiente (dotenv já carregado em server.ts) */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(parsed.error.issues);

  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    sheetUrl: e.FINANCE_SHEET_URL,
    xlsxPath: e.FINANCE_XLSX_PATH,
    cacheTtlSeconds: e.CACHE_TTL_SECONDS,
    attendanceTarget: e.ATTENDANCE_TARGET,
    attendanceWindowDays: e.ATTENDANCE_WINDOW_DAYS,
    musicianPayoutCategories: e.MUSICIAN_PAYOUT_CATEGORIES,
    fixedExpenseCategories: e.FIXED_EXPENSE_CATEGORIES,
  };
}

export function toKpiSettings(config: AppConfig): KpiSettings {
  return {
    musicianPayoutCategories: config.musicianPayoutCategories,
    fixedExpenseCategories: config.fixedExpenseCategories,
    attendanceTarget: config.attendanceTarget,
    attendanceWindowDays: config.attendanceWindowDays,
  };
}

import { z } from "zod";
import {
  DIRECTIONS,
  DIRECTION_ALIASES,
  EVENT_STATUSES,
  EVENT_STATUS_ALIASES,
  PAYMENT_STATUSES,
  PAYMENT_STATUS_ALIASES,
} from "../domain/constants";
import { parseMoney } from "../services/money";
import { PERIOD_PRESETS } from "../services/periods";
import { parseBool, resolveAlias, toDateISO, toText } from "./normalize";

/* =========================
   Coerções de célula
========================= */

const hasDigit = (s: string) => /\d/.test(s);

// ausente -> NaN, para o zod acusar tipo inválido
function toAmount(v: unknown): number {
  if (v === null || v === undefined || v === "") return NaN;
  if (typeof v === "string" && !hasDigit(v)) return NaN;
  return parseMoney(v);
}

function toOptionalMoney(v: unknown): number | null {
  if (v === null || v === undefined || String(v).trim() === "") return null;
  if (typeof v === "string" && !hasDigit(v)) return NaN;
  return parseMoney(v);
}

// público: "1.200" -> 1200
function toOptionalCount(v: unknown): number | null {
  if (v === null || v === undefined || String(v).trim() === "") return null;
  if (typeof v === "number") return v;
  return Number(String(v).replace(/[.\s]/g, ""));
}

const requiredText = (label: string) =>
  z.preprocess(toText, z.string({ required_error: `${label} é obrigatório`, invalid_type_error: `${label} é obrigatório` }));

const optionalText = z.preprocess(toText, z.string().nullable());

const isoDate = z.preprocess(toDateISO, z.string({ invalid_type_error: "Data inválida", required_error: "Data inválida" }));

/* =========================
   Linhas da planilha
========================= */

export const transactionRowSchema = z
  .object({
    id: requiredText("id"),
    date: isoDate,
    direction: z.preprocess((v) => resolveAlias(DIRECTION_ALIASES, v), z.enum(DIRECTIONS)),
    category: optionalText,
    subcategory: optionalText,
    description: z.preprocess((v) => toText(v) ?? "", z.string()),
    amount: z.preprocess(toAmount, z.number().positive("Valor deve ser positivo")),
    event_id: optionalText,
    payment_status: z.preprocess((v) => resolveAlias(PAYMENT_STATUS_ALIASES, v), z.enum(PAYMENT_STATUSES)),
    account: optionalText,
  })
  .superRefine((row, ctx) => {
    if (row.direction === "EXPENSE" && !row.category) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["category"],
        message: "Categoria é obrigatória para saídas",
      });
    }
  });

export const eventRowSchema = z.object({
  id: requiredText("id"),
  date: isoDate,
  venue: requiredText("casa"),
  city: optionalText,
  status: z.preprocess((v) => resolveAlias(EVENT_STATUS_ALIASES, v), z.enum(EVENT_STATUSES)),
  attendance: z.preprocess(toOptionalCount, z.number().int().min(0, "Público não pode ser negativo").nullable()),
  agreed_fee: z.preprocess(toOptionalMoney, z.number().min(0, "Cachê acordado não pode ser negativo").nullable()),
});

const percentage = z.preprocess(
  toAmount,
  z.number().min(0, "Percentual deve estar entre 0 e 100").max(100, "Percentual deve estar entre 0 e 100")
);

export const allocationRuleRowSchema = z.object({
  member: requiredText("membro"),
  percentage,
  // célula vazia conta como ativo
  active: z.preprocess((v) => (toText(v) === null ? true : parseBool(v)), z.boolean()),
});

export const categoryAllocationRowSchema = z.object({
  category: requiredText("categoria"),
  member: requiredText("membro"),
  percentage,
});

/* =========================
   Corpo / query das rotas
========================= */

const isoDateParam = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Use AAAA-MM-DD");

const periodFields = {
  start: isoDateParam.optional(),
  end: isoDateParam.optional(),
  period: z.enum(PERIOD_PRESETS).optional(),
};

function startBeforeEnd(data: { start?: string; end?: string }) {
  return !data.start || !data.end || data.start <= data.end;
}

const startBeforeEndMessage = { message: "start deve ser anterior ou igual a end", path: ["start"] };

export const reportQuerySchema = z.object(periodFields).refine(startBeforeEnd, startBeforeEndMessage);

export const categoryQuerySchema = z
  .object({ ...periodFields, direction: z.enum(DIRECTIONS).default("EXPENSE") })
  .refine(startBeforeEnd, startBeforeEndMessage);

export const fixedAllocationBodySchema = z
  .object({ ...periodFields, netResult: z.number().finite().optional() })
  .refine(startBeforeEnd, startBeforeEndMessage);

export const categoryAllocationBodySchema = z.object(periodFields).refine(startBeforeEnd, startBeforeEndMessage);

export const allocationTotalsBodySchema = z
  .object({
    fixed: z
      .array(
        z.object({
          member: z.string().min(1, "Membro é obrigatório"),
          percentage: z.number().min(0).max(100),
          active: z.boolean().default(true),
        })
      )
      .optional(),
    category: z
      .array(
        z.object({
          category: z.string().min(1, "Categoria é obrigatória"),
          member: z.string().min(1, "Membro é obrigatório"),
          percentage: z.number().min(0).max(100),
        })
      )
      .optional(),
  })
  .refine((data) => data.fixed || data.category, { message: "Informe fixed e/ou category", path: ["fixed"] });

export const cacheInvalidateBodySchema = z.object({
  key: z.string().min(1).optional(),
});

/** Corpo da resposta 400 para entrada inválida */
export function invalidResponse(error: z.ZodError) {
  return {
    ok: false,
    error: "Dados inválidos",
    details: error.issues.map((e: z.ZodIssue) => ({
      path: e.path.join("."),
      message: e.message,
    })),
  };
}

import type { Response } from "express";
import { z } from "zod";
import { RecordValidationError, SheetSourceError } from "../domain/errors";
import { logger } from "./logger";
import { invalidResponse } from "./validators";

/**
 * Resposta padrão de erro das rotas:
 * - 400 entrada inválida (zod)
 * - 422 planilha com dados inválidos
 * - 502 falha ao ler a planilha
 * - 500 o resto
 */
export function sendError(res: Response, err: unknown): void {
  if (err instanceof z.ZodError) {
    res.status(400).json(invalidResponse(err));
    return;
  }

  if (err instanceof RecordValidationError) {
    logger.warn("Planilha com dados inválidos", { table: err.table, kind: err.kind });
    res.status(422).json({
      ok: false,
      error: err.kind,
      table: err.table,
      message: err.message,
      details: err.details,
    });
    return;
  }

  if (err instanceof SheetSourceError) {
    logger.error("Falha ao ler planilha", err);
    res.status(502).json({ ok: false, error: "sheet_source", message: err.message });
    return;
  }

  logger.error("Erro inesperado", err);
  res.status(500).json({ ok: false, error: err instanceof Error ? err.message : String(err) });
}

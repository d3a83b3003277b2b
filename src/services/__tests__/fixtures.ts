import assert from "node:assert/strict";
import type { ShowEvent, Transaction } from "../../domain/types";

export function tx(partial: Partial<Transaction> & Pick<Transaction, "id">): Transaction {
  return {
    date: "2025-01-10",
    direction: "INCOME",
    category: null,
    subcategory: null,
    description: "",
    amount: 100,
    event_id: null,
    payment_status: "PAID",
    account: null,
    ...partial,
  };
}

export function show(partial: Partial<ShowEvent> & Pick<ShowEvent, "id">): ShowEvent {
  return {
    date: "2025-01-10",
    venue: "Bar do Zé",
    city: null,
    status: "COMPLETED",
    attendance: null,
    agreed_fee: null,
    ...partial,
  };
}

export function assertClose(actual: number | null | undefined, expected: number, eps = 1e-9): void {
  assert.ok(
    typeof actual === "number" && Math.abs(actual - expected) < eps,
    `esperado ~${expected}, recebido ${String(actual)}`
  );
}

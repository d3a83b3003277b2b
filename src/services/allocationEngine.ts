import type { AllocationResult, AllocationRule, CategoryAllocation, CategoryAllocationLine, Transaction } from "../domain/types";

/**
 * Rateio fixo: cada membro ativo recebe `percentual / 100 * resultado`.
 * Resultado negativo gera valores negativos (divisão de custo).
 * A soma dos percentuais é checada ao gravar as regras, não aqui.
 */
export function allocateFixed(netResult: number, rules: readonly AllocationRule[]): AllocationResult {
  const result: AllocationResult = {};

  for (const rule of rules) {
    if (!rule.active) continue;
    result[rule.member] = (result[rule.member] ?? 0) + (rule.percentage / 100) * netResult;
  }
  return result;
}

/** Total líquido por categoria: entradas pagas (+), saídas pagas (-) */
export function computeCategoryTotals(transactions: readonly Transaction[]): Record<string, number> {
  const totals: Record<string, number> = {};

  for (const t of transactions) {
    if (t.payment_status !== "PAID" || !t.category) continue;
    const signed = t.direction === "INCOME" ? t.amount : -t.amount;
    totals[t.category] = (totals[t.category] ?? 0) + signed;
  }
  return totals;
}

export function categoryAllocationLines(
  categoryTotals: Readonly<Record<string, number>>,
  allocations: readonly CategoryAllocation[]
): CategoryAllocationLine[] {
  return allocations.map((a) => {
    const categoryTotal = categoryTotals[a.category] ?? 0;
    return {
      category: a.category,
      member: a.member,
      percentage: a.percentage,
      categoryTotal,
      amount: (categoryTotal * a.percentage) / 100,
    };
  });
}

/**
 * Rateio por centro de custo: soma, por membro, a sua parte de cada
 * categoria mapeada. Categorias sem mapeamento ficam fora do rateio.
 */
export function allocateByCategory(
  categoryTotals: Readonly<Record<string, number>>,
  allocations: readonly CategoryAllocation[]
): AllocationResult {
  const result: AllocationResult = {};

  for (const line of categoryAllocationLines(categoryTotals, allocations)) {
    result[line.member] = (result[line.member] ?? 0) + line.amount;
  }
  return result;
}

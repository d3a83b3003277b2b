import { DEFAULT_KPI_SETTINGS } from "../domain/constants";
import { RecordValidationError } from "../domain/errors";
import type {
  AllocationResult,
  AllocationRule,
  CategoryAllocation,
  CategoryAllocationLine,
  CategoryTotal,
  Direction,
  EventProfitability,
  KpiExplanation,
  KpiSet,
  KpiSettings,
  MonthlyCashFlow,
  Period,
  ShowEvent,
  Transaction,
} from "../domain/types";
import { CACHE_KEYS, type TableCache } from "../lib/cache";
import { logger } from "../lib/logger";
import { allocateByCategory, allocateFixed, categoryAllocationLines, computeCategoryTotals } from "./allocationEngine";
import { buildReportWorkbook } from "./export/reportWorkbook";
import {
  computeCategoryDistribution,
  computeEventProfitability,
  computeKpis,
  computeMonthlyCashFlow,
  explainKpis,
  filterByPeriod,
} from "./kpiEngine";
import { pickPeriod, type PeriodPreset } from "./periods";
import { collectIntegrityWarnings, type IntegrityWarning } from "./records/integrity";
import {
  validateAllocationRules,
  validateCategoryAllocations,
  validateEvents,
  validateTransactions,
} from "./records/validateRecords";
import type { FinanceSource, FinanceTables } from "./sheets/financeWorkbook";

/** Lançamentos e shows validados, junto da leitura bruta de onde vieram */
export interface ValidatedTables {
  raw: FinanceTables;
  transactions: Transaction[];
  events: ShowEvent[];
}

export interface AllocationTables {
  allocationRules: AllocationRule[];
  categoryAllocations: CategoryAllocation[];
}

export interface PeriodParams {
  start?: string;
  end?: string;
  period?: PeriodPreset;
}

export interface KpiReport {
  period: Period | null;
  kpis: KpiSet;
  explanations: KpiExplanation[];
}

export interface FixedAllocationReport {
  period: Period | null;
  netResult: number;
  rules: AllocationRule[];
  payouts: AllocationResult;
}

export interface CategoryAllocationReport {
  period: Period | null;
  categoryTotals: Record<string, number>;
  lines: CategoryAllocationLine[];
  payouts: AllocationResult;
}

export interface ReportServiceDeps {
  source: FinanceSource;
  cache: TableCache;
  settings?: KpiSettings;
  clock?: () => Date;
}

/**
 * Camada entre as rotas e os motores de cálculo: carrega as tabelas
 * (via cache), valida uma vez e entrega os resultados já montados.
 */
export class ReportService {
  private readonly source: FinanceSource;
  private readonly cache: TableCache;
  private readonly settings: KpiSettings;
  private readonly clock: () => Date;

  constructor(deps: ReportServiceDeps) {
    this.source = deps.source;
    this.cache = deps.cache;
    this.settings = deps.settings ?? DEFAULT_KPI_SETTINGS;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Transações e shows validados; erro de validação não vai para o cache.
   * As abas de rateio ficam de fora: uma regra inválida não derruba os KPIs.
   */
  loadTables(): Promise<ValidatedTables> {
    return this.cache.getOrLoad(CACHE_KEYS.tables, async () => {
      const startedAt = Date.now();
      const raw = await this.source.readTables();

      const tables: ValidatedTables = {
        raw,
        transactions: validateTransactions(raw.transactions),
        events: validateEvents(raw.events),
      };

      logger.info("Tabelas financeiras carregadas", {
        transactions: tables.transactions.length,
        events: tables.events.length,
        ms: Date.now() - startedAt,
      });
      return tables;
    });
  }

  /** Abas de rateio validadas a cada uso, a partir da leitura em cache */
  async loadAllocationTables(): Promise<AllocationTables> {
    const { raw } = await this.loadTables();
    return {
      allocationRules: validateAllocationRules(raw.allocationRules),
      categoryAllocations: validateCategoryAllocations(raw.categoryAllocations),
    };
  }

  private resolve(params: PeriodParams): Period | null {
    return pickPeriod(params, this.clock());
  }

  private kpisFor(tables: ValidatedTables, period: Period | null): KpiSet {
    return computeKpis(tables.transactions, tables.events, {
      periodStart: period?.start,
      periodEnd: period?.end,
      now: this.clock(),
      settings: this.settings,
    });
  }

  async getKpiReport(params: PeriodParams = {}): Promise<KpiReport> {
    const tables = await this.loadTables();
    const period = this.resolve(params);
    const kpis = this.kpisFor(tables, period);
    return { period, kpis, explanations: explainKpis(kpis) };
  }

  async getEventProfitability(params: PeriodParams = {}): Promise<{ period: Period | null; shows: EventProfitability[] }> {
    const tables = await this.loadTables();
    const period = this.resolve(params);
    const events = filterByPeriod(tables.events, period?.start, period?.end);
    return { period, shows: computeEventProfitability(events, tables.transactions) };
  }

  async getCashFlow(params: PeriodParams = {}): Promise<{ period: Period | null } & MonthlyCashFlow> {
    const tables = await this.loadTables();
    const period = this.resolve(params);
    const tx = filterByPeriod(tables.transactions, period?.start, period?.end);
    return { period, ...computeMonthlyCashFlow(tx) };
  }

  async getCategoryDistribution(
    params: PeriodParams & { direction?: Direction } = {}
  ): Promise<{ period: Period | null; direction: Direction; categories: CategoryTotal[] }> {
    const tables = await this.loadTables();
    const period = this.resolve(params);
    const direction = params.direction ?? "EXPENSE";
    const tx = filterByPeriod(tables.transactions, period?.start, period?.end);
    return { period, direction, categories: computeCategoryDistribution(tx, direction) };
  }

  async getWarnings(): Promise<IntegrityWarning[]> {
    const tables = await this.loadTables();
    return collectIntegrityWarnings(tables.transactions, tables.events);
  }

  /** Rateio fixo; sem netResult usa o caixa do período */
  async allocateFixed(params: PeriodParams & { netResult?: number } = {}): Promise<FixedAllocationReport> {
    const { allocationRules } = await this.loadAllocationTables();
    const tables = await this.loadTables();
    const period = this.resolve(params);
    const netResult = params.netResult ?? this.kpisFor(tables, period).currentCash;
    const rules = allocationRules.filter((r) => r.active);

    return { period, netResult, rules, payouts: allocateFixed(netResult, rules) };
  }

  async allocateByCategory(params: PeriodParams = {}): Promise<CategoryAllocationReport> {
    const { categoryAllocations } = await this.loadAllocationTables();
    const tables = await this.loadTables();
    const period = this.resolve(params);
    const tx = filterByPeriod(tables.transactions, period?.start, period?.end);
    const categoryTotals = computeCategoryTotals(tx);

    return {
      period,
      categoryTotals,
      lines: categoryAllocationLines(categoryTotals, categoryAllocations),
      payouts: allocateByCategory(categoryTotals, categoryAllocations),
    };
  }

  async buildExport(params: PeriodParams = {}): Promise<Buffer> {
    await this.loadTables(); // aquece o cache antes das consultas em paralelo

    const [kpi, shows, cashFlow, allocation] = await Promise.all([
      this.getKpiReport(params),
      this.getEventProfitability(params),
      this.getCashFlow(params),
      this.exportAllocation(params),
    ]);

    return buildReportWorkbook({
      period: kpi.period,
      explanations: kpi.explanations,
      shows: shows.shows,
      cashFlow,
      ...allocation,
    });
  }

  // com abas de rateio inválidas a exportação sai sem a aba Rateio preenchida
  private async exportAllocation(
    params: PeriodParams
  ): Promise<{ fixedPayouts: AllocationResult; categoryLines: CategoryAllocationLine[] }> {
    try {
      const [fixed, category] = await Promise.all([this.allocateFixed(params), this.allocateByCategory(params)]);
      return { fixedPayouts: fixed.payouts, categoryLines: category.lines };
    } catch (err) {
      if (!(err instanceof RecordValidationError)) throw err;
      logger.warn("Rateio fora da exportação: abas de rateio inválidas", { table: err.table, kind: err.kind });
      return { fixedPayouts: {}, categoryLines: [] };
    }
  }

  /** Sem chave limpa tudo */
  invalidate(key?: string): number {
    if (key) return this.cache.invalidate(key);
    const count = this.cache.keys().length;
    this.cache.flush();
    logger.info("Cache de relatórios limpo", { count });
    return count;
  }
}

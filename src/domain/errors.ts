export type ValidationKind = "schema" | "enum" | "type" | "range";

export type TableName = "transactions" | "events" | "allocationRules" | "categoryAllocations";

/**
 * Falha de validação de uma tabela inteira. Nenhum KPI é calculado
 * a partir de uma tabela que gerou um destes erros.
 */
export abstract class RecordValidationError extends Error {
  abstract readonly kind: ValidationKind;

  constructor(
    readonly table: TableName,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }

  abstract get details(): Record<string, unknown>;
}

export class SchemaError extends RecordValidationError {
  readonly kind = "schema" as const;

  constructor(
    table: TableName,
    readonly missingColumns: string[]
  ) {
    super(table, `Colunas obrigatórias ausentes em ${table}: ${missingColumns.join(", ")}`);
  }

  get details() {
    return { missingColumns: this.missingColumns };
  }
}

export interface FieldOffense {
  field: string;
  rowId: string | null;
  value: unknown;
}

export class EnumError extends RecordValidationError {
  readonly kind = "enum" as const;

  constructor(
    table: TableName,
    readonly offenses: FieldOffense[]
  ) {
    super(table, `Valores fora do domínio em ${table}: ${describeOffenses(offenses)}`);
  }

  get details() {
    return { offenses: this.offenses };
  }
}

/** Valor que não pôde ser convertido para o tipo esperado (ex.: amount não positivo). */
export class RecordTypeError extends RecordValidationError {
  readonly kind = "type" as const;

  constructor(
    table: TableName,
    readonly offenses: FieldOffense[]
  ) {
    super(table, `Valores inválidos em ${table}: ${describeOffenses(offenses)}`);
  }

  get details() {
    return { offenses: this.offenses };
  }
}

export class RecordRangeError extends RecordValidationError {
  readonly kind = "range" as const;

  constructor(
    table: TableName,
    readonly offenses: FieldOffense[]
  ) {
    super(table, `Valores fora do intervalo em ${table}: ${describeOffenses(offenses)}`);
  }

  get details() {
    return { offenses: this.offenses };
  }
}

/** Falha ao ler a planilha de origem (download, arquivo ou aba ausente). */
export class SheetSourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SheetSourceError";
  }
}

function describeOffenses(offenses: FieldOffense[]): string {
  return offenses
    .map((o) => `${o.field}=${JSON.stringify(o.value ?? null)}${o.rowId ? ` (id ${o.rowId})` : ""}`)
    .join("; ");
}

import type { DateTime } from "luxon";

export type Category = "electricity" | "gas";

export type Cell = number | Date | null;

export type DatasetRow = Readonly<Record<string, Cell>>;

export type Dataset = {
  readonly columns: readonly string[]; // ordem original do arquivo
  readonly rows: readonly DatasetRow[];
};

export type DateRange = {
  start: DateTime;
  end: DateTime; // último instante do dia final
};

export type ResolutionRule = "exact" | "keyword" | "fallback";

export type ResolvedSeries = {
  category: Category;
  column: string;
  dateColumn: string;
  rule: ResolutionRule;
};

export type FilteredSlice = {
  range: DateRange;
  series: ResolvedSeries;
  rows: readonly DatasetRow[];
};

export type Extreme = { value: number; date: Date };

export type PeriodPoint = { date: Date; value: number };

export type PeriodTable = {
  requested: Category;
  category: Category; // categoria efetivamente retornada
  column: string;
  dateColumn: string;
  fallback: boolean;
  points: PeriodPoint[];
};

export type Coverage = { start: Date; end: Date; rows: number };

export type Summary = {
  category: Category;
  column: string;
  rule: ResolutionRule;
  rows: number;
  minimum: Extreme | null;
  maximum: Extreme | null;
  average: number | null;
  above: { threshold: number; count: number | null } | null;
  below: { threshold: number; count: number | null } | null;
};

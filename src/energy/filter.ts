import type { Reporter } from "./reporter";
import type {
  Dataset,
  DateRange,
  DatasetRow,
  FilteredSlice,
  ResolvedSeries,
} from "./types";

export function rowDate(row: DatasetRow, dateColumn: string): Date | null {
  const v = row[dateColumn];
  return v instanceof Date && !Number.isNaN(v.getTime()) ? v : null;
}

export function seriesValue(row: DatasetRow, column: string): number | null {
  const v = row[column];
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

export function filterByRange(
  dataset: Pick<Dataset, "rows">,
  range: DateRange,
  series: ResolvedSeries,
  reporter: Reporter
): FilteredSlice {
  const from = range.start.toMillis();
  const to = range.end.toMillis();
  // mantém a ordem de carga (sem reordenar)
  const rows = dataset.rows.filter((row) => {
    const d = rowDate(row, series.dateColumn);
    if (!d) return false;
    const t = d.getTime();
    return t >= from && t <= to;
  });

  if (!rows.length) {
    reporter.report({
      level: "warn",
      event: "slice.empty",
      message: `nenhum dado entre ${range.start.toISO()} e ${range.end.toISO()}`,
      data: { column: series.column },
    });
  }
  return { range, series, rows };
}

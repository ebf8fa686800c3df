import { rowDate } from "./filter";
import { findDateColumn } from "./resolver";
import type { Cell, Coverage, Dataset, DatasetRow } from "./types";

// Date é mutável: cada célula de data vira uma instância nova
const copyCell = (v: Cell): Cell =>
  v instanceof Date ? new Date(v.getTime()) : v;

export function freezeDataset(dataset: Dataset): Dataset {
  return Object.freeze({
    columns: Object.freeze([...dataset.columns]),
    rows: Object.freeze(
      dataset.rows.map(
        (r): DatasetRow =>
          Object.freeze(
            Object.fromEntries(Object.entries(r).map(([k, v]): [string, Cell] => [k, copyCell(v)]))
          )
      )
    ),
  });
}

/** Primeira/última data do dataset, para preencher o seletor de período. */
export function datasetCoverage(dataset: Dataset): Coverage | null {
  const dateColumn = findDateColumn(dataset);
  if (!dateColumn) return null;
  let start: Date | null = null;
  let end: Date | null = null;
  let rows = 0;
  for (const row of dataset.rows) {
    const d = rowDate(row, dateColumn);
    if (!d) continue;
    rows++;
    if (!start || d < start) start = d;
    if (!end || d > end) end = d;
  }
  return start && end
    ? { start: new Date(start.getTime()), end: new Date(end.getTime()), rows }
    : null;
}

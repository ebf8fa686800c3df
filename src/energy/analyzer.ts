import { rowDate, seriesValue } from "./filter";
import type { Extreme, FilteredSlice, PeriodPoint } from "./types";

export function presentPoints(slice: FilteredSlice, column = slice.series.column) {
  const out: PeriodPoint[] = [];
  for (const row of slice.rows) {
    const date = rowDate(row, slice.series.dateColumn);
    const value = seriesValue(row, column);
    // cópia: quem recebe o ponto não altera o snapshot
    if (date && value !== null) out.push({ date: new Date(date.getTime()), value });
  }
  return out;
}

function pickExtreme(
  slice: FilteredSlice,
  better: (candidate: number, current: number) => boolean
): Extreme | null {
  let best: Extreme | null = null;
  for (const p of presentPoints(slice)) {
    // comparação estrita: em empate fica a primeira linha
    if (!best || better(p.value, best.value)) best = p;
  }
  return best ? { value: best.value, date: best.date } : null;
}

export const minimumOf = (slice: FilteredSlice) =>
  pickExtreme(slice, (a, b) => a < b);

export const maximumOf = (slice: FilteredSlice) =>
  pickExtreme(slice, (a, b) => a > b);

export function averageOf(slice: FilteredSlice): number | null {
  const vals = presentPoints(slice).map((p) => p.value);
  if (!vals.length) return null;
  return vals.reduce((a, b) => a + b, 0) / vals.length;
}

function countWhere(slice: FilteredSlice, pass: (v: number) => boolean) {
  if (!slice.rows.length) return null; // vazio != zero
  return presentPoints(slice).filter((p) => pass(p.value)).length;
}

export const countAbove = (slice: FilteredSlice, threshold: number) =>
  countWhere(slice, (v) => v > threshold);

export const countBelow = (slice: FilteredSlice, threshold: number) =>
  countWhere(slice, (v) => v < threshold);

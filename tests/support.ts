import type { Cell, Dataset } from "../src/energy/types";

export const day = (iso: string) => new Date(`${iso}T00:00:00.000Z`);

// linhas diárias consecutivas a partir de `from`
export function dailyDataset(
  from: string,
  series: Record<string, Array<number | null>>
): Dataset {
  const columns = ["date", ...Object.keys(series)];
  const length = Math.max(...Object.values(series).map((v) => v.length));
  const start = day(from).getTime();
  const rows = Array.from({ length }, (_, i) => {
    const row: Record<string, Cell> = { date: new Date(start + i * 86_400_000) };
    for (const [name, values] of Object.entries(series)) row[name] = values[i] ?? null;
    return row;
  });
  return { columns, rows };
}

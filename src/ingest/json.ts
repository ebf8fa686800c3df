import { DateTime } from "luxon";
import { DatasetFormatError } from "../energy/errors";
import type { Cell, Dataset } from "../energy/types";

export type JsonTable = {
  columns: string[];
  rows: Array<Record<string, string | number | null>>;
};

// strings viram datas (ISO); números ficam como estão
export function datasetFromJson(table: JsonTable, zone = "UTC"): Dataset {
  const rows = table.rows.map((raw, i) => {
    const row: Record<string, Cell> = {};
    for (const col of table.columns) {
      const v = raw[col];
      if (v === undefined || v === null) row[col] = null;
      else if (typeof v === "number") row[col] = v;
      else {
        const dt = DateTime.fromISO(v.trim(), { zone });
        if (!dt.isValid) {
          throw new DatasetFormatError(
            `linha ${i + 1}, coluna '${col}': data inválida "${v}"`
          );
        }
        row[col] = dt.toJSDate();
      }
    }
    return row;
  });
  return { columns: table.columns, rows };
}

import {
  averageOf,
  countAbove,
  countBelow,
  maximumOf,
  minimumOf,
  presentPoints,
} from "./analyzer";
import { datasetCoverage, freezeDataset } from "./dataset";
import { NoDatasetError } from "./errors";
import { filterByRange } from "./filter";
import { validateRange } from "./range";
import { silentReporter, type Reporter } from "./reporter";
import { resolveSeries } from "./resolver";
import type {
  Category,
  Coverage,
  Dataset,
  Extreme,
  FilteredSlice,
  PeriodTable,
  Summary,
} from "./types";

export type EngineOptions = {
  reporter?: Reporter;
  zone?: string; // fuso usado para interpretar as datas pedidas
};

export class EnergyAnalyzer {
  private dataset: Dataset | null = null;
  private readonly reporter: Reporter;
  private readonly zone: string;

  constructor(opts: EngineOptions = {}) {
    this.reporter = opts.reporter ?? silentReporter;
    this.zone = opts.zone ?? "UTC";
  }

  /** Troca o dataset inteiro; consultas em andamento seguem com a referência antiga. */
  setDataset(dataset: Dataset) {
    this.dataset = freezeDataset(dataset);
  }

  hasDataset() {
    return this.dataset !== null;
  }

  getDataset(): Dataset {
    if (!this.dataset) throw new NoDatasetError();
    return this.dataset;
  }

  coverage(): Coverage | null {
    return datasetCoverage(this.getDataset());
  }

  minimum(start: string, end: string, category: Category): Extreme | null {
    return minimumOf(this.slice(this.getDataset(), start, end, category));
  }

  maximum(start: string, end: string, category: Category): Extreme | null {
    return maximumOf(this.slice(this.getDataset(), start, end, category));
  }

  average(start: string, end: string, category: Category): number | null {
    return averageOf(this.slice(this.getDataset(), start, end, category));
  }

  countAboveThreshold(
    start: string,
    end: string,
    category: Category,
    threshold: number
  ): number | null {
    return countAbove(this.slice(this.getDataset(), start, end, category), threshold);
  }

  countBelowThreshold(
    start: string,
    end: string,
    category: Category,
    threshold: number
  ): number | null {
    return countBelow(this.slice(this.getDataset(), start, end, category), threshold);
  }

  periodSlice(start: string, end: string, category: Category): PeriodTable | null {
    const dataset = this.getDataset();
    const slice = this.slice(dataset, start, end, category);
    const points = presentPoints(slice);
    if (points.length) return toTable(slice, category, points);

    this.reporter.report({
      level: "warn",
      event: "period.missing",
      message: `todos os valores de ${category} no período estão ausentes`,
      data: { column: slice.series.column, rows: slice.rows.length },
    });
    if (category !== "electricity") return null;

    // só a tentativa com gás é absorvida; erros do caminho principal sobem
    try {
      const gas = this.slice(dataset, start, end, "gas");
      const gasPoints = presentPoints(gas);
      if (!gasPoints.length) return null;
      this.reporter.report({
        level: "info",
        event: "period.fallback",
        message: `usando consumo de gás ('${gas.series.column}') no lugar de eletricidade`,
        data: { column: gas.series.column },
      });
      return toTable(gas, category, gasPoints);
    } catch (e) {
      this.reporter.report({
        level: "warn",
        event: "period.fallback_failed",
        message: `gás indisponível como alternativa: ${
          e instanceof Error ? e.message : String(e)
        }`,
      });
      return null;
    }
  }

  /** Mínimo, máximo, média e contagens opcionais numa única passada. */
  summarize(
    start: string,
    end: string,
    category: Category,
    thresholds: { above?: number; below?: number } = {}
  ): Summary {
    const slice = this.slice(this.getDataset(), start, end, category);
    const { above, below } = thresholds;
    return {
      category,
      column: slice.series.column,
      rule: slice.series.rule,
      rows: slice.rows.length,
      minimum: minimumOf(slice),
      maximum: maximumOf(slice),
      average: averageOf(slice),
      above:
        above === undefined
          ? null
          : { threshold: above, count: countAbove(slice, above) },
      below:
        below === undefined
          ? null
          : { threshold: below, count: countBelow(slice, below) },
    };
  }

  private slice(
    dataset: Dataset,
    start: string,
    end: string,
    category: Category
  ): FilteredSlice {
    const range = validateRange(start, end, this.zone);
    this.reporter.report({
      level: "info",
      event: "range.validated",
      message: `intervalo ${range.start.toISO()} a ${range.end.toISO()}`,
    });
    const series = resolveSeries(dataset, category, this.reporter);
    return filterByRange(dataset, range, series, this.reporter);
  }
}

function toTable(
  slice: FilteredSlice,
  requested: Category,
  points: PeriodTable["points"]
): PeriodTable {
  return {
    requested,
    category: slice.series.category,
    column: slice.series.column,
    dateColumn: slice.series.dateColumn,
    fallback: slice.series.category !== requested,
    points,
  };
}

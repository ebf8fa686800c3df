import type { Category } from "./types";

export type AnalysisErrorCode =
  | "INVALID_RANGE"
  | "SERIES_NOT_FOUND"
  | "NO_DATASET"
  | "DATASET_FORMAT";

export class AnalysisError extends Error {
  constructor(readonly code: AnalysisErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidRangeError extends AnalysisError {
  constructor(
    message: string,
    readonly input: { start: string; end: string }
  ) {
    super("INVALID_RANGE", message);
  }
}

export class SeriesNotFoundError extends AnalysisError {
  constructor(
    readonly category: Category,
    readonly availableColumns: readonly string[],
    reason = `nenhuma coluna de consumo de ${category} disponível`
  ) {
    super(
      "SERIES_NOT_FOUND",
      `${reason} (colunas: ${availableColumns.join(", ") || "nenhuma"})`
    );
  }
}

export class NoDatasetError extends AnalysisError {
  constructor() {
    super("NO_DATASET", "nenhum dataset carregado");
  }
}

export class DatasetFormatError extends AnalysisError {
  constructor(message: string) {
    super("DATASET_FORMAT", message);
  }
}

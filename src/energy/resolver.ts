import { CATEGORIES, CATEGORY_PROFILES, foldName } from "./categories";
import { SeriesNotFoundError } from "./errors";
import type { Reporter } from "./reporter";
import type { Category, Dataset, ResolutionRule, ResolvedSeries } from "./types";

export type RuleContext = { category: Category; dateColumn: string };

export type MatchRule = {
  name: ResolutionRule;
  match: (columns: readonly string[], ctx: RuleContext) => string | null;
};

const seriesColumns = (columns: readonly string[], dateColumn: string) =>
  columns.filter((c) => c !== dateColumn);

export const exactRule: MatchRule = {
  name: "exact",
  match: (columns, { category, dateColumn }) => {
    const canonical = CATEGORY_PROFILES[category].canonical;
    return seriesColumns(columns, dateColumn).includes(canonical)
      ? canonical
      : null;
  },
};

export const keywordRule: MatchRule = {
  name: "keyword",
  match: (columns, { category, dateColumn }) => {
    const keywords = CATEGORY_PROFILES[category].keywords.map(foldName);
    // primeira coluna na ordem do dataset
    const hit = seriesColumns(columns, dateColumn).find((c) => {
      const k = foldName(c);
      return keywords.some((kw) => k.includes(kw));
    });
    return hit ?? null;
  },
};

const claimedByOther = (column: string, category: Category) =>
  CATEGORIES.some((other) => {
    if (other === category) return false;
    const ctx = { category: other, dateColumn: "" };
    return (
      exactRule.match([column], ctx) !== null ||
      keywordRule.match([column], ctx) !== null
    );
  });

// só a única coluna de série, e nunca uma que pertence a outra categoria
export const fallbackRule: MatchRule = {
  name: "fallback",
  match: (columns, { category, dateColumn }) => {
    const rest = seriesColumns(columns, dateColumn);
    if (rest.length !== 1 || claimedByOther(rest[0], category)) return null;
    return rest[0];
  },
};

export const RESOLUTION_RULES: readonly MatchRule[] = [
  exactRule,
  keywordRule,
  fallbackRule,
];

function isDateColumn(dataset: Dataset, column: string) {
  let seen = false;
  for (const row of dataset.rows) {
    const v = row[column];
    if (v === null || v === undefined) continue;
    if (!(v instanceof Date)) return false;
    seen = true;
  }
  // dataset vazio: só o nome decide
  return seen || (dataset.rows.length === 0 && foldName(column) === "date");
}

export function findDateColumn(dataset: Dataset): string | null {
  const candidates = dataset.columns.filter((c) => isDateColumn(dataset, c));
  return candidates.find((c) => foldName(c) === "date") ?? candidates[0] ?? null;
}

export function resolveSeries(
  dataset: Dataset,
  category: Category,
  reporter: Reporter,
  rules: readonly MatchRule[] = RESOLUTION_RULES
): ResolvedSeries {
  const dateColumn = findDateColumn(dataset);
  if (!dateColumn) {
    throw new SeriesNotFoundError(
      category,
      dataset.columns,
      "dataset sem coluna de data"
    );
  }

  for (const rule of rules) {
    const column = rule.match(dataset.columns, { category, dateColumn });
    if (!column) continue;
    reporter.report({
      level: rule.name === "fallback" ? "warn" : "info",
      event: "series.resolved",
      message: `coluna '${column}' usada para ${category} (regra ${rule.name})`,
      data: { category, column, rule: rule.name },
    });
    return { category, column, dateColumn, rule: rule.name };
  }

  throw new SeriesNotFoundError(category, seriesColumns(dataset.columns, dateColumn));
}

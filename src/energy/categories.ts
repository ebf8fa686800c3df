import type { Category } from "./types";

export type CategoryProfile = {
  canonical: string; // nome usado pelo loader ao renomear
  keywords: string[]; // busca por substring, sem diferenciar maiúsculas
  headerHints: string[]; // padrões extras para cabeçalhos de CSV (operadores da rede)
};

export const CATEGORY_PROFILES: Record<Category, CategoryProfile> = {
  electricity: {
    canonical: "electricity_consumption",
    keywords: ["electr", "électr", "elektr"],
    headerHints: ["électricité", "electricite", "électr", "electr", "rte"],
  },
  gas: {
    canonical: "gas_consumption",
    keywords: ["gas", "gaz"],
    headerHints: ["gaz", "gas", "grtgaz", "teréga"],
  },
};

export const CATEGORIES = ["electricity", "gas"] as const satisfies readonly Category[];

export function foldName(s: string) {
  return s.normalize("NFC").toLowerCase();
}

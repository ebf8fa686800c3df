import { DateTime } from "luxon";
import { CATEGORY_PROFILES, foldName } from "../energy/categories";
import { DatasetFormatError } from "../energy/errors";
import { silentReporter, type Reporter } from "../energy/reporter";
import type { Cell, Dataset } from "../energy/types";

export type CsvOptions = { zone?: string; reporter?: Reporter };

const DATE_PATTERNS = ["date", "temps", "time", "période"];
const MISSING = new Set(["", "-", "--", "n/a", "na", "nan", "null", "nd"]);
const DATE_FORMATS = [
  "dd/MM/yyyy",
  "d/M/yyyy",
  "dd/MM/yyyy HH:mm",
  "dd/MM/yyyy HH:mm:ss",
  "yyyy/M/d",
  "yyyy/M/d H:mm",
];

export function detectSeparator(headerLine: string) {
  return headerLine.includes(";") ? ";" : ",";
}

export function splitLine(line: string, sep: string): string[] {
  const out: string[] = [];
  let cur = "";
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        cur += '"';
        i++;
      } else if (ch === '"') quoted = false;
      else cur += ch;
    } else if (ch === '"') quoted = true;
    else if (ch === sep) {
      out.push(cur.trim());
      cur = "";
    } else cur += ch;
  }
  out.push(cur.trim());
  return out;
}

export function parseDateCell(raw: string, zone = "UTC"): Date | null {
  const s = raw.trim();
  if (!s) return null;
  let dt = DateTime.fromISO(s, { zone });
  if (!dt.isValid) dt = DateTime.fromSQL(s, { zone });
  for (const fmt of DATE_FORMATS) {
    if (dt.isValid) break;
    dt = DateTime.fromFormat(s, fmt, { zone });
  }
  return dt.isValid ? dt.toJSDate() : null;
}

export function parseNumberCell(raw: string, sep = ";"): number | null {
  const s = raw.trim();
  if (MISSING.has(s.toLowerCase())) return null;
  // "1 234,5" -> 1234.5
  let t = s.replace(/\s/g, "");
  if (t.includes(",") && t.includes(".")) {
    // o último separador é o decimal: "1.234,5" e "1,234.5"
    const decimal = t.lastIndexOf(",") > t.lastIndexOf(".") ? "," : ".";
    t = t.split(decimal === "," ? "." : ",").join("").replace(decimal, ".");
  } else if (t.includes(",")) {
    // com separador ',', "1,234" pode ser milhar ou decimal
    if (sep !== ";") return null;
    t = t.replace(",", ".");
  }
  const n = Number(t);
  return Number.isFinite(n) ? n : null;
}

function findByPatterns(
  header: readonly string[],
  patterns: readonly string[],
  skip: ReadonlySet<number>
): number {
  // a ordem dos padrões manda, não a das colunas
  for (const p of patterns.map(foldName)) {
    const idx = header.findIndex((h, i) => !skip.has(i) && foldName(h).includes(p));
    if (idx >= 0) return idx;
  }
  return -1;
}

function findDateIndex(header: string[], body: string[][], zone: string) {
  const byName = findByPatterns(header, DATE_PATTERNS, new Set());
  if (byName >= 0) return byName;
  if (body.length && parseDateCell(body[0][0] ?? "", zone)) return 0;
  for (let c = 0; c < header.length; c++) {
    const samples = body
      .map((r) => r[c] ?? "")
      .filter((v) => v.trim())
      .slice(0, 5);
    const looksLikeDate = samples.some((v) => v.includes("-") || v.includes("/"));
    if (looksLikeDate && samples.some((v) => parseDateCell(v, zone))) return c;
  }
  return -1;
}

function numericColumns(
  header: string[],
  body: string[][],
  skip: Set<number>,
  sep: string
) {
  const out: number[] = [];
  header.forEach((_, c) => {
    if (skip.has(c)) return;
    const vals = body.map((r) => r[c] ?? "").filter((v) => !MISSING.has(v.trim().toLowerCase()));
    if (vals.length && vals.every((v) => parseNumberCell(v, sep) !== null)) out.push(c);
  });
  return out;
}

export function parseConsumptionCsv(text: string, opts: CsvOptions = {}): Dataset {
  const zone = opts.zone ?? "UTC";
  const reporter = opts.reporter ?? silentReporter;

  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/).filter((l) => l.trim());
  if (!lines.length) throw new DatasetFormatError("arquivo vazio");

  const sep = detectSeparator(lines[0]);
  const header = splitLine(lines[0], sep);
  if (header.length < 2) {
    throw new DatasetFormatError("arquivo não tem colunas suficientes");
  }
  const body = lines.slice(1).map((l) => splitLine(l, sep));

  const dateIdx = findDateIndex(header, body, zone);
  if (dateIdx < 0) throw new DatasetFormatError("nenhuma coluna de data encontrada");

  const used = new Set([dateIdx]);
  let elecIdx = findByPatterns(header, CATEGORY_PROFILES.electricity.headerHints, used);
  if (elecIdx >= 0) used.add(elecIdx);
  let gasIdx = findByPatterns(header, CATEGORY_PROFILES.gas.headerHints, used);

  // sem nome reconhecível: usa as colunas numéricas na ordem
  if (elecIdx < 0 && gasIdx < 0) {
    const nums = numericColumns(header, body, used, sep);
    elecIdx = nums[0] ?? -1;
    gasIdx = nums[1] ?? -1;
  }

  const mapping: Array<[string, number]> = [["date", dateIdx]];
  if (elecIdx >= 0) mapping.push([CATEGORY_PROFILES.electricity.canonical, elecIdx]);
  if (gasIdx >= 0) mapping.push([CATEGORY_PROFILES.gas.canonical, gasIdx]);
  if (mapping.length < 2) {
    throw new DatasetFormatError(
      `colunas obrigatórias não encontradas (encontradas: ${header.join(", ")})`
    );
  }

  reporter.report({
    level: "info",
    event: "csv.columns",
    message: `separador '${sep}', colunas: ${mapping
      .map(([name, idx]) => `${header[idx]} -> ${name}`)
      .join(", ")}`,
    data: Object.fromEntries(mapping.map(([name, idx]) => [name, header[idx]])),
  });

  const flagIdx = header.findIndex((h) => foldName(h) === "flag_ignore");
  const rows: Record<string, Cell>[] = [];
  for (const cells of body) {
    if (flagIdx >= 0 && (cells[flagIdx] ?? "").trim().toLowerCase() === "oui") continue;
    const date = parseDateCell(cells[dateIdx] ?? "", zone);
    if (!date) continue;
    const row: Record<string, Cell> = { date };
    for (const [name, idx] of mapping.slice(1)) {
      row[name] = parseNumberCell(cells[idx] ?? "", sep);
    }
    rows.push(row);
  }

  return { columns: mapping.map(([name]) => name), rows };
}

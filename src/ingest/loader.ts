import { promises as fs } from "fs";
import { LRUCache } from "lru-cache";
import { DatasetFormatError } from "../energy/errors";
import { silentReporter, type Reporter } from "../energy/reporter";
import type { Dataset } from "../energy/types";
import { parseConsumptionCsv } from "./csv";

export type LoaderOptions = {
  max?: number;
  zone?: string;
  reporter?: Reporter;
};

export function decodeText(buf: Buffer): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buf);
  } catch {
    // arquivos exportados no Excel costumam vir em latin-1
    return buf.toString("latin1");
  }
}

async function readOrFail<T>(path: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (e) {
    throw new DatasetFormatError(
      `não foi possível ler ${path}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
}

export function createDatasetLoader(opts: LoaderOptions = {}) {
  const reporter = opts.reporter ?? silentReporter;
  // chave inclui tamanho e mtime: arquivo alterado = nova entrada
  const cache = new LRUCache<string, Dataset>({ max: opts.max ?? 16 });

  async function load(path: string): Promise<Dataset> {
    const st = await readOrFail(path, () => fs.stat(path));
    const key = `${path}:${st.size}:${st.mtimeMs}`;
    const hit = cache.get(key);
    if (hit) {
      reporter.report({
        level: "info",
        event: "dataset.cache_hit",
        message: `dataset de ${path} reaproveitado do cache`,
      });
      return hit;
    }

    const buf = await readOrFail(path, () => fs.readFile(path));
    const dataset = parseConsumptionCsv(decodeText(buf), {
      zone: opts.zone,
      reporter,
    });
    cache.set(key, dataset);
    reporter.report({
      level: "info",
      event: "dataset.loaded",
      message: `${dataset.rows.length} linhas carregadas de ${path}`,
      data: { path, rows: dataset.rows.length, columns: dataset.columns },
    });
    return dataset;
  }

  return { load };
}

export type DatasetLoader = ReturnType<typeof createDatasetLoader>;

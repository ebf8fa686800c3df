import express from "express";
import { z } from "zod";
import type { EnergyAnalyzer } from "../energy/engine";
import type { Reporter } from "../energy/reporter";
import { parseConsumptionCsv } from "../ingest/csv";
import { datasetFromJson } from "../ingest/json";
import type { DatasetLoader } from "../ingest/loader";
import { sendError } from "./respond";

const DatasetBody = z.union([
  z.object({ csv: z.string().min(1) }),
  z.object({
    columns: z.array(z.string().min(1)).min(1),
    rows: z.array(z.record(z.union([z.string(), z.number(), z.null()]))),
  }),
]);

export type DatasetRouterDeps = {
  engine: EnergyAnalyzer;
  loader: DatasetLoader;
  reporter: Reporter;
  zone: string;
  dataFile?: string;
};

export function datasetRouter(deps: DatasetRouterDeps) {
  const { engine, loader, reporter, zone, dataFile } = deps;
  const router = express.Router();

  const describe = () => {
    const dataset = engine.getDataset();
    return {
      columns: dataset.columns,
      rows: dataset.rows.length,
      coverage: engine.coverage(),
    };
  };

  router.get("/", (_req, res) => {
    try {
      res.json(describe());
    } catch (e) {
      sendError(res, e, reporter);
    }
  });

  // troca o dataset inteiro (sem atualização parcial)
  router.put("/", (req, res) => {
    try {
      const body = DatasetBody.parse(req.body);
      const dataset =
        "csv" in body
          ? parseConsumptionCsv(body.csv, { zone, reporter })
          : datasetFromJson(body, zone);
      engine.setDataset(dataset);
      res.json({ ok: true, ...describe() });
    } catch (e) {
      sendError(res, e, reporter);
    }
  });

  router.post("/reload", async (_req, res) => {
    if (!dataFile) {
      res
        .status(409)
        .json({ error: "DATA_FILE não configurado", code: "NO_DATA_FILE" });
      return;
    }
    try {
      engine.setDataset(await loader.load(dataFile));
      res.json({ ok: true, ...describe() });
    } catch (e) {
      sendError(res, e, reporter);
    }
  });

  return router;
}

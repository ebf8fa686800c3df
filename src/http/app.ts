import express from "express";
import type { EnergyAnalyzer } from "../energy/engine";
import type { Reporter } from "../energy/reporter";
import type { DatasetLoader } from "../ingest/loader";
import { analysisRouter } from "./analysis";
import { datasetRouter } from "./dataset";

export type AppDeps = {
  engine: EnergyAnalyzer;
  loader: DatasetLoader;
  reporter: Reporter;
  zone?: string;
  dataFile?: string;
};

export function createApp({ engine, loader, reporter, zone = "UTC", dataFile }: AppDeps) {
  const app = express();
  app.use(express.json({ limit: "10mb" }));
  app.use(
    "/dataset",
    datasetRouter({ engine, loader, reporter, zone, dataFile })
  );
  app.use("/analysis", analysisRouter(engine, reporter));
  return app;
}

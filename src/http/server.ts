import { env } from "../env";
import { EnergyAnalyzer } from "../energy/engine";
import { createConsoleReporter } from "../energy/reporter";
import { createDatasetLoader } from "../ingest/loader";
import { createApp } from "./app";

const reporter = createConsoleReporter(env.LOG_LEVEL);
const engine = new EnergyAnalyzer({ reporter, zone: env.DATASET_TZ });
const loader = createDatasetLoader({
  max: env.DATASET_CACHE_MAX,
  zone: env.DATASET_TZ,
  reporter,
});

const app = createApp({
  engine,
  loader,
  reporter,
  zone: env.DATASET_TZ,
  dataFile: env.DATA_FILE,
});

async function main() {
  if (env.DATA_FILE) engine.setDataset(await loader.load(env.DATA_FILE));
  app.listen(env.PORT, () => console.log(`HTTP on http://localhost:${env.PORT}`));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});

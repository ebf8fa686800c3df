import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DatasetFormatError } from "../src/energy/errors";
import { createMemoryReporter } from "../src/energy/reporter";
import { createDatasetLoader, decodeText } from "../src/ingest/loader";
import { day } from "./support";

const fixture = (name: string) => path.join(__dirname, "fixtures", name);

describe("decodeText", () => {
  it("falls back to latin-1 on invalid utf-8", () => {
    expect(decodeText(Buffer.from([0x50, 0xe9, 0x72]))).toBe("Pér");
    expect(decodeText(Buffer.from("Pér", "utf8"))).toBe("Pér");
  });
});

describe("createDatasetLoader", () => {
  it("loads a semicolon file with grid-operator headers", async () => {
    const loader = createDatasetLoader();
    const ds = await loader.load(fixture("odre-sample.csv"));
    expect(ds.columns).toEqual(["date", "electricity_consumption", "gas_consumption"]);
    // linha marcada com flag_ignore=oui fica de fora
    expect(ds.rows.map((r) => r.electricity_consumption)).toEqual([5400, 5100, 5600]);
  });

  it("reads latin-1 exports with day-first dates", async () => {
    const ds = await createDatasetLoader().load(fixture("latin1-sample.csv"));
    expect(ds.rows).toEqual([
      { date: day("2024-03-01"), electricity_consumption: 12.5, gas_consumption: 30 },
      { date: day("2024-03-02"), electricity_consumption: 14, gas_consumption: null },
    ]);
  });

  it("serves an unchanged file from the cache", async () => {
    const { reporter, named } = createMemoryReporter();
    const loader = createDatasetLoader({ reporter });
    const first = await loader.load(fixture("odre-sample.csv"));
    const second = await loader.load(fixture("odre-sample.csv"));
    expect(second).toBe(first);
    expect(named("dataset.loaded")).toHaveLength(1);
    expect(named("dataset.cache_hit")).toHaveLength(1);
  });

  it("wraps unreadable paths in a format error", async () => {
    await expect(
      createDatasetLoader().load(fixture("missing.csv"))
    ).rejects.toBeInstanceOf(DatasetFormatError);
  });

  describe("with a file that changes", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "energy-loader-"));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("parses again when the content changes", async () => {
      const file = path.join(dir, "data.csv");
      const loader = createDatasetLoader();
      await fs.writeFile(file, "date,gas\n2024-01-01,1\n");
      expect((await loader.load(file)).rows).toHaveLength(1);
      await fs.writeFile(file, "date,gas\n2024-01-01,1\n2024-01-02,2\n");
      expect((await loader.load(file)).rows).toHaveLength(2);
    });
  });
});

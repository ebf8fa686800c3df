import express, { type RequestHandler } from "express";
import { z } from "zod";
import { CATEGORIES } from "../energy/categories";
import type { EnergyAnalyzer } from "../energy/engine";
import type { Reporter } from "../energy/reporter";
import { sendError } from "./respond";

// "" não vira 0: limiar precisa ser número de verdade
const numeric = z.string().trim().min(1).pipe(z.coerce.number().finite());

export const RangeQuery = z.object({
  start: z.string().trim().min(1, "start obrigatório (AAAA-MM-DD)"),
  end: z.string().trim().min(1, "end obrigatório (AAAA-MM-DD)"),
  category: z.enum(CATEGORIES).default("electricity"),
});

const ThresholdQuery = RangeQuery.extend({ threshold: numeric });

const SummaryQuery = RangeQuery.extend({
  above: numeric.optional(),
  below: numeric.optional(),
});

export function analysisRouter(engine: EnergyAnalyzer, reporter: Reporter) {
  const router = express.Router();

  function route<S extends z.ZodTypeAny>(
    schema: S,
    run: (q: z.infer<S>) => unknown
  ): RequestHandler {
    return (req, res) => {
      try {
        const query = schema.parse(req.query);
        // resultado null = sem dados no período (não é erro)
        res.json({ query, result: run(query) });
      } catch (e) {
        sendError(res, e, reporter);
      }
    };
  }

  router.get(
    "/minimum",
    route(RangeQuery, (q) => engine.minimum(q.start, q.end, q.category))
  );
  router.get(
    "/maximum",
    route(RangeQuery, (q) => engine.maximum(q.start, q.end, q.category))
  );
  router.get(
    "/average",
    route(RangeQuery, (q) => engine.average(q.start, q.end, q.category))
  );
  router.get(
    "/above",
    route(ThresholdQuery, (q) =>
      engine.countAboveThreshold(q.start, q.end, q.category, q.threshold)
    )
  );
  router.get(
    "/below",
    route(ThresholdQuery, (q) =>
      engine.countBelowThreshold(q.start, q.end, q.category, q.threshold)
    )
  );
  router.get(
    "/period",
    route(RangeQuery, (q) => engine.periodSlice(q.start, q.end, q.category))
  );
  router.get(
    "/summary",
    route(SummaryQuery, (q) =>
      engine.summarize(q.start, q.end, q.category, {
        above: q.above,
        below: q.below,
      })
    )
  );

  return router;
}

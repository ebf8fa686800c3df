import type { Response } from "express";
import { ZodError } from "zod";
import {
  DatasetFormatError,
  InvalidRangeError,
  NoDatasetError,
  SeriesNotFoundError,
} from "../energy/errors";
import type { Reporter } from "../energy/reporter";

export function sendError(res: Response, e: unknown, reporter: Reporter) {
  if (e instanceof ZodError) {
    return res.status(400).json({
      error: "parâmetros inválidos",
      code: "BAD_REQUEST",
      issues: e.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  }
  if (e instanceof InvalidRangeError) {
    return res.status(400).json({ error: e.message, code: e.code, input: e.input });
  }
  if (e instanceof SeriesNotFoundError) {
    return res.status(404).json({
      error: e.message,
      code: e.code,
      category: e.category,
      availableColumns: e.availableColumns,
    });
  }
  if (e instanceof NoDatasetError) {
    return res.status(409).json({ error: e.message, code: e.code });
  }
  if (e instanceof DatasetFormatError) {
    return res.status(422).json({ error: e.message, code: e.code });
  }

  const message = e instanceof Error ? e.message : String(e);
  reporter.report({ level: "error", event: "http.error", message });
  return res.status(500).json({ error: message || "erro interno" });
}

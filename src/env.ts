import "dotenv/config";
import { IANAZone } from "luxon";
import { z } from "zod";

const Env = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  // CSV carregado na inicialização (opcional)
  DATA_FILE: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : undefined)),
  DATASET_TZ: z
    .string()
    .default("UTC")
    .refine((tz) => IANAZone.isValidZone(tz), {
      message: "DATASET_TZ precisa ser um fuso IANA válido",
    }),
  LOG_LEVEL: z.enum(["info", "warn", "error"]).default("info"),
  DATASET_CACHE_MAX: z.coerce.number().int().positive().default(16),
});

export type AppEnv = z.infer<typeof Env>;

export function parseEnv(source: Record<string, string | undefined>): AppEnv {
  return Env.parse(source);
}

export const env = parseEnv(process.env);

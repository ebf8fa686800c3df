import { DateTime } from "luxon";
import { InvalidRangeError } from "./errors";
import type { DateRange } from "./types";

export function parseDay(
  value: string,
  zone = "UTC",
  keepOffset = false
): DateTime | null {
  // keepOffset: um offset escrito na string define o dia
  const dt = DateTime.fromISO(value.trim(), { zone, setZone: keepOffset });
  return dt.isValid ? dt : null;
}

export function validateRange(
  startStr: string,
  endStr: string,
  zone = "UTC"
): DateRange {
  const input = { start: startStr, end: endStr };
  const start = parseDay(startStr, zone);
  if (!start) {
    throw new InvalidRangeError(`data inicial inválida: "${startStr}"`, input);
  }
  const parsedEnd = parseDay(endStr, zone, true);
  if (!parsedEnd) {
    throw new InvalidRangeError(`data final inválida: "${endStr}"`, input);
  }

  // fim vai até o último milissegundo do dia (mesmo dia = intervalo não vazio)
  const end = parsedEnd
    .startOf("day")
    .plus({ days: 1 })
    .minus({ milliseconds: 1 })
    .setZone(zone);

  if (start > end) {
    throw new InvalidRangeError(
      `data inicial "${startStr}" posterior à data final "${endStr}"`,
      input
    );
  }
  return { start, end };
}

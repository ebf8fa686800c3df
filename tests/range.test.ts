import { describe, expect, it } from "vitest";
import { InvalidRangeError } from "../src/energy/errors";
import { validateRange } from "../src/energy/range";

describe("validateRange", () => {
  it("extends the end to the last millisecond of its day", () => {
    const range = validateRange("2024-01-01", "2024-01-05");
    expect(range.start.toJSDate().toISOString()).toBe("2024-01-01T00:00:00.000Z");
    expect(range.end.toJSDate().toISOString()).toBe("2024-01-05T23:59:59.999Z");
  });

  it("keeps a single-day range non-empty", () => {
    const range = validateRange("2024-03-10", "2024-03-10");
    expect(range.end.toMillis() - range.start.toMillis()).toBe(86_400_000 - 1);
  });

  it("normalizes a date-time end to the end of that calendar day", () => {
    const range = validateRange("2024-01-01", "2024-01-05T10:30:00");
    expect(range.end.toJSDate().toISOString()).toBe("2024-01-05T23:59:59.999Z");
  });

  it("takes the end day from an offset written in the string", () => {
    const range = validateRange("2024-01-01", "2024-01-05T01:00:00+05:00");
    expect(range.end.toJSDate().toISOString()).toBe("2024-01-05T18:59:59.999Z");
    expect(range.end.zoneName).toBe("UTC");
  });

  it("interprets dates in the configured zone", () => {
    const range = validateRange("2024-01-01", "2024-01-01", "Europe/Paris");
    expect(range.start.toJSDate().toISOString()).toBe("2023-12-31T23:00:00.000Z");
    expect(range.end.toJSDate().toISOString()).toBe("2024-01-01T22:59:59.999Z");
  });

  it("rejects a start after the end instead of swapping", () => {
    expect(() => validateRange("2024-01-05", "2024-01-01")).toThrow(
      InvalidRangeError
    );
  });

  it("echoes the unparsable input", () => {
    try {
      validateRange("2024-13-40", "2024-01-01");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidRangeError);
      if (!(e instanceof InvalidRangeError)) return;
      expect(e.code).toBe("INVALID_RANGE");
      expect(e.input).toEqual({ start: "2024-13-40", end: "2024-01-01" });
      expect(e.message).toBe('data inicial inválida: "2024-13-40"');
    }
  });

  it("rejects an unparsable end", () => {
    expect(() => validateRange("2024-01-01", "amanhã")).toThrow(
      'data final inválida: "amanhã"'
    );
  });
});

import { describe, it, expect } from "vitest";
import { OptionsError } from "../errors";
import {
  parseGenerateCliOptions,
  parseGenerateOptions,
  parseSummarizeOptions,
} from "../validations/options";

describe("parseGenerateCliOptions", () => {
  it("fills in defaults", () => {
    expect(parseGenerateCliOptions({})).toEqual({
      count: 500,
      out: "./firewall_sample.log",
      burstiness: 0.2,
    });
  });

  it("coerces command-line strings", () => {
    const options = parseGenerateCliOptions({
      count: "10",
      seed: "42",
      start: "2025-10-20 08:00:00",
      burstiness: "0.5",
      out: "/tmp/fw.log",
    });
    expect(options).toEqual({
      count: 10,
      seed: 42,
      start: Date.UTC(2025, 9, 20, 8, 0, 0),
      burstiness: 0.5,
      out: "/tmp/fw.log",
    });
  });

  it("accepts a count of zero", () => {
    expect(parseGenerateCliOptions({ count: "0" }).count).toBe(0);
  });

  it("rejects a negative count", () => {
    expect(() => parseGenerateCliOptions({ count: "-1" })).toThrow(OptionsError);
  });

  it("rejects a fractional seed", () => {
    expect(() => parseGenerateCliOptions({ seed: "1.5" })).toThrow(OptionsError);
  });

  it("rejects burstiness outside [0, 1]", () => {
    expect(() => parseGenerateCliOptions({ burstiness: "1.5" })).toThrow(
      "burstiness: must be between 0 and 1"
    );
  });

  it("accepts seeds at both ends of the 32-bit range", () => {
    expect(parseGenerateCliOptions({ seed: "0" }).seed).toBe(0);
    expect(parseGenerateCliOptions({ seed: "4294967295" }).seed).toBe(4294967295);
  });

  it("rejects a seed wider than 32 bits", () => {
    expect(() => parseGenerateCliOptions({ seed: String(42 + 2 ** 32) })).toThrow(
      "seed: must be an integer between 0 and 4294967295"
    );
  });

  it("rejects a negative seed", () => {
    expect(() => parseGenerateCliOptions({ seed: "-1" })).toThrow(OptionsError);
  });

  it("rejects an unparseable start", () => {
    expect(() => parseGenerateCliOptions({ start: "next tuesday" })).toThrow(
      'Invalid timestamp "next tuesday"'
    );
  });
});

describe("parseGenerateOptions", () => {
  it("returns valid options unchanged", () => {
    const options = { count: 3, outPath: "fw.log", seed: 7, startTime: 0, burstiness: 0.5 };
    expect(parseGenerateOptions(options)).toEqual(options);
  });

  it("reports every failing field with the command-line wording", () => {
    try {
      parseGenerateOptions({ count: -1, outPath: "", seed: 2 ** 32, burstiness: 2 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(OptionsError);
      if (error instanceof OptionsError) {
        expect(error.issues).toEqual([
          "count: must be zero or more",
          "outPath: an output path is required",
          "seed: must be an integer between 0 and 4294967295",
          "burstiness: must be between 0 and 1",
        ]);
      }
    }
  });
});

describe("parseSummarizeOptions", () => {
  it("passes through a bare file path", () => {
    expect(parseSummarizeOptions({ logfile: "app.log" })).toEqual({ logfile: "app.log" });
  });

  it("parses the date window", () => {
    const options = parseSummarizeOptions({
      logfile: "app.log",
      start: "2025-10-20 00:00:00",
      end: "2025-10-22 23:59:59",
      keyword: "database",
    });
    expect(options.start).toBe(Date.UTC(2025, 9, 20));
    expect(options.end).toBe(Date.UTC(2025, 9, 22, 23, 59, 59));
    expect(options.keyword).toBe("database");
  });

  it("requires a log file", () => {
    expect(() => parseSummarizeOptions({ logfile: "" })).toThrow("a log file path is required");
  });

  it("rejects a window that ends before it starts", () => {
    expect(() =>
      parseSummarizeOptions({
        logfile: "app.log",
        start: "2025-10-22 00:00:00",
        end: "2025-10-20 00:00:00",
      })
    ).toThrow("start must not be later than end");
  });

  it("reports the failing field", () => {
    try {
      parseSummarizeOptions({ logfile: "app.log", end: "soon" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(OptionsError);
      if (error instanceof OptionsError) {
        expect(error.issues).toEqual([
          'end: Invalid timestamp "soon" (expected YYYY-MM-DD HH:MM:SS)',
        ]);
      }
    }
  });
});

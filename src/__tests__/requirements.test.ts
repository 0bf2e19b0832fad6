import { describe, it, expect, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { filterRequirementsByPhase, loadRequirements, parseRequirements } from "../data/requirements";
import { DataFormatError } from "../errors";
import { PlatoonRequirements } from "../models/platoonTypes";
import { requirement } from "./fixtures";

const sampleJson = JSON.stringify({
  version: "2.1",
  last_updated: "2026-10-01",
  notes: "sample",
  requirements: [
    { unit_id: "VADER", unit_name: "Darth Vader", min_relic: 5, path: "dark_side", territory: "Mustafar", count: 2 },
    { unit_id: "SHIP1", unit_name: "Dark Interceptor", min_relic: 7, path: "dark_side", territory: "Mustafar", unit_type: "ship" },
  ],
});

describe("parseRequirements", () => {
  it("maps the file format and applies defaults", () => {
    const parsed = parseRequirements(sampleJson);
    expect(parsed.version).toBe("2.1");
    expect(parsed.lastUpdated).toBe("2026-10-01");
    expect(parsed.notes).toBe("sample");
    expect(parsed.requirements).toEqual([
      {
        unitId: "VADER",
        unitName: "Darth Vader",
        minRelic: 5,
        path: "dark_side",
        territory: "Mustafar",
        count: 2,
        unitType: "character",
      },
      {
        unitId: "SHIP1",
        unitName: "Dark Interceptor",
        minRelic: 7,
        path: "dark_side",
        territory: "Mustafar",
        count: 1,
        unitType: "ship",
      },
    ]);
  });

  it("rejects invalid JSON", () => {
    expect(() => parseRequirements("{ nope", "reqs.json")).toThrow(DataFormatError);
  });

  it("rejects an unknown path with the offending field", () => {
    const bad = JSON.stringify({
      last_updated: "2026-10-01",
      requirements: [{ unit_id: "X", unit_name: "X", min_relic: 5, path: "sideways", territory: "Mustafar" }],
    });
    expect(() => parseRequirements(bad, "reqs.json")).toThrow(/^Malformed data from reqs\.json: requirements\.0\.path: /);
  });
});

describe("loadRequirements", () => {
  it("reads a requirements file from disk", async () => {
    const dir = await mkdtemp(join(tmpdir(), "swgoh-reqs-"));
    try {
      const path = join(dir, "reqs.json");
      await writeFile(path, sampleJson, "utf-8");
      const loaded = await loadRequirements(path);
      expect(loaded.requirements).toHaveLength(2);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("filterRequirementsByPhase", () => {
  const reqs: PlatoonRequirements = {
    version: "1.0",
    lastUpdated: "2026-10-01",
    requirements: [
      requirement({ unitId: "A", territory: "Mustafar" }), // 1
      requirement({ unitId: "B", territory: "Geonosis" }), // 2
      requirement({ unitId: "C", territory: "Zeffo" }), // 3b
      requirement({ unitId: "D", territory: "Lothal" }), // 4
      requirement({ unitId: "E", territory: "Nowhere" }), // no phase
    ],
  };

  it("keeps phases up to and including the limit", () => {
    expect(filterRequirementsByPhase(reqs, "2").requirements.map((r) => r.unitId)).toEqual(["A", "B"]);
  });

  it("includes bonus phases in play order", () => {
    expect(filterRequirementsByPhase(reqs, "3b").requirements.map((r) => r.unitId)).toEqual(["A", "B", "C"]);
  });

  it("drops territories without a phase", () => {
    expect(filterRequirementsByPhase(reqs, "6").requirements.map((r) => r.unitId)).toEqual(["A", "B", "C", "D"]);
  });

  it("keeps the other fields", () => {
    const filtered = filterRequirementsByPhase(reqs, "1");
    expect(filtered.version).toBe("1.0");
    expect(filtered.lastUpdated).toBe("2026-10-01");
  });

  it("warns and returns everything for an unknown phase", () => {
    const onWarning = vi.fn();
    const result = filterRequirementsByPhase(reqs, "7", { onWarning });
    expect(result).toBe(reqs);
    expect(onWarning).toHaveBeenCalledWith("Unknown phase '7', using all phases.");
  });
});

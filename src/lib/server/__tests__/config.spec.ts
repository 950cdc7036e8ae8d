import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConfigurationError, loadConfig, parseConfig } from "@/lib/server/config";

const valid = {
  spreadsheet_id: "test-spreadsheet",
  service_account_file: "sa.json",
  players_file: "players.json",
  league_ids: { "2024": "L24", "2022": "", "2023": "L23", "2021": null },
};

describe("parseConfig", () => {
  it("sorts leagues by year and skips empty ids", () => {
    const config = parseConfig(valid);
    expect(config.leagues).toEqual([
      { year: 2023, leagueId: "L23" },
      { year: 2024, leagueId: "L24" },
    ]);
    expect(config.ledger).toEqual({
      backend: "file",
      marginsFile: "processed_weeks_margins.txt",
      highScorerFile: "processed_weeks_high_scorer.txt",
    });
    expect(config.currentYear).toBeUndefined();
  });

  it("reads optional settings", () => {
    const config = parseConfig({
      ...valid,
      current_year: 2023,
      request_timeout_ms: 5000,
      ledger: { backend: "postgres" },
    });
    expect(config.currentYear).toBe(2023);
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.ledger.backend).toBe("postgres");
  });

  it("rejects a missing spreadsheet id", () => {
    const { spreadsheet_id: _omit, ...rest } = valid;
    expect(() => parseConfig(rest)).toThrow(ConfigurationError);
    expect(() => parseConfig(rest)).toThrow(/spreadsheet_id/);
  });

  it("rejects league keys that are not years", () => {
    expect(() => parseConfig({ ...valid, league_ids: { "24": "L24" } })).toThrow(/4-digit years/);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "sync-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("fails on a missing file", async () => {
    await expect(loadConfig(path.join(dir, "config.json"))).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("fails on invalid JSON", async () => {
    const file = path.join(dir, "config.json");
    await writeFile(file, "{ not json", "utf8");
    await expect(loadConfig(file)).rejects.toThrow(/not valid JSON/);
  });

  it("fails when the service account file is missing", async () => {
    const file = path.join(dir, "config.json");
    await writeFile(file, JSON.stringify({ ...valid, service_account_file: path.join(dir, "sa.json") }), "utf8");
    await expect(loadConfig(file)).rejects.toThrow(/is not readable/);
  });

  it("loads a complete configuration", async () => {
    const file = path.join(dir, "config.json");
    const keyFile = path.join(dir, "sa.json");
    await writeFile(keyFile, "{}", "utf8");
    await writeFile(file, JSON.stringify({ ...valid, service_account_file: keyFile }), "utf8");

    const config = await loadConfig(file);

    expect(config.spreadsheetId).toBe("test-spreadsheet");
    expect(config.serviceAccountFile).toBe(keyFile);
    expect(config.leagues.map((l) => l.year)).toEqual([2023, 2024]);
  });
});

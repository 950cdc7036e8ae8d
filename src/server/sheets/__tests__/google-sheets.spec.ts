import { describe, it, expect } from "vitest";
import type { sheets_v4 } from "googleapis";
import { GoogleSheetsClient, SHEETS_SCOPE, quoteTitle, type SpreadsheetsApi } from "@/server/sheets/google-sheets";

interface Call {
  method: string;
  params: unknown;
}

function stubApi(init: { sheets?: sheets_v4.Schema$Sheet[]; values?: unknown[][] | null } = {}) {
  const calls: Call[] = [];
  const api: SpreadsheetsApi = {
    spreadsheets: {
      get: async (params) => {
        calls.push({ method: "get", params });
        return { data: { sheets: init.sheets } };
      },
      batchUpdate: async (params) => {
        calls.push({ method: "batchUpdate", params });
        return {};
      },
      values: {
        get: async (params) => {
          calls.push({ method: "values.get", params });
          return { data: { values: init.values } };
        },
        clear: async (params) => {
          calls.push({ method: "values.clear", params });
          return {};
        },
        update: async (params) => {
          calls.push({ method: "values.update", params });
          return {};
        },
        append: async (params) => {
          calls.push({ method: "values.append", params });
          return {};
        },
      },
    },
  };
  return { api, calls };
}

const SEASON_TAB = "2023 Season - Weekly Points";

describe("quoteTitle", () => {
  it("quotes titles and doubles embedded quotes", () => {
    expect(quoteTitle(SEASON_TAB)).toBe("'2023 Season - Weekly Points'");
    expect(quoteTitle("Owner's Picks")).toBe("'Owner''s Picks'");
  });
});

describe("GoogleSheetsClient", () => {
  it("authorizes for read-write spreadsheet access", () => {
    expect(SHEETS_SCOPE).toBe("https://www.googleapis.com/auth/spreadsheets");
  });

  it("lists tab titles and skips tabs without one", async () => {
    const { api, calls } = stubApi({
      sheets: [{ properties: { title: SEASON_TAB } }, { properties: {} }, { properties: { title: "Largest Margin" } }],
    });
    const client = new GoogleSheetsClient(api, "test-spreadsheet");

    expect(await client.listSheets()).toEqual([SEASON_TAB, "Largest Margin"]);
    expect(calls).toEqual([
      { method: "get", params: { spreadsheetId: "test-spreadsheet", fields: "sheets.properties.title" } },
    ]);
  });

  it("returns no tabs for an empty spreadsheet", async () => {
    const { api } = stubApi();
    expect(await new GoogleSheetsClient(api, "test-spreadsheet").listSheets()).toEqual([]);
  });

  it("adds a tab by title", async () => {
    const { api, calls } = stubApi();
    await new GoogleSheetsClient(api, "test-spreadsheet").addSheet("Smallest Margin");

    expect(calls).toEqual([
      {
        method: "batchUpdate",
        params: {
          spreadsheetId: "test-spreadsheet",
          requestBody: { requests: [{ addSheet: { properties: { title: "Smallest Margin" } } }] },
        },
      },
    ]);
  });

  it("reads a whole tab and normalizes cells", async () => {
    const { api, calls } = stubApi({ values: [["Year", "Week"], ["2023", 4, null, true]] });
    const rows = await new GoogleSheetsClient(api, "test-spreadsheet").readValues(SEASON_TAB);

    expect(rows).toEqual([["Year", "Week"], ["2023", 4, "", "true"]]);
    expect(calls).toEqual([
      { method: "values.get", params: { spreadsheetId: "test-spreadsheet", range: "'2023 Season - Weekly Points'" } },
    ]);
  });

  it("reads an empty tab as no rows", async () => {
    const { api } = stubApi({ values: null });
    expect(await new GoogleSheetsClient(api, "test-spreadsheet").readValues("Largest Margin")).toEqual([]);
  });

  it("clears and writes from A1 with raw input", async () => {
    const { api, calls } = stubApi();
    const client = new GoogleSheetsClient(api, "test-spreadsheet");

    await client.clearValues(SEASON_TAB);
    await client.writeValues(SEASON_TAB, [["User ID", "Display Name"], ["u1", "alpha"]]);

    expect(calls).toEqual([
      { method: "values.clear", params: { spreadsheetId: "test-spreadsheet", range: "'2023 Season - Weekly Points'" } },
      {
        method: "values.update",
        params: {
          spreadsheetId: "test-spreadsheet",
          range: "'2023 Season - Weekly Points'!A1",
          valueInputOption: "RAW",
          requestBody: { values: [["User ID", "Display Name"], ["u1", "alpha"]] },
        },
      },
    ]);
  });

  it("appends rows as inserted rows", async () => {
    const { api, calls } = stubApi();
    await new GoogleSheetsClient(api, "test-spreadsheet").appendValues("Owner's Picks", [[2023, 1, "alpha"]]);

    expect(calls).toEqual([
      {
        method: "values.append",
        params: {
          spreadsheetId: "test-spreadsheet",
          range: "'Owner''s Picks'!A1",
          valueInputOption: "RAW",
          insertDataOption: "INSERT_ROWS",
          requestBody: { values: [[2023, 1, "alpha"]] },
        },
      },
    ]);
  });
});

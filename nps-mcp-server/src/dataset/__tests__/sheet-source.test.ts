import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { parseWorkbook } from "../sheet-source.js";
import { DatasetSchemaError } from "../types.js";
import { getNpsRules } from "../../config-loader.js";

const columnMap = getNpsRules().dataset.columns;

function workbookOf(rows: unknown[][]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), "raw");
  return workbook;
}

describe("parseWorkbook", () => {
  it("reads the first worksheet through the column map", () => {
    const dataset = parseWorkbook(
      workbookOf([
        ["처리일", "추천지수", "담당자ID", "담당자", "대리점명", "매장명", "마케팅팀명", "시니어여부", "제외"],
        ["2026-01-15", 10, "A1", "김하나", "한빛대리점", "강남점", "인천마케팅팀", "Y", "N"],
        ["2026-01-16", 3, "A2", "이두리", "한빛대리점", "강남점", "인천마케팅팀", "N", "Y"],
        ["2026-01-17", 7, "A2", "이두리", "한빛대리점", "강남점", "인천마케팅팀", "N", "N"],
      ]),
      columnMap
    );

    expect(dataset.columns).toContain("is_senior");
    expect(dataset.rows).toEqual([
      {
        processed_date: "2026-01-15",
        score: 10,
        agent_id: "A1",
        agent_name: "김하나",
        dealer_name: "한빛대리점",
        store_name: "강남점",
        team: "인천마케팅팀",
        is_senior: true,
      },
      {
        processed_date: "2026-01-17",
        score: 7,
        agent_id: "A2",
        agent_name: "이두리",
        dealer_name: "한빛대리점",
        store_name: "강남점",
        team: "인천마케팅팀",
        is_senior: false,
      },
    ]);
  });

  it("reports the columns a narrower export carries", () => {
    const dataset = parseWorkbook(
      workbookOf([
        ["추천지수", "담당자ID", "매장명"],
        [9, "A1", "강남점"],
      ]),
      columnMap
    );
    expect(dataset.columns).toEqual(["score", "agent_id", "store_name"]);
    expect(dataset.rows[0].processed_date).toBeNull();
  });

  it("rejects an export without required columns", () => {
    expect(() => parseWorkbook(workbookOf([["매장명"], ["강남점"]]), columnMap)).toThrow(DatasetSchemaError);
  });

  it("rejects a workbook without sheets", () => {
    expect(() => parseWorkbook(XLSX.utils.book_new(), columnMap)).toThrow("contains no worksheet");
  });
});

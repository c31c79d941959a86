import { describe, it, expect } from "vitest";
import {
  groupBy,
  sortBy,
  ascending,
  descending,
  byText,
  statusColumns,
  shareOf,
  tiedAtMinimum,
} from "../grouping.js";
import { classifyStatus } from "../status.js";

describe("classifyStatus", () => {
  it.each([
    [5, "excellent"],
    [12.3, "excellent"],
    [0, "good"],
    [4.9, "good"],
    [-0.1, "caution"],
    [-5, "caution"],
    [-5.1, "needs_improvement"],
  ] as const)("bands %d as %s", (delta, band) => {
    expect(classifyStatus(delta)).toBe(band);
  });

  it("honours a custom band width", () => {
    expect(classifyStatus(5, 10)).toBe("good");
    expect(classifyStatus(-7, 10)).toBe("caution");
  });
});

describe("statusColumns", () => {
  it("bands the raw delta and rounds only the display", () => {
    // -5.04 displays as -5.0 but lies past the caution band
    expect(statusColumns(-5.04)).toEqual({
      vs_store_value: -5,
      vs_store: "-5.0%",
      status: "needs_improvement",
      status_label: "🔴 개선필요",
    });
  });

  it("keeps a delta just inside the band edge in that band", () => {
    expect(statusColumns(-4.96)).toEqual({
      vs_store_value: -5,
      vs_store: "-5.0%",
      status: "caution",
      status_label: "🟠 주의",
    });
    expect(statusColumns(4.96).status).toBe("good");
  });

  it("labels the top band", () => {
    expect(statusColumns(7.25).status_label).toBe("🟢 우수");
    expect(statusColumns(7.25).vs_store).toBe("7.3%");
  });
});

describe("groupBy", () => {
  it("keeps first-seen key order and item order", () => {
    const rows = [
      { store: "강남점", id: 1 },
      { store: "역삼점", id: 2 },
      { store: "강남점", id: 3 },
    ];
    const groups = groupBy(rows, r => [r.store]);
    expect([...groups.keys()]).toEqual(['["강남점"]', '["역삼점"]']);
    expect(groups.get('["강남점"]')?.map(r => r.id)).toEqual([1, 3]);
  });

  it("separates composite keys that would collide when concatenated", () => {
    const groups = groupBy([{ a: "ab", b: "c" }, { a: "a", b: "bc" }], r => [r.a, r.b]);
    expect(groups.size).toBe(2);
  });
});

describe("sortBy", () => {
  const rows = [
    { name: "b", score: 1 },
    { name: "a", score: 2 },
    { name: "c", score: 1 },
  ];

  it("applies comparators in priority order", () => {
    const sorted = sortBy(rows, ascending(r => r.score), byText(r => r.name));
    expect(sorted.map(r => r.name)).toEqual(["b", "c", "a"]);
  });

  it("is stable and does not mutate the input", () => {
    const sorted = sortBy(rows, descending(r => r.score));
    expect(sorted.map(r => r.name)).toEqual(["a", "b", "c"]);
    expect(rows[0].name).toBe("b");
  });
});

describe("shareOf", () => {
  it("is a one-decimal percentage", () => {
    expect(shareOf(1, 3)).toBe(33.3);
    expect(shareOf(2, 3)).toBe(66.7);
  });

  it("is 0 for an empty parent", () => {
    expect(shareOf(0, 0)).toBe(0);
  });
});

describe("tiedAtMinimum", () => {
  it("returns every row at the minimum in order", () => {
    const rows = [{ id: "x", v: 3 }, { id: "y", v: 1 }, { id: "z", v: 1 }];
    expect(tiedAtMinimum(rows, r => r.v).map(r => r.id)).toEqual(["y", "z"]);
  });

  it("is empty for no rows", () => {
    expect(tiedAtMinimum([], () => 0)).toEqual([]);
  });
});

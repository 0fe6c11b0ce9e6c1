import { describe, expect, test } from "vitest";
import { buildDashboard, parseYearsParam } from "./dashboard";
import { prepareTable } from "./prepare";
import type { DashboardView, MetricId } from "./types";

function sampleTable() {
  return prepareTable({
    columns: ["CS_SEXO", "DT_NOTIFIC", "DT_NASC", "VIOL_FISIC", "AUTOR_ALCO"],
    rows: [
      { CS_SEXO: 2, DT_NOTIFIC: "2019-06-01", DT_NASC: null, VIOL_FISIC: null, AUTOR_ALCO: null },
      { CS_SEXO: 2, DT_NOTIFIC: "2020-06-01", DT_NASC: "2010-01-01", VIOL_FISIC: 1, AUTOR_ALCO: 1 },
      { CS_SEXO: 2, DT_NOTIFIC: "2020-06-01", DT_NASC: "1990-01-01", VIOL_FISIC: 2, AUTOR_ALCO: 2 },
      { CS_SEXO: 2, DT_NOTIFIC: "2021-06-01", DT_NASC: null, VIOL_FISIC: null, AUTOR_ALCO: null },
      { CS_SEXO: 2, DT_NOTIFIC: "2022-06-01", DT_NASC: "1995-06-01", VIOL_FISIC: 1, AUTOR_ALCO: 9 },
      { CS_SEXO: 1, DT_NOTIFIC: "2022-06-01", DT_NASC: "1995-06-01", VIOL_FISIC: 1, AUTOR_ALCO: 1 },
    ],
  });
}

function metric(view: DashboardView, id: MetricId) {
  return view.metrics.find((m) => m.id === id)?.value;
}

describe("buildDashboard", () => {
  test("all years are selected by default", () => {
    const view = buildDashboard(sampleTable());
    expect(view.availableYears).toEqual([2019, 2020, 2021, 2022]);
    expect(view.selectedYears).toEqual([2019, 2020, 2021, 2022]);
    expect(metric(view, "totalCases")).toBe(5);
    expect(view.totalRows).toBe(5);
  });

  test("year selection restricts every metric", () => {
    const view = buildDashboard(sampleTable(), [2020, 2022]);
    expect(view.selectedYears).toEqual([2020, 2022]);
    expect(metric(view, "totalCases")).toBe(3);
    expect(metric(view, "physicalViolence")).toBe(2);
    expect(metric(view, "alcoholSuspicion")).toBe("33.3%");
    expect(metric(view, "topAgeBracket")).toBe("Adult (25-59)");
  });

  test("years missing from the table are dropped from the selection", () => {
    const view = buildDashboard(sampleTable(), [2020, 2030]);
    expect(view.selectedYears).toEqual([2020]);
    expect(metric(view, "totalCases")).toBe(2);
  });

  test("an empty selection shows zeros and placeholders", () => {
    const view = buildDashboard(sampleTable(), []);
    expect(metric(view, "totalCases")).toBe(0);
    expect(metric(view, "physicalViolence")).toBe(0);
    expect(metric(view, "alcoholSuspicion")).toBe("0.0%");
    expect(metric(view, "topAgeBracket")).toBeNull();
  });

  test("charts without source columns are omitted", () => {
    const view = buildDashboard(sampleTable(), [2020, 2022]);
    expect(view.charts.map((c) => c.id)).toEqual([
      "notificationsByYear",
      "ageBrackets",
      "violenceTypes",
      "alcoholUse",
    ]);
  });

  test("chart data for the selection", () => {
    const view = buildDashboard(sampleTable(), [2022, 2020]);
    const byId = new Map(view.charts.map((c) => [c.id, c.data]));

    expect(byId.get("notificationsByYear")).toEqual([
      { label: "2020", count: 2 },
      { label: "2022", count: 1 },
    ]);
    expect(byId.get("ageBrackets")).toEqual([
      { label: "Child (0-9)", count: 0 },
      { label: "Adolescent (10-19)", count: 1 },
      { label: "Young adult (20-24)", count: 0 },
      { label: "Adult (25-59)", count: 2 },
      { label: "Elderly (60+)", count: 0 },
    ]);
    expect(byId.get("violenceTypes")).toEqual([{ label: "Physical", count: 2 }]);
    expect(byId.get("alcoholUse")).toEqual([
      { label: "Yes", count: 1 },
      { label: "No", count: 1 },
      { label: "Ignored", count: 1 },
    ]);
  });

  test("metrics depending on missing columns are null", () => {
    const table = prepareTable({
      columns: ["DT_NOTIFIC"],
      rows: [{ DT_NOTIFIC: "2020-01-01" }],
    });
    const view = buildDashboard(table);
    expect(metric(view, "totalCases")).toBe(1);
    expect(metric(view, "physicalViolence")).toBeNull();
    expect(metric(view, "alcoholSuspicion")).toBeNull();
    expect(view.charts.map((c) => c.id)).toEqual(["notificationsByYear"]);
  });

  test("indicator families, violence order and perpetrator charts", () => {
    const table = prepareTable({
      columns: [
        "DT_NOTIFIC",
        "VIOL_FISIC",
        "VIOL_SEXU",
        "AG_FORCA",
        "AG_OUTROS",
        "REL_PAI",
        "REL_TRAB",
        "SIT_CONJUG",
        "AUTOR_SEXO",
      ],
      rows: [
        { DT_NOTIFIC: "2021-01-01", VIOL_FISIC: 1, VIOL_SEXU: 1, AG_FORCA: 1, AG_OUTROS: 1, REL_PAI: 1, REL_TRAB: 1, SIT_CONJUG: 1, AUTOR_SEXO: 1 },
        { DT_NOTIFIC: "2021-02-01", VIOL_FISIC: 2, VIOL_SEXU: 1, AG_FORCA: 2, AG_OUTROS: 1, REL_PAI: 2, REL_TRAB: 1, SIT_CONJUG: 1, AUTOR_SEXO: 9 },
      ],
    });
    const view = buildDashboard(table);
    const byId = new Map(view.charts.map((c) => [c.id, c]));

    expect(view.charts.map((c) => c.id)).toEqual([
      "notificationsByYear",
      "maritalStatus",
      "violenceTypes",
      "meansUsed",
      "relationship",
      "perpetratorSex",
    ]);
    expect(byId.get("violenceTypes")?.kind).toBe("horizontalBar");
    expect(byId.get("violenceTypes")?.data).toEqual([
      { label: "Physical", count: 1 },
      { label: "Sexual", count: 2 },
    ]);
    expect(byId.get("meansUsed")?.data).toEqual([{ label: "Forca", count: 1 }]);
    expect(byId.get("relationship")?.data).toEqual([{ label: "Pai", count: 1 }]);
    expect(byId.get("maritalStatus")?.data).toEqual([
      { label: "Single", count: 2 },
    ]);
    expect(byId.get("perpetratorSex")?.data).toEqual([
      { label: "Male", count: 1 },
      { label: "Ignored", count: 1 },
    ]);
  });
});

describe("parseYearsParam", () => {
  test("absent means all years", () => {
    expect(parseYearsParam(undefined)).toBeNull();
  });

  test("empty string is an empty selection", () => {
    expect(parseYearsParam("")).toEqual([]);
  });

  test("comma-separated and repeated values", () => {
    expect(parseYearsParam("2020,2022")).toEqual([2020, 2022]);
    expect(parseYearsParam(["2020", "2021,2022"])).toEqual([2020, 2021, 2022]);
  });

  test("ignores entries that are not years", () => {
    expect(parseYearsParam("20a0, 2021,x")).toEqual([2021]);
  });
});

import { useCallback, useEffect, useState } from "react";
import BarChartCard from "../components/BarChartCard";
import PieChartCard from "../components/PieChartCard";
import type {
  Chart,
  ChartSection,
  DashboardView,
  Metric,
} from "../src/types";

const SECTIONS: { id: ChartSection; title: string }[] = [
  { id: "overview", title: "Overview" },
  { id: "victim", title: "1. Victim profile" },
  { id: "violence", title: "2. Characteristics of the violence" },
  { id: "perpetrator", title: "3. Profile of the probable perpetrator" },
];

function isErrorBody(body: unknown): body is { error: string } {
  return (
    typeof body === "object" &&
    body !== null &&
    "error" in body &&
    typeof body.error === "string"
  );
}

function isDashboardView(body: unknown): body is DashboardView {
  return (
    typeof body === "object" &&
    body !== null &&
    "metrics" in body &&
    Array.isArray(body.metrics) &&
    "charts" in body &&
    Array.isArray(body.charts)
  );
}

function ChartView({ chart }: { chart: Chart }) {
  if (chart.kind === "pie" || chart.kind === "donut") {
    return <PieChartCard chart={chart} />;
  }
  return <BarChartCard chart={chart} />;
}

function MetricTile({ metric }: { metric: Metric }) {
  return (
    <div
      title={metric.help}
      style={{
        flex: "1 1 200px",
        border: "1px solid #e5e7eb",
        borderRadius: 8,
        padding: 12,
      }}
    >
      <div style={{ fontSize: 13, color: "#6b7280" }}>{metric.label}</div>
      <div style={{ fontSize: 28, fontWeight: 700 }}>{metric.value ?? "-"}</div>
    </div>
  );
}

export default function Home() {
  const [view, setView] = useState<DashboardView | null>(null);
  const [selectedYears, setSelectedYears] = useState<number[] | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const loadDashboard = useCallback(async (years: number[] | null) => {
    setLoading(true);
    setError(null);

    try {
      const query =
        years === null ? "" : `?years=${encodeURIComponent(years.join(","))}`;
      const res = await fetch(`/api/dashboard${query}`);
      const body: unknown = await res.json();

      if (!res.ok) {
        throw new Error(isErrorBody(body) ? body.error : `HTTP ${res.status}`);
      }
      if (!isDashboardView(body)) throw new Error("Unexpected response shape");

      setView(body);
    } catch (e) {
      setError(e instanceof Error ? e.message : "Failed to load dashboard");
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    void loadDashboard(selectedYears);
  }, [loadDashboard, selectedYears]);

  function toggleYear(year: number): void {
    const current = selectedYears ?? view?.availableYears ?? [];
    const next = current.includes(year)
      ? current.filter((y) => y !== year)
      : [...current, year].sort((a, b) => a - b);
    setSelectedYears(next);
  }

  if (!view) {
    return (
      <main style={{ padding: 24, fontFamily: "system-ui, sans-serif" }}>
        <h1>Violence Monitoring Dashboard</h1>
        {loading ? <p>Loading…</p> : null}
        {error ? (
          <div
            style={{
              padding: 12,
              background: "#fef3c7",
              border: "1px solid #f59e0b",
            }}
          >
            <strong>Awaiting data.</strong>
            <p style={{ color: "crimson" }}>
              Error: <code>{error}</code>
            </p>
          </div>
        ) : null}
      </main>
    );
  }

  return (
    <div style={{ display: "flex", fontFamily: "system-ui, sans-serif" }}>
      <aside
        style={{
          width: 200,
          padding: 16,
          borderRight: "1px solid #e5e7eb",
          minHeight: "100vh",
        }}
      >
        <h2>Filters</h2>
        <fieldset style={{ border: "none", padding: 0 }}>
          <legend>Select the year</legend>
          {view.availableYears.map((year) => (
            <div key={year}>
              <label>
                <input
                  type="checkbox"
                  checked={view.selectedYears.includes(year)}
                  onChange={() => toggleYear(year)}
                  disabled={loading}
                />{" "}
                {year}
              </label>
            </div>
          ))}
        </fieldset>
      </aside>

      <main style={{ flex: 1, padding: 24 }}>
        <h1>{view.title}</h1>
        <p>
          <strong>{view.sourceNote}</strong>
        </p>
        {error ? (
          <p style={{ color: "crimson" }}>
            Error: <code>{error}</code>
          </p>
        ) : null}
        <hr />

        <section style={{ display: "flex", gap: 12, flexWrap: "wrap" }}>
          {view.metrics.map((m) => (
            <MetricTile key={m.id} metric={m} />
          ))}
        </section>

        {SECTIONS.map((section) => {
          const charts = view.charts.filter((c) => c.section === section.id);
          if (charts.length === 0) return null;
          return (
            <section key={section.id} style={{ marginTop: 24 }}>
              <h3>{section.title}</h3>
              <div
                style={{
                  display: "grid",
                  gridTemplateColumns: `repeat(${Math.min(charts.length, 3)}, minmax(0, 1fr))`,
                  gap: 16,
                }}
              >
                {charts.map((c) => (
                  <ChartView key={c.id} chart={c} />
                ))}
              </div>
            </section>
          );
        })}

        <hr style={{ marginTop: 24 }} />
        <p style={{ color: "#374151" }}>{view.footerNote}</p>
      </main>
    </div>
  );
}

import React from "react";
import {
  ResponsiveContainer,
  PieChart,
  Pie,
  Cell,
  Tooltip,
  Legend,
} from "recharts";
import type { Chart } from "../src/types";

type Props = {
  chart: Chart;
  height?: number;
  outerRadius?: number;
};

const PALETTE = [
  "#B2182B",
  "#D6604D",
  "#F4A582",
  "#92C5DE",
  "#4393C3",
  "#2166AC",
  "#D3D3D3",
];

const PieChartCard: React.FC<Props> = ({
  chart,
  height = 320,
  outerRadius = 100,
}) => {
  const data = chart.data.map((d, i) => ({
    name: d.label,
    value: d.count,
    color: chart.colorMap?.[d.label] ?? PALETTE[i % PALETTE.length],
  }));
  // Donuts keep a 40% hole.
  const innerRadius = chart.kind === "donut" ? outerRadius * 0.4 : 0;

  return (
    <figure style={{ margin: 0 }}>
      <figcaption>
        <strong>{chart.title}</strong>
      </figcaption>
      {data.length === 0 ? (
        <p style={{ color: "#6b7280" }}>No cases in the selected years.</p>
      ) : (
        <div style={{ width: "100%", height }}>
          <ResponsiveContainer>
            <PieChart>
              <Pie
                data={data}
                dataKey="value"
                nameKey="name"
                innerRadius={innerRadius}
                outerRadius={outerRadius}
                labelLine={false}
                label={({ percent }) =>
                  `${Math.round((percent ?? 0) * 1000) / 10}%`
                }
              >
                {data.map((entry) => (
                  <Cell key={entry.name} fill={entry.color} />
                ))}
              </Pie>
              <Tooltip />
              <Legend layout="vertical" align="right" verticalAlign="middle" />
            </PieChart>
          </ResponsiveContainer>
        </div>
      )}
    </figure>
  );
};

export default PieChartCard;

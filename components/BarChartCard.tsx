import React from "react";
import {
  ResponsiveContainer,
  BarChart,
  Bar,
  XAxis,
  YAxis,
  Tooltip,
  CartesianGrid,
  LabelList,
} from "recharts";
import type { Chart } from "../src/types";

type Props = {
  chart: Chart;
  height?: number;
};

const BarChartCard: React.FC<Props> = ({ chart, height = 320 }) => {
  const horizontal = chart.kind === "horizontalBar";
  const data = chart.data.map((d) => ({ name: d.label, value: d.count }));
  const color = chart.color ?? "#60a5fa";

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
            <BarChart
              data={data}
              layout={horizontal ? "vertical" : "horizontal"}
              margin={{ top: 16, right: 24, bottom: 24, left: horizontal ? 24 : 0 }}
            >
              <CartesianGrid strokeDasharray="3 3" />
              {horizontal ? (
                <>
                  <XAxis type="number" allowDecimals={false} />
                  <YAxis type="category" dataKey="name" width={110} />
                </>
              ) : (
                <>
                  <XAxis
                    dataKey="name"
                    interval={0}
                    angle={data.length > 5 ? -25 : 0}
                    textAnchor={data.length > 5 ? "end" : "middle"}
                    height={data.length > 5 ? 60 : 30}
                  />
                  <YAxis allowDecimals={false} />
                </>
              )}
              <Tooltip formatter={(v) => [String(v), "Cases"]} />
              <Bar dataKey="value" name={chart.categoryLabel} fill={color}>
                <LabelList
                  dataKey="value"
                  position={horizontal ? "right" : "top"}
                />
              </Bar>
            </BarChart>
          </ResponsiveContainer>
        </div>
      )}
    </figure>
  );
};

export default BarChartCard;

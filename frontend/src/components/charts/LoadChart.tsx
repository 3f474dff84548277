import * as React from "react";
import { ResponsiveContainer, LineChart, Line, CartesianGrid, XAxis, YAxis, Tooltip, Legend, ReferenceLine } from "recharts";
import { COLORS } from "@/lib/colors";
import { tickLabel, tooltipLabel } from "@/lib/format";
import type { LoadPoint } from "@/lib/types";

type Props = {
  data: LoadPoint[];
  series: "chw" | "mthw";
  name: string;
  threshold: number;
  height?: number;
};

export const LoadChart = React.memo(function LoadChart({ data, series, name, threshold, height = 320 }: Props) {
  return (
    <div style={{ height }}>
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={data}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="t" tickFormatter={tickLabel} minTickGap={24} />
          <YAxis unit=" kbtuh" width={88} />
          <Tooltip labelFormatter={tooltipLabel} />
          <Legend />
          <Line type="monotone" dataKey={series} name={name} dot={false} stroke={COLORS.lines[series]} isAnimationActive={false} />
          <ReferenceLine
            y={threshold}
            stroke={COLORS.lines.threshold}
            strokeDasharray="6 4"
            label={{ value: "Threshold", position: "insideTopRight", fill: COLORS.lines.threshold, fontSize: 11 }}
          />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
});

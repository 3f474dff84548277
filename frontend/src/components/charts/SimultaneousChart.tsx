import * as React from "react";
import { ResponsiveContainer, ComposedChart, Line, CartesianGrid, XAxis, YAxis, Tooltip, Legend, ReferenceLine } from "recharts";
import { COLORS } from "@/lib/colors";
import { tickLabel, tooltipLabel } from "@/lib/format";
import type { LoadPoint } from "@/lib/types";

// Markers are a stroke-less line: Line skips dots whose value is null.
export const SimultaneousChart = React.memo(function SimultaneousChart({
  data,
  threshold,
  height = 380,
}: {
  data: LoadPoint[];
  threshold: number;
  height?: number;
}) {
  return (
    <div style={{ height }}>
      <ResponsiveContainer width="100%" height="100%">
        <ComposedChart data={data}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="t" tickFormatter={tickLabel} minTickGap={24} />
          <YAxis unit=" kbtuh" width={88} />
          <Tooltip labelFormatter={tooltipLabel} />
          <Legend />
          <Line type="monotone" dataKey="chw" name="CHW" dot={false} stroke={COLORS.lines.chw} strokeOpacity={0.7} isAnimationActive={false} />
          <Line type="monotone" dataKey="mthw" name="MTHW" dot={false} stroke={COLORS.lines.mthw} strokeOpacity={0.7} isAnimationActive={false} />
          <Line
            dataKey="highlight"
            name="Simultaneous H+C"
            stroke="none"
            legendType="circle"
            dot={{ r: 3, fill: COLORS.markers.simultaneous, stroke: COLORS.markers.simultaneous }}
            activeDot={false}
            isAnimationActive={false}
          />
          <ReferenceLine y={threshold} stroke={COLORS.lines.threshold} strokeDasharray="6 4" />
        </ComposedChart>
      </ResponsiveContainer>
    </div>
  );
});

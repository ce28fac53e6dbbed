"use client";

import type { StandingRow } from "@/types/league";
import { buildPointsChart } from "@/lib/charts";

const HEIGHT = 380;
const MARGIN = { top: 20, right: 16, bottom: 120, left: 44 };
const BAR_STEP = 36;
const GRID_LINES = 4;

interface PointsBarChartProps {
  rows: StandingRow[];
  title?: string;
}

export function PointsBarChart({ rows, title = "Points par équipe" }: PointsBarChartProps) {
  const { bars, maxPoints } = buildPointsChart(rows);
  const plotHeight = HEIGHT - MARGIN.top - MARGIN.bottom;
  const width = Math.max(480, MARGIN.left + MARGIN.right + bars.length * BAR_STEP);
  const scale = maxPoints > 0 ? plotHeight / maxPoints : 0;
  const baseline = MARGIN.top + plotHeight;

  return (
    <figure className="overflow-x-auto rounded-xl border border-[#1F4641] bg-[#0F2F2B] p-4">
      <figcaption className="mb-2 text-sm font-medium text-[#9CA3AF]">{title}</figcaption>
      <svg width={width} height={HEIGHT} role="img" aria-label={title}>
        {Array.from({ length: GRID_LINES + 1 }, (_, i) => {
          const value = Math.round((maxPoints * i) / GRID_LINES);
          const y = baseline - value * scale;
          return (
            <g key={i}>
              <line x1={MARGIN.left} x2={width - MARGIN.right} y1={y} y2={y} stroke="#1F4641" />
              <text x={MARGIN.left - 6} y={y + 4} textAnchor="end" fontSize={11} fill="#9CA3AF">
                {value}
              </text>
            </g>
          );
        })}
        {bars.map((bar, i) => {
          const x = MARGIN.left + i * BAR_STEP + 6;
          const h = bar.points * scale;
          const labelX = x + (BAR_STEP - 12) / 2;
          return (
            <g key={bar.team}>
              <rect
                data-team={bar.team}
                x={x}
                y={baseline - h}
                width={BAR_STEP - 12}
                height={h}
                rx={3}
                fill="#10b981"
              >
                <title>{`${bar.team} : ${bar.points} pts`}</title>
              </rect>
              <text
                x={labelX}
                y={baseline + 12}
                transform={`rotate(-45 ${labelX} ${baseline + 12})`}
                textAnchor="end"
                fontSize={11}
                fill="#F9FAFB"
              >
                {bar.team}
              </text>
            </g>
          );
        })}
      </svg>
    </figure>
  );
}

"use client";

import {
  radarPoint,
  radarPolygon,
  toSvgPoints,
  type TeamComparison,
} from "@/lib/charts";

const SIZE = 420;
const RADIUS = 140;
const RINGS = 4;
const CENTER = { x: SIZE / 2, y: SIZE / 2 };

export function TeamRadarChart({ comparison }: { comparison: TeamComparison }) {
  const { categories, series, radialMax, title } = comparison;
  const count = categories.length;

  return (
    <figure className="rounded-xl border border-[#1F4641] bg-[#0F2F2B] p-4">
      <figcaption className="mb-2 text-sm font-medium text-[#F9FAFB]">{title}</figcaption>
      <svg viewBox={`0 0 ${SIZE} ${SIZE}`} className="mx-auto w-full max-w-md" role="img" aria-label={title}>
        {Array.from({ length: RINGS }, (_, ring) => {
          const distance = (RADIUS * (ring + 1)) / RINGS;
          const ringPoints = categories.map((_, i) => radarPoint(i, count, distance, CENTER));
          return (
            <g key={ring}>
              <polygon points={toSvgPoints(ringPoints)} fill="none" stroke="#1F4641" />
              <text x={CENTER.x + 4} y={CENTER.y - distance + 12} fontSize={10} fill="#6B7280">
                {Math.round((radialMax * (ring + 1)) / RINGS)}
              </text>
            </g>
          );
        })}
        {categories.map((label, i) => {
          const end = radarPoint(i, count, RADIUS, CENTER);
          const labelPos = radarPoint(i, count, RADIUS + 22, CENTER);
          const anchor = Math.abs(labelPos.x - CENTER.x) < 1 ? "middle" : labelPos.x > CENTER.x ? "start" : "end";
          return (
            <g key={label}>
              <line x1={CENTER.x} y1={CENTER.y} x2={end.x} y2={end.y} stroke="#1F4641" />
              <text x={labelPos.x} y={labelPos.y + 4} textAnchor={anchor} fontSize={11} fill="#9CA3AF">
                {label}
              </text>
            </g>
          );
        })}
        {series.map((s, index) => (
          <polygon
            key={`${index}-${s.team}`}
            data-team={s.team}
            points={toSvgPoints(radarPolygon(s.values, radialMax, RADIUS, CENTER))}
            fill={s.color}
            fillOpacity={0.3}
            stroke={s.color}
            strokeWidth={2}
          >
            <title>{s.team}</title>
          </polygon>
        ))}
      </svg>
      <ul className="mt-3 flex flex-wrap justify-center gap-4 text-sm text-[#F9FAFB]">
        {series.map((s, index) => (
          <li key={`${index}-${s.team}`} className="flex items-center gap-2">
            <span className="inline-block h-3 w-3 rounded-sm" style={{ backgroundColor: s.color }} aria-hidden />
            {s.team}
          </li>
        ))}
      </ul>
    </figure>
  );
}

import { useMemo } from "react";
import type { PointPair } from "../../ClosestPair";
import type { Point } from "../../points";

export const DEFAULT_TITLE = "Closest Pair of Points (Divide & Conquer)";

const PAD = 50;
const GRID_DIVISIONS = 5;

export type ClosestPairPlotProps = {
  points: readonly Point[];
  pair: PointPair | null;
  width?: number;
  height?: number;
  title?: string;
};

type Bounds = { minX: number; minY: number; spanX: number; spanY: number };

function round2(v: number) {
  return Math.round(v * 100) / 100;
}

function boundsOf(points: readonly Point[]): Bounds {
  if (points.length === 0) return { minX: 0, minY: 0, spanX: 1, spanY: 1 };
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  // a single point, or all on one line, still needs a non-zero span
  return { minX, minY, spanX: maxX - minX || 1, spanY: maxY - minY || 1 };
}

export default function ClosestPairPlot({
  points,
  pair,
  width = 600,
  height = 600,
  title = DEFAULT_TITLE,
}: ClosestPairPlotProps) {
  const bounds = useMemo(() => boundsOf(points), [points]);
  const innerW = width - 2 * PAD;
  const innerH = height - 2 * PAD;

  // y grows upwards in data space, downwards in SVG
  const sx = (x: number) => round2(PAD + ((x - bounds.minX) / bounds.spanX) * innerW);
  const sy = (y: number) => round2(height - PAD - ((y - bounds.minY) / bounds.spanY) * innerH);

  const grid = Array.from({ length: GRID_DIVISIONS + 1 }, (_, i) => i / GRID_DIVISIONS);

  return (
    <svg xmlns="http://www.w3.org/2000/svg" width={width} height={height} viewBox={`0 0 ${width} ${height}`}>
      <rect width={width} height={height} fill="white" />
      <g className="grid" stroke="#e5e7eb">
        {grid.map((t) => (
          <line key={`v${t}`} x1={round2(PAD + t * innerW)} y1={PAD} x2={round2(PAD + t * innerW)} y2={height - PAD} />
        ))}
        {grid.map((t) => (
          <line key={`h${t}`} x1={PAD} y1={round2(PAD + t * innerH)} x2={width - PAD} y2={round2(PAD + t * innerH)} />
        ))}
      </g>
      <text x={width / 2} y={PAD / 2} textAnchor="middle" fontSize={16}>
        {title}
      </text>
      <text x={width / 2} y={height - PAD / 4} textAnchor="middle" fontSize={12}>
        X
      </text>
      <text x={PAD / 4} y={height / 2} textAnchor="middle" fontSize={12}>
        Y
      </text>
      {points.map((p, i) => (
        <circle key={i} cx={sx(p.x)} cy={sy(p.y)} r={3} fill="blue" className="point" />
      ))}
      {pair && (
        <g className="pair">
          <line
            x1={sx(pair[0].x)}
            y1={sy(pair[0].y)}
            x2={sx(pair[1].x)}
            y2={sy(pair[1].y)}
            stroke="red"
            strokeDasharray="6 4"
            className="pair-line"
          />
          {pair.map((p, i) => (
            <circle key={i} cx={sx(p.x)} cy={sy(p.y)} r={5} fill="red" className="pair-point" />
          ))}
        </g>
      )}
      <g className="legend" fontSize={12}>
        <circle cx={width - PAD - 90} cy={PAD / 2} r={3} fill="blue" />
        <text x={width - PAD - 80} y={PAD / 2 + 4}>
          Points
        </text>
        {pair && <circle cx={width - PAD - 90} cy={PAD / 2 + 16} r={5} fill="red" />}
        {pair && (
          <text x={width - PAD - 80} y={PAD / 2 + 20}>
            Closest Pair
          </text>
        )}
      </g>
    </svg>
  );
}

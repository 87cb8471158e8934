import type { GeoPoint } from '@/types/incidents';

import { categoryColors } from '@/lib/chartColors';

type GeoScatterProps = {
  points: GeoPoint[];
  width?: number;
  height?: number;
  legendLimit?: number;
};

const PADDING = 12;
const OTHER_LABEL = 'Other';

function legendLabels(points: GeoPoint[], limit: number): string[] {
  const counts = new Map<string, number>();
  for (const point of points) {
    if (!point.primaryType) continue;
    counts.set(point.primaryType, (counts.get(point.primaryType) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([label]) => label);
}

export default function GeoScatter({ points, width = 720, height = 640, legendLimit = 9 }: GeoScatterProps) {
  if (points.length === 0) {
    return <p className="muted">No geolocated incidents in this range.</p>;
  }

  let minLat = Infinity;
  let maxLat = -Infinity;
  let minLon = Infinity;
  let maxLon = -Infinity;
  for (const point of points) {
    minLat = Math.min(minLat, point.latitude);
    maxLat = Math.max(maxLat, point.latitude);
    minLon = Math.min(minLon, point.longitude);
    maxLon = Math.max(maxLon, point.longitude);
  }
  const latSpan = maxLat - minLat || 1;
  const lonSpan = maxLon - minLon || 1;

  const labels = legendLabels(points, legendLimit);
  const colors = categoryColors([...labels, OTHER_LABEL]);
  const colorOf = (type: string | null): string =>
    colors.get(type && colors.has(type) ? type : OTHER_LABEL) ?? '#9ca3af';

  const x = (lon: number) => PADDING + ((lon - minLon) / lonSpan) * (width - PADDING * 2);
  const y = (lat: number) => PADDING + ((maxLat - lat) / latSpan) * (height - PADDING * 2);

  return (
    <figure className="geo-scatter">
      <svg viewBox={`0 0 ${width} ${height}`} role="img" aria-label={`${points.length} sampled incident locations`}>
        <rect x={0} y={0} width={width} height={height} className="geo-scatter-bg" />
        {points.map((point, index) => (
          <circle
            key={index}
            cx={x(point.longitude).toFixed(1)}
            cy={y(point.latitude).toFixed(1)}
            r={1.6}
            fill={colorOf(point.primaryType)}
            fillOpacity={0.6}
          />
        ))}
      </svg>
      <figcaption className="pill-row">
        {[...labels, OTHER_LABEL].map((label) => (
          <span key={label} className="pill">
            <span className="legend-swatch" style={{ background: colorOf(label) }} aria-hidden="true" />
            {label}
          </span>
        ))}
      </figcaption>
    </figure>
  );
}

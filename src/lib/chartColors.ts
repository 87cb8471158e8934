import { scaleDiverging, scaleSequential } from 'd3-scale';
import { interpolateBlues, interpolateRdBu, interpolateYlOrRd, schemeTableau10 } from 'd3-scale-chromatic';

export type SequentialScheme = 'blues' | 'yellow-red';

const INTERPOLATORS: Record<SequentialScheme, (t: number) => string> = {
  blues: interpolateBlues,
  'yellow-red': interpolateYlOrRd,
};

const MISSING_COLOR = '#e5e7eb';

export function sequentialColor(maxValue: number, scheme: SequentialScheme): (value: number) => string {
  const scale = scaleSequential(INTERPOLATORS[scheme]).domain([0, Math.max(1, maxValue)]);
  return (value) => scale(value);
}

// Red for positive, blue for negative.
const correlationScale = scaleDiverging((t: number) => interpolateRdBu(1 - t)).domain([-1, 0, 1]);

export function correlationColor(value: number | null): string {
  return value === null ? MISSING_COLOR : correlationScale(value);
}

export function categoryColors(labels: readonly string[]): Map<string, string> {
  return new Map(labels.map((label, index) => [label, schemeTableau10[index % schemeTableau10.length]]));
}

export function readableTextColor(background: string): string {
  const match = /rgb\((\d+),\s*(\d+),\s*(\d+)\)/.exec(background);
  if (!match) return '#111827';
  const [r, g, b] = [match[1], match[2], match[3]].map((part) => Number.parseInt(part, 10));
  const luminance = (0.299 * r + 0.587 * g + 0.114 * b) / 255;
  return luminance < 0.55 ? '#f9fafb' : '#111827';
}

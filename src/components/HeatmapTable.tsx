import type { LabeledMatrix } from '@/types/incidents';

import { readableTextColor } from '@/lib/chartColors';

type HeatmapTableProps = {
  matrix: LabeledMatrix<number | null>;
  colorFor: (value: number | null) => string;
  format: (value: number) => string;
  caption: string;
  emptyLabel?: string;
};

export default function HeatmapTable({
  matrix,
  colorFor,
  format,
  caption,
  emptyLabel = 'Not enough data for this view.',
}: HeatmapTableProps) {
  if (matrix.rowLabels.length === 0 || matrix.columnLabels.length === 0) {
    return <p className="muted">{emptyLabel}</p>;
  }

  return (
    <div className="heatmap-scroll">
      <table className="heatmap">
        <caption className="sr-only">{caption}</caption>
        <thead>
          <tr>
            <th scope="col" />
            {matrix.columnLabels.map((label) => (
              <th key={label} scope="col">
                {label}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {matrix.rowLabels.map((rowLabel, rowIndex) => (
            <tr key={rowLabel}>
              <th scope="row">{rowLabel}</th>
              {matrix.columnLabels.map((columnLabel, columnIndex) => {
                const value = matrix.values[rowIndex]?.[columnIndex] ?? null;
                const background = colorFor(value);
                return (
                  <td
                    key={columnLabel}
                    style={{ background, color: readableTextColor(background) }}
                    title={`${rowLabel} / ${columnLabel}`}
                  >
                    {value === null ? 'n/a' : format(value)}
                  </td>
                );
              })}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

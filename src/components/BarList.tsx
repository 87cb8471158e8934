export type BarListItem = {
  key: string;
  label: string;
  value: number;
  display?: string;
  color?: string;
};

type BarListProps = {
  items: BarListItem[];
  emptyLabel?: string;
  maxValue?: number;
};

export default function BarList({ items, emptyLabel = 'No incidents in this range.', maxValue }: BarListProps) {
  if (items.length === 0) {
    return <p className="muted">{emptyLabel}</p>;
  }

  const max = maxValue ?? Math.max(...items.map((item) => item.value), 1);

  return (
    <ul className="bar-list">
      {items.map((item) => {
        const width = max > 0 ? Math.max(0, Math.min(100, (item.value / max) * 100)) : 0;
        return (
          <li key={item.key} className="bar-row">
            <span className="bar-label">{item.label}</span>
            <span className="bar-track" aria-hidden="true">
              <span className="bar-fill" style={{ width: `${width}%`, background: item.color }} />
            </span>
            <span className="bar-value mono">{item.display ?? item.value.toLocaleString('en-US')}</span>
          </li>
        );
      })}
    </ul>
  );
}

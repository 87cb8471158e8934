import type { YearRange } from '@/types/incidents';

type YearRangeFormProps = {
  range: YearRange;
  bounds: YearRange;
  tab: string;
};

export default function YearRangeForm({ range, bounds, tab }: YearRangeFormProps) {
  return (
    <form className="year-range-form" method="get" action="/">
      <input type="hidden" name="tab" value={tab} />
      <label>
        From
        <input type="number" name="minYear" min={bounds.minYear} max={bounds.maxYear} defaultValue={range.minYear} />
      </label>
      <label>
        To
        <input type="number" name="maxYear" min={bounds.minYear} max={bounds.maxYear} defaultValue={range.maxYear} />
      </label>
      <button type="submit">Apply</button>
    </form>
  );
}

import BarList from '@/components/BarList';
import DashboardTabs, { toDashboardTab, type DashboardTabId } from '@/components/DashboardTabs';
import GeoScatter from '@/components/GeoScatter';
import HeatmapTable from '@/components/HeatmapTable';
import YearRangeForm from '@/components/YearRangeForm';
import { correlationColor, sequentialColor } from '@/lib/chartColors';
import { getDefaultYearRange } from '@/lib/config';
import { getDashboardSnapshot, getDatasetSummary, type DashboardSnapshot } from '@/lib/dashboardQueries';
import { parseYearRangeParams, readParam } from '@/lib/queryContract';
import { TIME_PERIODS, type DataUnavailable, type YearRange } from '@/types/incidents';

type PageProps = {
  searchParams?: Promise<Record<string, string | string[] | undefined>>;
};

function maxCell(values: number[][]): number {
  let max = 0;
  for (const row of values) {
    for (const value of row) max = Math.max(max, value);
  }
  return max;
}

function UnavailableCard({ error }: { error: DataUnavailable }) {
  return (
    <section className="card" style={{ marginTop: '1rem' }}>
      <h2>Incident Data Unavailable</h2>
      <p>The dataset could not be loaded, so no charts are shown.</p>
      <dl className="kv">
        <dt>Source</dt>
        <dd className="mono">{error.source}</dd>
        <dt>Cause</dt>
        <dd>{error.cause}</dd>
      </dl>
    </section>
  );
}

function TemporalTab({ snapshot }: { snapshot: DashboardSnapshot }) {
  const yearColor = sequentialColor(Math.max(...snapshot.yearlyCounts.map((item) => item.count), 1), 'blues');
  return (
    <section className="grid" aria-label="Temporal trends">
      <article className="card">
        <h2>Yearly Impact</h2>
        <BarList
          items={snapshot.yearlyCounts.map((item) => ({
            key: String(item.year),
            label: String(item.year),
            value: item.count,
            color: yearColor(item.count),
          }))}
        />
      </article>
      <article className="card">
        <h2>Top {snapshot.topDistricts.length || ''} Police Districts</h2>
        <BarList
          items={snapshot.topDistricts.map((item) => ({
            key: item.district,
            label: `District ${item.district}`,
            value: item.count,
            color: '#1e3a8a',
          }))}
        />
      </article>
    </section>
  );
}

function SpatialTab({ snapshot, rowCount }: { snapshot: DashboardSnapshot; rowCount: number }) {
  return (
    <section className="card" style={{ marginTop: '1rem' }} aria-label="Geospatial hotspots">
      <h2>Geospatial Hotspots</h2>
      <p className="muted">
        Showing {snapshot.geoSample.length.toLocaleString('en-US')} sampled locations from{' '}
        {rowCount.toLocaleString('en-US')} incidents in range.
      </p>
      <GeoScatter points={snapshot.geoSample} />
    </section>
  );
}

function StatisticsTab({ snapshot }: { snapshot: DashboardSnapshot }) {
  const arrestItems = TIME_PERIODS.flatMap((period) => {
    const rate = snapshot.arrestRateByPeriod[period];
    return rate === undefined
      ? []
      : [{ key: period, label: period, value: rate, display: `${rate.toFixed(1)}%`, color: '#0f766e' }];
  });
  const crosstabColor = sequentialColor(maxCell(snapshot.typePeriodCrosstab.values), 'yellow-red');

  return (
    <>
      <section className="grid" aria-label="Arrest rates and crime types by time period">
        <article className="card">
          <h2>Arrest Efficiency by Time Period</h2>
          <BarList items={arrestItems} maxValue={100} />
        </article>
        <article className="card">
          <h2>Crime Type vs. Time of Day</h2>
          <HeatmapTable
            matrix={snapshot.typePeriodCrosstab}
            colorFor={(value) => crosstabColor(value ?? 0)}
            format={(value) => value.toLocaleString('en-US')}
            caption="Incident counts by primary type and time period"
          />
        </article>
      </section>
      <section className="card" style={{ marginTop: '1rem' }}>
        <h2>Crime Co-occurrence Matrix (Pearson)</h2>
        <p className="muted">
          Correlation of per-type incident counts across community area and hour buckets. Cells marked n/a have no
          variance to correlate.
        </p>
        <HeatmapTable
          matrix={snapshot.cooccurrence}
          colorFor={correlationColor}
          format={(value) => value.toFixed(2)}
          caption="Pearson correlation between primary types"
        />
      </section>
    </>
  );
}

function renderTab(tab: DashboardTabId, snapshot: DashboardSnapshot, rowCount: number) {
  switch (tab) {
    case 'temporal':
      return <TemporalTab snapshot={snapshot} />;
    case 'spatial':
      return <SpatialTab snapshot={snapshot} rowCount={rowCount} />;
    case 'statistics':
      return <StatisticsTab snapshot={snapshot} />;
  }
}

export default async function DashboardPage({ searchParams }: PageProps) {
  const params = (searchParams ? await searchParams : {}) ?? {};
  const tab = toDashboardTab(readParam(params, 'tab'));
  const defaults = getDefaultYearRange();

  const dataset = await getDatasetSummary();
  if (!dataset.available) {
    return (
      <main id="main-content">
        <UnavailableCard error={dataset.error} />
      </main>
    );
  }

  const bounds: YearRange = {
    minYear: Math.min(defaults.minYear, dataset.summary.minYear ?? defaults.minYear),
    maxYear: Math.max(defaults.maxYear, dataset.summary.maxYear ?? defaults.maxYear),
  };
  const parsedRange = parseYearRangeParams(params, defaults);
  const range = parsedRange.ok ? parsedRange.value : defaults;
  const result = await getDashboardSnapshot(range);

  return (
    <main id="main-content">
      <section className="hero" aria-labelledby="dashboard-title">
        <p className="eyebrow">
          {range.minYear}&ndash;{range.maxYear}
        </p>
        <h1 id="dashboard-title">Ten-Year Public Safety Analysis</h1>
        <p className="subtitle">
          {dataset.summary.totalRows.toLocaleString('en-US')} incident records loaded
          {dataset.summary.unknownDateRows > 0
            ? `, ${dataset.summary.unknownDateRows.toLocaleString('en-US')} with an unreadable date`
            : ''}
          .
        </p>
        <YearRangeForm range={range} bounds={bounds} tab={tab} />
        {!parsedRange.ok ? <p className="form-error">{parsedRange.error}. Showing the default range.</p> : null}
      </section>

      <DashboardTabs active={tab} range={range} />

      {result.available ? renderTab(tab, result.data, result.rowCount) : <UnavailableCard error={result.error} />}
    </main>
  );
}

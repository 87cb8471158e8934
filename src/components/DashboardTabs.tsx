import Link from 'next/link';

import type { YearRange } from '@/types/incidents';

export const DASHBOARD_TABS = [
  { id: 'temporal', label: 'Temporal Trends' },
  { id: 'spatial', label: 'Spatial Study' },
  { id: 'statistics', label: 'Statistical Correlations' },
] as const;

export type DashboardTabId = (typeof DASHBOARD_TABS)[number]['id'];

export function toDashboardTab(raw: string | null): DashboardTabId {
  const match = DASHBOARD_TABS.find((tab) => tab.id === raw);
  return match ? match.id : 'temporal';
}

type DashboardTabsProps = {
  active: DashboardTabId;
  range: YearRange;
};

export default function DashboardTabs({ active, range }: DashboardTabsProps) {
  return (
    <nav className="site-nav dashboard-tabs" aria-label="Dashboard views">
      {DASHBOARD_TABS.map((tab) => {
        const search = new URLSearchParams({
          tab: tab.id,
          minYear: String(range.minYear),
          maxYear: String(range.maxYear),
        });
        return (
          <Link key={tab.id} href={`/?${search.toString()}`} aria-current={tab.id === active ? 'page' : undefined}>
            {tab.label}
          </Link>
        );
      })}
    </nav>
  );
}

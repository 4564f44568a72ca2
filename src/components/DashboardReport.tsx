/**
 * DashboardReport - the full dashboard page body for one snapshot
 */
import { Radar } from 'lucide-react'
import type { DashboardSnapshot } from '@/types/analytics'
import { THREAT_LEVELS, THREAT_LEVEL_ORDER } from '@/lib/threat'
import { SummaryCards } from '@/components/dashboard/SummaryCards'
import { BarList } from '@/components/dashboard/BarList'
import { HourlyHeatmap } from '@/components/dashboard/HourlyHeatmap'
import { TopClassesTable } from '@/components/dashboard/TopClassesTable'
import { RecentRowsTable } from '@/components/dashboard/RecentRowsTable'

export function DashboardReport({ snapshot, generatedAt }: { snapshot: DashboardSnapshot; generatedAt: string }) {
    return (
        <main className="dashboard">
            <header className="dashboard-header">
                <Radar size={22} />
                <h1>Threat Dashboard</h1>
                <span className="muted">Generated {generatedAt}</span>
            </header>

            <SummaryCards summary={snapshot.summary} />

            <div className="grid">
                <BarList
                    title="Threat Distribution"
                    items={THREAT_LEVEL_ORDER.map((level) => ({
                        label: level,
                        value: snapshot.threatDistribution[level],
                        color: THREAT_LEVELS[level].color,
                    }))}
                />
                <BarList
                    title="Detections (Last 30 Days)"
                    items={snapshot.detectionsOverTime.map(({ date, count }) => ({ label: date, value: count }))}
                />
                <TopClassesTable classes={snapshot.topClasses} />
                <BarList
                    title="Confidence Distribution"
                    items={snapshot.confidenceHistogram.map(({ bin, count }) => ({ label: bin, value: count }))}
                />
                <HourlyHeatmap heatmap={snapshot.hourlyHeatmap} />
                <RecentRowsTable rows={snapshot.recentRows} />
            </div>
        </main>
    )
}

/**
 * SummaryCards - the four headline numbers of the dashboard
 */
import { Activity, Crosshair, ShieldAlert, Target } from 'lucide-react'
import type { LucideIcon } from 'lucide-react'
import type { DashboardSummary } from '@/types/analytics'
import { cn } from '@/lib/utils'

interface SummaryCard {
    id: string
    label: string
    value: string
    icon: LucideIcon
    alert?: boolean
}

export function SummaryCards({ summary }: { summary: DashboardSummary }) {
    const cards: SummaryCard[] = [
        { id: 'scans', label: 'Total Scans', value: summary.totalScans.toString(), icon: Activity },
        { id: 'detections', label: 'Total Detections', value: summary.totalDetections.toString(), icon: Crosshair },
        {
            id: 'critical',
            label: 'Critical Today',
            value: summary.criticalToday.toString(),
            icon: ShieldAlert,
            alert: summary.criticalToday > 0,
        },
        { id: 'top-class', label: 'Most Detected', value: summary.mostDetectedClass, icon: Target },
    ]

    return (
        <section className="cards">
            {cards.map(({ id, label, value, icon: Icon, alert }) => (
                <div key={id} className={cn('card', alert && 'card-alert')} data-card={id}>
                    <Icon className="card-icon" size={18} />
                    <div className="card-label">{label}</div>
                    <div className="card-value">{value}</div>
                </div>
            ))}
        </section>
    )
}

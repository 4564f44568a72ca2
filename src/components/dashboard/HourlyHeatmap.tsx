/**
 * HourlyHeatmap - detections per weekday and hour of day (UTC)
 */
import type { WeekdayKey } from '@/types/analytics'
import { WEEKDAYS } from '@/lib/analytics'

const HOURS = Array.from({ length: 24 }, (_, hour) => hour)

export function HourlyHeatmap({ heatmap }: { heatmap: Record<WeekdayKey, number[]> }) {
    const max = Math.max(0, ...WEEKDAYS.flatMap((day) => heatmap[day]))

    return (
        <section className="panel">
            <h2>Activity by Hour</h2>
            <table className="heatmap">
                <thead>
                    <tr>
                        <th />
                        {HOURS.map((hour) => (
                            <th key={hour}>{hour}</th>
                        ))}
                    </tr>
                </thead>
                <tbody>
                    {WEEKDAYS.map((day) => (
                        <tr key={day}>
                            <th>{day}</th>
                            {heatmap[day].map((count, hour) => (
                                <td
                                    key={hour}
                                    title={`${day} ${hour}:00 - ${count}`}
                                    style={{ opacity: max === 0 ? 0.08 : 0.08 + (count / max) * 0.92 }}
                                />
                            ))}
                        </tr>
                    ))}
                </tbody>
            </table>
        </section>
    )
}

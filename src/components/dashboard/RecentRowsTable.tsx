/**
 * RecentRowsTable - latest event log rows, newest first
 */
import type { EventLogRow } from '@/types/eventLog'
import { THREAT_LEVELS } from '@/lib/threat'
import { getRiskColor } from '@/lib/riskColors'

export function RecentRowsTable({ rows }: { rows: EventLogRow[] }) {
    return (
        <section className="panel panel-wide">
            <h2>Recent Events</h2>
            {rows.length === 0 ? (
                <p className="muted">The event log is empty</p>
            ) : (
                <table>
                    <thead>
                        <tr>
                            <th>Time (UTC)</th>
                            <th>Image</th>
                            <th>Threat</th>
                            <th>Class</th>
                            <th>Confidence</th>
                            <th>Risk</th>
                        </tr>
                    </thead>
                    <tbody>
                        {rows.map((row, index) => (
                            <tr key={`${row.timestamp}-${row.imageId}-${index}`}>
                                <td>{row.timestamp}</td>
                                <td>{row.imageId}</td>
                                <td style={{ color: THREAT_LEVELS[row.threatLevel].color }}>{row.threatLevel}</td>
                                <td>{row.className}</td>
                                <td>{`${Math.round(row.confidence * 100)}%`}</td>
                                <td style={{ color: getRiskColor(row.riskLevel) }}>{row.riskLevel}</td>
                            </tr>
                        ))}
                    </tbody>
                </table>
            )}
        </section>
    )
}

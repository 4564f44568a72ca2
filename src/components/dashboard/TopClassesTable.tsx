import type { ClassCount } from '@/types/analytics'
import { Badge } from '@/components/ui/badge'

export function TopClassesTable({ classes }: { classes: ClassCount[] }) {
    return (
        <section className="panel">
            <h2>Top Classes</h2>
            {classes.length === 0 ? (
                <p className="muted">No detections logged</p>
            ) : (
                <table>
                    <thead>
                        <tr>
                            <th>Class</th>
                            <th>Count</th>
                            <th>Risk</th>
                        </tr>
                    </thead>
                    <tbody>
                        {classes.map(({ className, count, risk }) => (
                            <tr key={className}>
                                <td>{className}</td>
                                <td>{count}</td>
                                <td>
                                    <Badge variant={risk}>{risk.toUpperCase()}</Badge>
                                </td>
                            </tr>
                        ))}
                    </tbody>
                </table>
            )}
        </section>
    )
}

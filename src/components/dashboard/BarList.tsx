/**
 * BarList - labelled horizontal bars, scaled to the largest value
 */
export interface BarItem {
    label: string
    value: number
    color?: string
}

export function BarList({ title, items, emptyText = 'No data yet' }: { title: string; items: BarItem[]; emptyText?: string }) {
    const max = Math.max(0, ...items.map((item) => item.value))

    return (
        <section className="panel">
            <h2>{title}</h2>
            {max === 0 ? (
                <p className="muted">{emptyText}</p>
            ) : (
                <ul className="bars">
                    {items.map((item) => (
                        <li key={item.label}>
                            <span className="bar-label">{item.label}</span>
                            <span className="bar-track">
                                <span
                                    className="bar-fill"
                                    style={{
                                        width: `${Math.round((item.value / max) * 100)}%`,
                                        background: item.color ?? '#40c4ff',
                                    }}
                                />
                            </span>
                            <span className="bar-value">{item.value}</span>
                        </li>
                    ))}
                </ul>
            )}
        </section>
    )
}

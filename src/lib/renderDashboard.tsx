import { renderToStaticMarkup } from 'react-dom/server'
import type { DashboardSnapshot } from '@/types/analytics'
import { DashboardReport } from '@/components/DashboardReport'

const STYLES = `
body { margin: 0; background: #0d1117; color: #e6edf3; font-family: system-ui, sans-serif; }
.dashboard { max-width: 1200px; margin: 0 auto; padding: 24px; }
.dashboard-header { display: flex; align-items: center; gap: 12px; margin-bottom: 20px; }
.dashboard-header h1 { font-size: 22px; margin: 0; }
.muted { color: #8b949e; font-size: 13px; }
.cards { display: grid; grid-template-columns: repeat(4, 1fr); gap: 12px; margin-bottom: 20px; }
.card { background: #161b22; border: 1px solid #30363d; border-radius: 8px; padding: 14px; }
.card-alert { border-color: #ff1744; }
.card-label { font-size: 12px; color: #8b949e; margin-top: 6px; }
.card-value { font-size: 24px; font-weight: 700; }
.grid { display: grid; grid-template-columns: repeat(2, 1fr); gap: 16px; }
.panel { background: #161b22; border: 1px solid #30363d; border-radius: 8px; padding: 14px; overflow-x: auto; }
.panel-wide { grid-column: 1 / -1; }
.panel h2 { font-size: 15px; margin: 0 0 10px; }
.bars { list-style: none; margin: 0; padding: 0; }
.bars li { display: grid; grid-template-columns: 110px 1fr 40px; gap: 8px; align-items: center; font-size: 12px; margin: 4px 0; }
.bar-track { background: #21262d; height: 10px; border-radius: 5px; overflow: hidden; }
.bar-fill { display: block; height: 100%; }
.bar-value { text-align: right; }
table { border-collapse: collapse; width: 100%; font-size: 12px; }
th, td { padding: 4px 6px; text-align: left; border-bottom: 1px solid #21262d; }
.heatmap td { background: #ff6d00; width: 14px; height: 14px; border: 1px solid #0d1117; padding: 0; }
.badge { display: inline-flex; border-radius: 999px; padding: 1px 8px; font-size: 11px; font-weight: 600; }
.badge-high { background: rgba(255, 0, 0, 0.15); color: #ff0000; }
.badge-medium { background: rgba(255, 140, 0, 0.15); color: #ff8c00; }
.badge-low { background: rgba(80, 200, 0, 0.15); color: #50c800; }
.badge-default { background: #30363d; }
.badge-outline { border: 1px solid #30363d; }
`

/** Render a snapshot as a standalone HTML document. */
export function renderDashboardHtml(snapshot: DashboardSnapshot, generatedAt: Date = new Date()): string {
  const body = renderToStaticMarkup(<DashboardReport snapshot={snapshot} generatedAt={generatedAt.toISOString()} />)
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8" />',
    '<title>Threat Dashboard</title>',
    `<style>${STYLES}</style>`,
    '</head>',
    `<body>${body}</body>`,
    '</html>',
    '',
  ].join('\n')
}

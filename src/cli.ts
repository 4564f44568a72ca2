#!/usr/bin/env node
/**
 * Operator entry point.
 *
 *   threatlens scan <image> [--detections file.json] [--pdf out.pdf] [--export fmt --out file]
 *   threatlens dashboard [--html out.html]
 *   threatlens logs [--limit n] [--csv]
 *   threatlens export-csv <out>
 *   threatlens sitrep <scanId>
 *   threatlens chat <scanId> <message>
 *   threatlens prune [--keep n]
 *   threatlens compact --days n
 */
import 'dotenv/config'
import { promises as fs } from 'fs'
import path from 'path'
import { parseArgs } from 'util'
import { loadConfig, type AppConfig } from '@/lib/config'
import { createServices, type Services } from '@/lib/pipeline'
import { createStaticDetector, parseDetectorResponse } from '@/lib/detector'
import { exportEventRowsCsv, exportScan, isExportFormat, EXPORT_FORMATS } from '@/lib/exportFormats'
import { generatePdfReport } from '@/lib/pdfExport'
import { renderDashboardHtml } from '@/lib/renderDashboard'
import { THREAT_LEVELS } from '@/lib/threat'
import { ThreatlensError, errorMessage } from '@/lib/errors'

const USAGE = `Usage: threatlens <command> [options]

Commands:
  scan <image>            run detection, assessment, logging and the sitrep
      --detections <file> replay a recorded detector response instead of calling the detector
      --pdf <file>        write a PDF threat report
      --export <format>   ${EXPORT_FORMATS.join(' | ')}
      --out <file>        destination for --export
  dashboard               print the dashboard snapshot as JSON
      --html <file>       write a static HTML dashboard instead
  logs                    print the most recent event log rows
      --limit <n>         rows to show (default 50)
      --csv               print as CSV
  export-csv <out>        copy the whole event log
  sitrep <scanId>         show the stored sitrep and chat history
  chat <scanId> <message> ask the analyst a follow-up question
  prune                   drop old scan artifacts
      --keep <n>          artifacts to keep (default SCAN_RETENTION)
  compact --days <n>      drop event log rows older than n days
`

class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

function nonNegativeInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) throw new UsageError(`${flag} expects a non-negative integer`)
  return parsed
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) throw new UsageError(`Missing <${name}>`)
  return value
}

const print = (value: unknown) => console.log(typeof value === 'string' ? value : JSON.stringify(value, null, 2))

async function runScan(config: AppConfig, args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      detections: { type: 'string' },
      pdf: { type: 'string' },
      export: { type: 'string' },
      out: { type: 'string' },
    },
  })
  const imagePath = requireArg(positionals[0], 'image')
  if (values.export !== undefined && !isExportFormat(values.export)) {
    throw new UsageError(`--export expects one of ${EXPORT_FORMATS.join(', ')}`)
  }

  const detector = values.detections
    ? createStaticDetector(parseDetectorResponse(JSON.parse(await fs.readFile(values.detections, 'utf-8'))))
    : undefined
  const { pipeline } = await createServices(config, { detector })

  const scan = await pipeline.processUpload({
    fileName: path.basename(imagePath),
    data: await fs.readFile(imagePath),
  })

  const level = THREAT_LEVELS[scan.threat.threatLevel]
  print(`${level.icon} ${level.label}: ${level.description}`)
  print(`Scan ${scan.scanId} | ${scan.detections.length} objects | ${scan.inferenceMs} ms`)
  for (const d of scan.detections) {
    print(`  ${d.riskLevel.toUpperCase().padEnd(6)} ${d.className} ${Math.round(d.confidence * 100)}%`)
  }
  print(`Annotated image: ${scan.annotatedPath}`)
  if (scan.geo) print(`Location: ${scan.geo.locationName} (${scan.geo.mapsLink})`)
  if (scan.audit.status === 'failed') print(`WARNING: not written to the audit log: ${scan.audit.error}`)
  print(scan.sitrep.status === 'ok' ? `\n${scan.sitrep.sitrep}` : `Sitrep ${scan.sitrep.status}: ${scan.sitrep.error}`)

  if (values.pdf) {
    const annotatedJpeg = await fs.readFile(scan.annotatedPath)
    await fs.writeFile(values.pdf, generatePdfReport(scan, { annotatedJpeg }))
    print(`PDF report: ${values.pdf}`)
  }
  if (values.export !== undefined && isExportFormat(values.export)) {
    const { body, extension } = exportScan(scan, values.export)
    const out = values.out ?? path.join(path.dirname(scan.originalPath), `${scan.scanId}.${extension}`)
    await fs.writeFile(out, body, 'utf-8')
    print(`Export (${values.export}): ${out}`)
  }
}

async function runDashboard(services: Services, args: string[]) {
  const { values } = parseArgs({ args, options: { html: { type: 'string' } } })
  const snapshot = await services.pipeline.dashboard()
  if (!values.html) {
    print(snapshot)
    return
  }
  await fs.writeFile(values.html, renderDashboardHtml(snapshot), 'utf-8')
  print(`Dashboard written to ${values.html}`)
}

async function runLogs(services: Services, args: string[]) {
  const { values } = parseArgs({
    args,
    options: { limit: { type: 'string' }, csv: { type: 'boolean' } },
  })
  const rows = await services.pipeline.recentLogs(nonNegativeInt(values.limit, '--limit') ?? 50)
  print(values.csv ? exportEventRowsCsv(rows) : rows)
}

async function runChat(services: Services, args: string[]) {
  const scanId = requireArg(args[0], 'scanId')
  const message = requireArg(args.slice(1).join(' ').trim(), 'message')
  const result = await services.pipeline.chat(scanId, message)
  if (result.status !== 'ok') throw new ThreatlensError(result.error, `analyst_${result.status}`)
  print(result.answer)
}

async function runSitrep(services: Services, args: string[]) {
  const scanId = requireArg(args[0], 'scanId')
  const scan = await services.pipeline.getScan(scanId)
  if (!scan) throw new UsageError(`Scan ${scanId} not found`)
  print(`${scan.timestamp} | ${scan.model} | ${scan.tokens} tokens\n\n${scan.summary}`)
  for (const turn of scan.chatHistory) print(`\n[${turn.role}] ${turn.content}`)
}

async function main(argv: string[]): Promise<void> {
  const [command, ...args] = argv
  if (!command || command === 'help' || command === '--help') {
    print(USAGE)
    return
  }

  const config = loadConfig()
  if (command === 'scan') return runScan(config, args)

  const services = await createServices(config)
  switch (command) {
    case 'dashboard':
      return runDashboard(services, args)
    case 'logs':
      return runLogs(services, args)
    case 'export-csv': {
      const out = requireArg(args[0], 'out')
      await fs.writeFile(out, await services.eventLog.exportCsv(), 'utf-8')
      print(`Event log exported to ${out}`)
      return
    }
    case 'sitrep':
      return runSitrep(services, args)
    case 'chat':
      return runChat(services, args)
    case 'prune': {
      const { values } = parseArgs({ args, options: { keep: { type: 'string' } } })
      const keep = nonNegativeInt(values.keep, '--keep') ?? services.config.scanRetention
      print(`Pruned ${await services.scanStore.prune(keep)} scan artifacts`)
      return
    }
    case 'compact': {
      const { values } = parseArgs({ args, options: { days: { type: 'string' } } })
      const days = nonNegativeInt(values.days, '--days')
      if (days === undefined) throw new UsageError('compact requires --days <n>')
      const { kept, removed } = await services.eventLog.compact({ olderThanDays: days })
      print(`Kept ${kept} rows, removed ${removed}`)
      return
    }
    default:
      throw new UsageError(`Unknown command "${command}"\n\n${USAGE}`)
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(errorMessage(error))
  process.exitCode = 1
})

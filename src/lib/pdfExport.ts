import { jsPDF } from 'jspdf'
import type { ScanResult } from '@/types'

function hexToRgb(hex: string): [number, number, number] {
    const value = Number.parseInt(hex.replace('#', ''), 16)
    return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff]
}

/**
 * Generates a PDF threat report for one scan.
 * Includes the annotated image, threat banner, statistics, sitrep and detection table.
 */
export function generatePdfReport(
    scan: ScanResult,
    options: { annotatedJpeg?: Buffer; generatedAt?: Date } = {}
): Buffer {
    const doc = new jsPDF({
        orientation: 'portrait',
        unit: 'mm',
        format: 'a4',
    })

    const pageWidth = doc.internal.pageSize.getWidth()
    const pageHeight = doc.internal.pageSize.getHeight()
    const margin = 15
    const contentWidth = pageWidth - margin * 2
    let y = margin

    const ensureSpace = (needed: number) => {
        if (y + needed > pageHeight - 15) {
            doc.addPage()
            y = margin
        }
    }

    // Title
    doc.setFontSize(20)
    doc.setFont('helvetica', 'bold')
    doc.text('Threat Assessment Report', margin, y)
    y += 10

    doc.setFontSize(10)
    doc.setFont('helvetica', 'normal')
    doc.setTextColor(100)
    doc.text(`Generated: ${(options.generatedAt ?? new Date()).toISOString()}`, margin, y)
    y += 5
    doc.text(`Scan: ${scan.scanId}   Source: ${scan.imageId}`, margin, y)
    y += 10

    // Threat banner
    const [red, green, blue] = hexToRgb(scan.threat.color)
    doc.setFillColor(red, green, blue)
    doc.rect(margin, y - 5, contentWidth, 12, 'F')
    doc.setFontSize(14)
    doc.setFont('helvetica', 'bold')
    doc.setTextColor(0)
    doc.text(scan.threat.label, margin + 3, y + 2.5)
    y += 12
    doc.setFontSize(10)
    doc.setFont('helvetica', 'normal')
    doc.text(scan.threat.description, margin, y)
    y += 10

    if (options.annotatedJpeg) {
        const maxImageHeight = 90
        const aspectRatio = scan.imageSize.width / scan.imageSize.height
        let imgWidth = contentWidth
        let imgHeight = imgWidth / aspectRatio
        if (imgHeight > maxImageHeight) {
            imgHeight = maxImageHeight
            imgWidth = imgHeight * aspectRatio
        }
        doc.addImage(new Uint8Array(options.annotatedJpeg), 'JPEG', margin, y, imgWidth, imgHeight)
        y += imgHeight + 10
    }

    // Statistics section
    const { stats } = scan.threat
    doc.setFontSize(14)
    doc.setFont('helvetica', 'bold')
    doc.text('Summary Statistics', margin, y)
    y += 8

    doc.setFontSize(10)
    doc.setFont('helvetica', 'normal')
    const rows = [
        ['Total Objects', stats.total.toString()],
        ['High Risk', stats.highRisk.toString()],
        ['Medium Risk', stats.mediumRisk.toString()],
        ['Low Risk', stats.lowRisk.toString()],
        ['Avg Confidence', `${Math.round(stats.avgConfidence * 100)}%`],
        ['Inference', `${scan.inferenceMs} ms`],
    ]
    if (scan.geo) rows.push(['Location', scan.geo.locationName])
    rows.forEach(([label, value]) => {
        doc.text(`${label}:`, margin, y)
        doc.text(value, margin + 35, y)
        y += 5
    })
    y += 8

    // Category breakdown
    const categories = Object.entries(stats.classCounts).sort((a, b) => b[1] - a[1])
    if (categories.length > 0) {
        ensureSpace(20)
        doc.setFontSize(14)
        doc.setFont('helvetica', 'bold')
        doc.text('Objects by Class', margin, y)
        y += 8
        doc.setFontSize(10)
        doc.setFont('helvetica', 'normal')
        categories.forEach(([className, count]) => {
            ensureSpace(5)
            doc.text(`- ${className.replace(/_/g, ' ')}: ${count}`, margin, y)
            y += 5
        })
        y += 8
    }

    if (scan.sitrep.status === 'ok') {
        ensureSpace(20)
        doc.setFontSize(14)
        doc.setFont('helvetica', 'bold')
        doc.text('SITREP', margin, y)
        y += 8
        doc.setFontSize(9)
        doc.setFont('helvetica', 'normal')
        const lines: string[] = doc.splitTextToSize(scan.sitrep.sitrep, contentWidth)
        lines.forEach((line) => {
            ensureSpace(5)
            doc.text(line, margin, y)
            y += 4.5
        })
        y += 8
    }

    // Detection table
    ensureSpace(30)
    doc.setFontSize(14)
    doc.setFont('helvetica', 'bold')
    doc.text('Detections', margin, y)
    y += 10

    const colWidths = [12, 55, 25, 25, 60]
    const cols = ['#', 'Class', 'Confidence', 'Risk', 'Box']
    const drawHeader = () => {
        doc.setFontSize(9)
        doc.setFont('helvetica', 'bold')
        doc.setFillColor(240, 240, 240)
        doc.rect(margin, y - 4, contentWidth, 7, 'F')
        let x = margin + 2
        cols.forEach((col, i) => {
            doc.text(col, x, y)
            x += colWidths[i]
        })
        y += 6
        doc.setFont('helvetica', 'normal')
    }
    drawHeader()

    if (scan.detections.length === 0) {
        doc.text('No objects detected.', margin + 2, y)
    }
    scan.detections.forEach((detection, index) => {
        if (y > pageHeight - 15) {
            doc.addPage()
            y = margin
            drawHeader()
        }
        const { box } = detection
        const row = [
            (index + 1).toString(),
            detection.className.replace(/_/g, ' ').slice(0, 28),
            `${Math.round(detection.confidence * 100)}%`,
            detection.riskLevel.toUpperCase(),
            `${box.x1},${box.y1} - ${box.x2},${box.y2}`,
        ]
        if (detection.riskLevel === 'high') doc.setTextColor(200, 0, 0)
        let x = margin + 2
        row.forEach((cell, i) => {
            doc.text(cell, x, y)
            x += colWidths[i]
        })
        doc.setTextColor(0)
        y += 5
    })

    return Buffer.from(doc.output('arraybuffer'))
}

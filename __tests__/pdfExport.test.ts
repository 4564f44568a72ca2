import sharp from 'sharp'
import { generatePdfReport } from '@/lib/pdfExport'
import { makeDetection, makeScanResult } from './helpers/fixtures'

const generatedAt = new Date('2024-05-15T12:00:00Z')

describe('generatePdfReport', () => {
  it('produces a PDF with the threat banner and detection table', () => {
    const scan = makeScanResult([makeDetection('tank', 0.9, 'high'), makeDetection('radar_station', 0.6, 'medium')])
    const pdf = generatePdfReport(scan, { generatedAt })

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-')
    const text = pdf.toString('latin1')
    expect(text).toContain('(Threat Assessment Report)')
    expect(text).toContain('(HIGH ALERT)')
    expect(text).toContain('(Generated: 2024-05-15T12:00:00.000Z)')
    expect(text).toContain('(radar station)')
  })

  it('includes the sitrep when one was generated', () => {
    const scan = makeScanResult([], {
      sitrep: { status: 'ok', sitrep: 'Area is quiet.', model: 'fake-model', tokens: 9 },
    })
    const text = generatePdfReport(scan, { generatedAt }).toString('latin1')
    expect(text).toContain('(SITREP)')
    expect(text).toContain('(Area is quiet.)')
    expect(text).toContain('(No objects detected.)')
  })

  it('spills long detection tables onto more pages', () => {
    const many = Array.from({ length: 120 }, (_, i) => makeDetection('car', 0.5, 'low', [0, 0, 10, 10], i))
    const short = generatePdfReport(makeScanResult(many.slice(0, 1)), { generatedAt }).toString('latin1')
    const long = generatePdfReport(makeScanResult(many), { generatedAt }).toString('latin1')

    const pages = (text: string) => (text.match(/\/Type \/Page\b/g) ?? []).length
    expect(pages(long)).toBeGreaterThan(pages(short))
  })

  it('embeds the annotated image', async () => {
    const jpeg = await sharp({ create: { width: 200, height: 400, channels: 3, background: { r: 0, g: 0, b: 0 } } })
      .jpeg()
      .toBuffer()
    const withImage = generatePdfReport(makeScanResult([]), { annotatedJpeg: jpeg, generatedAt })

    expect(withImage.toString('latin1')).toContain('/Subtype /Image')
  })
})

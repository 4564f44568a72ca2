import { randomBytes } from 'crypto'
import path from 'path'
import sharp from 'sharp'
import type { ImageSize } from '@/types/detection'
import { UploadRejectedError } from '@/lib/errors'

export const ALLOWED_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif', 'bmp', 'webp', 'tiff']

const MAX_STEM_LENGTH = 40

export function fileExtension(fileName: string): string {
  return path.extname(fileName).slice(1).toLowerCase()
}

export function validateUpload(fileName: string, size: number, maxBytes: number): void {
  if (fileName.trim() === '') {
    throw new UploadRejectedError('No file selected.', 'missing_file')
  }
  if (!ALLOWED_EXTENSIONS.includes(fileExtension(fileName))) {
    throw new UploadRejectedError(
      `File type not allowed. Accepted: ${ALLOWED_EXTENSIONS.join(', ')}`,
      'unsupported_type'
    )
  }
  if (size === 0) {
    throw new UploadRejectedError('Uploaded file is empty.', 'missing_file')
  }
  if (size > maxBytes) {
    throw new UploadRejectedError(`File exceeds the ${maxBytes} byte upload limit.`, 'too_large')
  }
}

/** Strip directories and anything outside a conservative character set. */
export function sanitizeFileName(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? ''
  return base
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9._-]/g, '')
    .replace(/^[._]+/, '')
}

/**
 * Prefix with 8 random hex characters to avoid collisions; the prefix
 * doubles as the scan id.
 */
export function uniqueFileName(fileName: string, prefix = randomBytes(4).toString('hex')): string {
  const base = fileName.split(/[\\/]/).pop() ?? ''
  const extension = fileExtension(base).replace(/[^a-z0-9]/g, '')
  const stem = sanitizeFileName(path.basename(base, path.extname(base))).slice(0, MAX_STEM_LENGTH) || 'image'
  return extension ? `${prefix}_${stem}.${extension}` : `${prefix}_${stem}`
}

export function scanIdFromFileName(uniqueName: string): string {
  return uniqueName.split('_')[0]
}

export type ImageInfo = ImageSize & { format: string }

export async function readImageInfo(data: Buffer): Promise<ImageInfo> {
  try {
    const metadata = await sharp(data).metadata()
    if (!metadata.width || !metadata.height || !metadata.format) {
      throw new Error('image header has no dimensions')
    }
    return { width: metadata.width, height: metadata.height, format: metadata.format }
  } catch (error) {
    throw new UploadRejectedError('Could not read image.', 'unreadable_image', { cause: error })
  }
}

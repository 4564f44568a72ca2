/**
 * GPS position from EXIF and a best-effort place name for it.
 */
import { parse as parseExif } from 'exifr'
import { z } from 'zod'
import type { GeoInfo } from '@/types'
import { requestJson } from '@/lib/http'
import { silentLogger, type Logger } from '@/lib/logger'
import { errorMessage } from '@/lib/errors'
import { roundTo } from '@/lib/utils'

export type Coordinates = {
  latitude: number
  longitude: number
  altitude: number | null
}

const exifGpsSchema = z.object({
  latitude: z.number().finite(),
  longitude: z.number().finite(),
  GPSAltitude: z.number().finite().optional(),
})

/** null when the image carries no usable GPS position. */
export async function extractGps(data: Buffer, logger: Logger = silentLogger): Promise<Coordinates | null> {
  let exif: unknown
  try {
    exif = await parseExif(data, { gps: true })
  } catch (error) {
    logger.debug(`Could not read EXIF: ${errorMessage(error)}`)
    return null
  }

  const result = exifGpsSchema.safeParse(exif)
  if (!result.success) return null

  const { latitude, longitude, GPSAltitude } = result.data
  if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) {
    logger.warn(`Invalid GPS coordinates: lat=${latitude}, lon=${longitude}`)
    return null
  }
  return { latitude, longitude, altitude: GPSAltitude ?? null }
}

export function formatCoordinates(latitude: number, longitude: number): string {
  const ns = latitude >= 0 ? 'N' : 'S'
  const ew = longitude >= 0 ? 'E' : 'W'
  return `${Math.abs(latitude).toFixed(4)}° ${ns}, ${Math.abs(longitude).toFixed(4)}° ${ew}`
}

export interface Geocoder {
  /** Never rejects: falls back to formatted coordinates. */
  reverse: (latitude: number, longitude: number) => Promise<string>
}

const nominatimSchema = z.object({
  display_name: z.string().optional(),
  address: z.record(z.string(), z.string()).optional(),
})

const ADDRESS_KEYS = ['city', 'town', 'village', 'county', 'state', 'country']

export class NominatimGeocoder implements Geocoder {
  constructor(
    private options: {
      userAgent: string
      baseUrl?: string
      timeoutMs?: number
      logger?: Logger
    }
  ) {}

  async reverse(latitude: number, longitude: number): Promise<string> {
    const logger = this.options.logger ?? silentLogger
    const params = new URLSearchParams({
      format: 'jsonv2',
      lat: String(latitude),
      lon: String(longitude),
      'accept-language': 'en',
    })
    const baseUrl = this.options.baseUrl ?? 'https://nominatim.openstreetmap.org'

    try {
      const payload = await requestJson(
        `${baseUrl}/reverse?${params}`,
        { headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' } },
        this.options.timeoutMs ?? 5000
      )
      const place = nominatimSchema.parse(payload)

      const parts: string[] = []
      for (const key of ADDRESS_KEYS) {
        const value = place.address?.[key]
        if (value && !parts.includes(value)) parts.push(value)
      }
      if (parts.length > 0) return parts.slice(0, 3).join(', ')
      if (place.display_name) return place.display_name
    } catch (error) {
      logger.warn(`Geocoding failed: ${errorMessage(error)}`)
    }
    return formatCoordinates(latitude, longitude)
  }
}

/** Geocoder for when lookups are switched off. */
export const coordinateGeocoder: Geocoder = {
  reverse: async (latitude, longitude) => formatCoordinates(latitude, longitude),
}

export async function locateImage(
  data: Buffer,
  geocoder: Geocoder,
  logger: Logger = silentLogger
): Promise<GeoInfo | null> {
  const position = await extractGps(data, logger)
  if (!position) return null

  const { latitude, longitude, altitude } = position
  const locationName = await geocoder.reverse(latitude, longitude)
  logger.info(`GPS extracted: ${latitude.toFixed(4)}, ${longitude.toFixed(4)} -> ${locationName}`)

  return {
    latitude: roundTo(latitude, 6),
    longitude: roundTo(longitude, 6),
    locationName,
    altitude: altitude === null ? null : roundTo(altitude, 1),
    mapsLink: `https://www.google.com/maps?q=${latitude},${longitude}`,
  }
}

import { execFile } from 'child_process'
import { env } from '@env/index'
import { createComponentLogger } from '@lib/logger'
import { errorMessageOf } from '@lib/logger/helpers'
import { LatitudeRangeError } from '@use-cases/errors/latitude-range-error'
import { LongitudeRangeError } from '@use-cases/errors/longitude-range-error'
import { OpenLocationFailedError } from '@use-cases/errors/open-location-failed-error'

const MAP_ZOOM = 15
const COORDINATE_DECIMALS = 6

export interface UrlOpener {
  open(url: string): Promise<void>
}

export interface OpenLocationResult {
  url: string
  opened: boolean
  error?: string
}

const log = createComponentLogger('OpenLocation')

export function buildMapUrl(latitude: number, longitude: number, baseUrl: string = env.MAP_VIEWER_URL): string {
  const lat = latitude.toFixed(COORDINATE_DECIMALS)
  const lon = longitude.toFixed(COORDINATE_DECIMALS)

  return `${baseUrl.replace(/\/+$/, '')}/#map=${MAP_ZOOM}/${lat}/${lon}`
}

/** Hands the URL to the platform's default handler. */
export class SystemUrlOpener implements UrlOpener {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  open(url: string): Promise<void> {
    const [command, args] = this.commandFor(url)

    return new Promise((resolve, reject) => {
      execFile(command, args, (error) => {
        if (error) {
          reject(error)
          return
        }

        resolve()
      })
    })
  }

  private commandFor(url: string): [string, string[]] {
    switch (this.platform) {
      case 'darwin':
        return ['open', [url]]
      case 'win32':
        return ['cmd', ['/c', 'start', '""', url]]
      default:
        return ['xdg-open', [url]]
    }
  }
}

/**
 * Opens an OpenStreetMap view centred on the coordinates. Never rejects:
 * failures come back as `opened: false` with a message.
 */
export async function openLocationExternally(
  latitude: number,
  longitude: number,
  label?: string,
  opener: UrlOpener = new SystemUrlOpener(),
): Promise<OpenLocationResult> {
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    return { url: '', opened: false, error: new LatitudeRangeError().message }
  }

  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    return { url: '', opened: false, error: new LongitudeRangeError().message }
  }

  const url = buildMapUrl(latitude, longitude)

  try {
    await opener.open(url)
    log.info({ url, label }, 'Opened location in map viewer')

    return { url, opened: true }
  } catch (error) {
    const failure = new OpenLocationFailedError(error)
    log.warn({ url, label, reason: errorMessageOf(error) }, 'Failed to open location')

    return { url, opened: false, error: failure.message }
  }
}

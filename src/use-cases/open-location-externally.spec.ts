import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { execFile } from 'child_process'
import { buildMapUrl, openLocationExternally, SystemUrlOpener, type UrlOpener } from './open-location-externally'

vi.mock('child_process', () => ({ execFile: vi.fn() }))

type ExecFileCallback = (error: Error | null) => void

describe('Open Location Externally', () => {
  let opener: UrlOpener

  beforeEach(() => {
    opener = { open: vi.fn().mockResolvedValue(undefined) }
  })

  afterEach(() => {
    vi.clearAllMocks()
  })

  it('should build a map url with six decimals', () => {
    expect(buildMapUrl(-23.5505, -46.6333)).toBe('https://www.openstreetmap.org/#map=15/-23.550500/-46.633300')
  })

  it('should drop trailing slashes from the viewer url', () => {
    expect(buildMapUrl(1, 2, 'https://maps.example.test/')).toBe('https://maps.example.test/#map=15/1.000000/2.000000')
  })

  it('should open the url with the given opener', async () => {
    const result = await openLocationExternally(48.8566, 2.3522, 'Paris', opener)

    expect(opener.open).toHaveBeenCalledWith('https://www.openstreetmap.org/#map=15/48.856600/2.352200')
    expect(result).toEqual({ url: 'https://www.openstreetmap.org/#map=15/48.856600/2.352200', opened: true })
  })

  it('should resolve with an error when the opener fails', async () => {
    opener = { open: vi.fn().mockRejectedValue(new Error('no handler')) }

    const result = await openLocationExternally(0, 0, undefined, opener)

    expect(result).toEqual({
      url: 'https://www.openstreetmap.org/#map=15/0.000000/0.000000',
      opened: false,
      error: 'Failed to open location in browser',
    })
  })

  it('should reject out of range coordinates without opening anything', async () => {
    await expect(openLocationExternally(91, 0, undefined, opener)).resolves.toEqual({
      url: '',
      opened: false,
      error: 'Latitude must be between -90 and 90 degrees.',
    })
    await expect(openLocationExternally(0, Number.NaN, undefined, opener)).resolves.toEqual({
      url: '',
      opened: false,
      error: 'Longitude must be between -180 and 180 degrees.',
    })
    expect(opener.open).not.toHaveBeenCalled()
  })

  describe('SystemUrlOpener', () => {
    function mockExecFile(error: Error | null) {
      vi.mocked(execFile).mockImplementation(((_command: string, _args: string[], callback: ExecFileCallback) => {
        callback(error)
      }) as any)
    }

    it('should use xdg-open on linux', async () => {
      mockExecFile(null)

      await new SystemUrlOpener('linux').open('https://example.test')

      expect(execFile).toHaveBeenCalledWith('xdg-open', ['https://example.test'], expect.any(Function))
    })

    it('should use open on macOS', async () => {
      mockExecFile(null)

      await new SystemUrlOpener('darwin').open('https://example.test')

      expect(execFile).toHaveBeenCalledWith('open', ['https://example.test'], expect.any(Function))
    })

    it('should use start on Windows', async () => {
      mockExecFile(null)

      await new SystemUrlOpener('win32').open('https://example.test')

      expect(execFile).toHaveBeenCalledWith('cmd', ['/c', 'start', '""', 'https://example.test'], expect.any(Function))
    })

    it('should reject when the command fails', async () => {
      mockExecFile(new Error('spawn xdg-open ENOENT'))

      await expect(new SystemUrlOpener('linux').open('https://example.test')).rejects.toThrow('spawn xdg-open ENOENT')
    })
  })
})

import path from 'path'
import { readFile, stat } from 'fs/promises'

export const defaultIconsDirectory = path.join(__dirname, 'png')

const fallbackIcon = 'unknown.png'

/**
 * Icon resolver
 *
 * Maps a key name to `<directory>/<key>.png` and falls back to `unknown.png`
 * when there is no such file, the packaged one if the directory has none. Loaded images are cached by file path for the
 * lifetime of the resolver; entries are never evicted.
 */
export class IconResolver {
  private cache = new Map<string, Buffer>()

  constructor(public readonly directory: string = defaultIconsDirectory) {}

  async resolve(key: string): Promise<Buffer> {
    // keys come from remote databases, keep them inside the icon directory
    if (!key || key.includes('/') || key.includes('\\') || key.startsWith('.')) return this.unknown()

    const filepath = path.join(this.directory, `${key}.png`)
    if (this.cache.has(filepath) || (await isFile(filepath))) return this.read(filepath)

    return this.unknown()
  }

  async unknown(): Promise<Buffer> {
    const filepath = path.join(this.directory, fallbackIcon)
    if (this.cache.has(filepath) || (await isFile(filepath))) return this.read(filepath)

    return this.read(path.join(defaultIconsDirectory, fallbackIcon))
  }

  get size() {
    return this.cache.size
  }

  private async read(filepath: string): Promise<Buffer> {
    const cached = this.cache.get(filepath)
    if (cached) return cached

    const data = await readFile(filepath)
    this.cache.set(filepath, data)
    return data
  }
}

const isFile = async (filepath: string) => {
  try {
    return (await stat(filepath)).isFile()
  } catch {
    return false
  }
}

export const icons = new IconResolver()

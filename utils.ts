import path from 'path'

import { DeviceCommand } from './plugins'
import { IconResolver } from './icons'

export type MkCommand<C extends DeviceCommand> = (id: number, key: string, icon: Buffer) => C

/**
 * Sorts keys lexicographically and numbers them from 0, so that repeated
 * enumerations of an unchanged key set give the same ids.
 */
export const mkCommands = async <C extends DeviceCommand>(
  keys: string[],
  icons: IconResolver,
  mkCommand: MkCommand<C>,
): Promise<C[]> => {
  const sorted = [...keys].sort()
  const commands: C[] = []

  for (const [id, key] of sorted.entries()) {
    commands.push(mkCommand(id, key, await icons.resolve(key)))
  }

  return commands
}

export const fileStem = (filename: string) =>
  path.basename(filename, path.extname(filename))

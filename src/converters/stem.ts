import { basename, extname } from 'node:path'

export function stem(fileName: string) {
  const base = basename(fileName)
  return base.slice(0, base.length - extname(base).length)
}

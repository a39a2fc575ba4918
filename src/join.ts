/**
 * Joins path segments into a normalized absolute prefix.
 *
 * Each segment loses one leading and one trailing slash. Empty and bare `/`
 * segments are skipped; with nothing left the result is `''`, never `/`.
 *
 * @example
 * joinPath('api/', '/v1/', 'users') // '/api/v1/users'
 */
export function joinPath(...segments: string[]): string {
  let path = ''
  for (let segment of segments) {
    if (segment === '' || segment === '/') continue
    if (segment.startsWith('/')) segment = segment.slice(1)
    if (segment.endsWith('/')) segment = segment.slice(0, -1)
    path += '/' + segment
  }
  return path
}

const SEPARATOR = /[ \t]/

/**
 * Prefixes the path of `pattern` with `rootPath`, keeping any method token
 * and normalizing its separator to a single space.
 */
export function fullPattern(rootPath: string, pattern: string): string {
  if (rootPath === '') return pattern
  const match = SEPARATOR.exec(pattern)
  if (match == null) return rootPath + pattern
  const method = pattern.slice(0, match.index)
  const path = pattern.slice(match.index).replace(/^[ \t]+/, '')
  return `${method} ${rootPath}${path}`
}

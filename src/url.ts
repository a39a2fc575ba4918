import { posix } from 'path'

export type RequestTarget = {
  path: string
  query: string
}

/**
 * Splits a raw request target into its escaped path and query (without `?`).
 * An absolute-form target (`http://host/path`) contributes its path.
 */
export function splitURL(url = '/'): RequestTarget {
  if (!url.startsWith('/') && URL.canParse(url)) {
    const { pathname, search } = new URL(url)
    return { path: pathname, query: search.slice(1) }
  }
  const index = url.indexOf('?')
  return index === -1
    ? { path: url, query: '' }
    : { path: url.slice(0, index), query: url.slice(index + 1) }
}

/**
 * Resolves `.` and `..`, collapses repeated slashes, and keeps a trailing
 * slash.
 */
export function cleanPath(path: string): string {
  if (path === '') return '/'
  if (!path.startsWith('/')) path = '/' + path
  return posix.normalize(path)
}

export function withQuery(path: string, query: string): string {
  return query === '' ? path : `${path}?${query}`
}

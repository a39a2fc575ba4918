export type Segment =
  | { kind: 'literal', value: string }
  | { kind: 'wild', name: string }
  | { kind: 'multi', name: string }

export type Pattern = {
  source: string
  method: string
  segments: Segment[]
}

const WILDCARD_NAME = /^[\p{L}_][\p{L}\p{N}_]*$/u

/**
 * Parses `[METHOD ]/path` where the path may hold `{name}` segments, a final
 * `{name...}` and a final `{$}`. A path ending in `/` matches everything
 * beneath it, as if it ended in an unnamed `{...}`.
 */
export function parsePattern(source: string): Pattern {
  let method = ''
  let rest = source
  const separator = /[ \t]+/.exec(source)
  if (separator != null) {
    method = source.slice(0, separator.index)
    rest = source.slice(separator.index + separator[0].length)
    if (!/^[A-Za-z!#$%&'*+.^_`|~0-9-]+$/.test(method)) {
      throw new Error(`invalid pattern ${source} - bad method "${method}"`)
    }
  }
  if (!rest.startsWith('/')) {
    throw new Error(`invalid pattern ${source} - path must begin with "/"`)
  }

  const segments: Segment[] = []
  const names = new Set<string>()
  const slugs = rest.slice(1).split('/')

  for (let s = 0; s < slugs.length; s++) {
    const slug = slugs[s]
    const isLast = s === slugs.length - 1
    if (isLast && slug === '') {
      segments.push({ kind: 'multi', name: '' })
      break
    }
    if (!slug.includes('{') && !slug.includes('}')) {
      segments.push({ kind: 'literal', value: unescape(slug) })
      continue
    }
    if (!slug.startsWith('{') || !slug.endsWith('}')) {
      throw new Error(`invalid pattern ${source} - bad wildcard segment "${slug}"`)
    }
    let name = slug.slice(1, -1)
    if (name === '$') {
      if (!isLast) throw new Error(`invalid pattern ${source} - {$} not at end`)
      segments.push({ kind: 'literal', value: '' })
      break
    }
    const isMulti = name.endsWith('...')
    if (isMulti) {
      if (!isLast) throw new Error(`invalid pattern ${source} - {${name}} not at end`)
      name = name.slice(0, -3)
    }
    if (!WILDCARD_NAME.test(name)) {
      throw new Error(`invalid pattern ${source} - bad wildcard name "${name}"`)
    }
    if (names.has(name)) {
      throw new Error(`invalid pattern ${source} - duplicate wildcard name "${name}"`)
    }
    names.add(name)
    segments.push({ kind: isMulti ? 'multi' : 'wild', name })
  }

  return { source, method, segments }
}

/**
 * The shape of a pattern with wildcard names erased. Two patterns of one
 * shape match exactly the same requests.
 */
export function shapeOf({ method, segments }: Pattern): string {
  const tokens = segments.map(segment => {
    switch (segment.kind) {
      case 'literal': return '=' + segment.value
      case 'wild': return ':'
      case 'multi': return '*'
    }
  })
  return [method, ...tokens].join('/')
}

export function unescape(slug: string): string {
  try {
    return decodeURIComponent(slug)
  } catch {
    return slug
  }
}

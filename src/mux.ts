import type { IncomingMessage } from 'http'
import { logger } from './logger'
import { parsePattern, shapeOf, unescape, type Pattern } from './pattern'
import { httpError, redirect } from './res'
import type { Handler } from './types'
import { cleanPath, splitURL, withQuery } from './url'

type Params = Record<string, string>

type Endpoint = {
  pattern: Pattern
  handler: Handler
}

type Match = {
  endpoint: Endpoint
  params: Params
}

export type Resolution = {
  handler: Handler
  /**
   * The pattern that answers the request, or `''` when none does (404 and
   * 405 alike).
   */
  pattern: string
  params: Params
}

class RouteNode {
  endpoints: Map<string, Endpoint> | null = null
  wildChild: RouteNode | null = null
  multiChild: RouteNode | null = null
  staticChildren: Record<string, RouteNode> | null = null

  constructor(public isMulti: boolean = false) { }
}

const pathValues = new WeakMap<IncomingMessage, Params>()

/**
 * The value a `{name}` or `{name...}` wildcard matched for this request, or
 * `''`.
 */
export function pathValue(req: IncomingMessage, name: string): string {
  return pathValues.get(req)?.[name] ?? ''
}

export function setPathValue(req: IncomingMessage, name: string, value: string): void {
  let params = pathValues.get(req)
  if (params == null) pathValues.set(req, params = dict<string>())
  params[name] = value
}

/**
 * Request multiplexer keyed by `[METHOD ]/path` patterns.
 *
 * Literal segments outrank `{name}` segments, which outrank `{name...}` and
 * trailing-slash subtrees. A request for a subtree root without its slash,
 * or for an unclean path, is redirected with a 301.
 */
export class ServeMux {

  protected _root = new RouteNode()
  protected _shapes: Record<string, string> = dict<string>()

  handle(pattern: string, handler: Handler): this {
    const parsed = parsePattern(pattern)
    const shape = shapeOf(parsed)
    if (this._shapes[shape] != null) {
      logger.debug('replacing pattern', { pattern, previous: this._shapes[shape] })
    }
    this._shapes[shape] = pattern

    let node = this._root
    for (const segment of parsed.segments) {
      if (segment.kind === 'wild') {
        node = node.wildChild ??= new RouteNode()
      } else if (segment.kind === 'multi') {
        node = node.multiChild ??= new RouteNode(true)
      } else {
        const children = node.staticChildren ??= dict<RouteNode>()
        node = children[segment.value] ??= new RouteNode()
      }
    }

    node.endpoints ??= new Map()
    node.endpoints.set(parsed.method, { pattern: parsed, handler })
    return this
  }

  resolve(req: IncomingMessage): Resolution {
    const method = req.method ?? 'GET'
    const { path: rawPath, query } = splitURL(req.url)
    const path = cleanPath(rawPath)
    const { match, allowed } = this.match(method, path)

    if (!isExact(match, path) && path !== '/' && !path.endsWith('/')) {
      const slashed = path + '/'
      if (isExact(this.match(method, slashed).match, slashed)) {
        return redirectTo(withQuery(slashed, query), slashed)
      }
    }

    if (path !== rawPath) {
      return redirectTo(withQuery(path, query), match?.endpoint.pattern.source ?? '')
    }

    if (match == null) {
      if (allowed.length === 0) return { handler: notFound, pattern: '', params: dict<string>() }
      return { handler: methodNotAllowed(allowed), pattern: '', params: dict<string>() }
    }

    return { handler: match.endpoint.handler, pattern: match.endpoint.pattern.source, params: match.params }
  }

  match(method: string, path: string): { match: Match | null, allowed: string[] } {
    const route = path.slice(1).split('/').map(unescape)
    const allowed = new Set<string>()
    const stack: [RouteNode, number][] = [[this._root, 0]]

    for (let top = stack.pop(); top != null; top = stack.pop()) {
      const [node, depth] = top
      if (node.isMulti || depth === route.length) {
        const endpoint = node.endpoints == null ? undefined : pick(node.endpoints, method)
        if (endpoint != null) return { match: { endpoint, params: paramsOf(endpoint.pattern, route) }, allowed: [] }
        for (const other of node.endpoints?.keys() ?? []) {
          allowed.add(other)
          if (other === 'GET') allowed.add('HEAD')
        }
        continue
      }
      const slug = route[depth]
      if (node.multiChild != null) stack.push([node.multiChild, depth])
      if (node.wildChild != null && slug !== '') stack.push([node.wildChild, depth + 1])
      const child = node.staticChildren?.[slug]
      if (child != null) stack.push([child, depth + 1])
    }

    return { match: null, allowed: [...allowed].sort() }
  }

  serve: Handler = async (req, res) => {
    const { handler, pattern, params } = this.resolve(req)
    logger.debug('serving', { method: req.method, url: req.url, pattern })
    pathValues.set(req, params)
    await handler(req, res)
  }

}

function pick(endpoints: Map<string, Endpoint>, method: string): Endpoint | undefined {
  return endpoints.get(method) ??
    (method === 'HEAD' ? endpoints.get('GET') : undefined) ??
    endpoints.get('')
}

function paramsOf({ segments }: Pattern, route: string[]): Params {
  const params: Params = dict<string>()
  segments.forEach((segment, index) => {
    if (segment.kind === 'wild') params[segment.name] = route[index]
    if (segment.kind === 'multi' && segment.name !== '') {
      params[segment.name] = route.slice(index).join('/')
    }
  })
  return params
}

/**
 * Whether the match covers `path` itself rather than something beneath a
 * subtree or a multi-segment wildcard.
 */
function isExact(match: Match | null, path: string): boolean {
  if (match == null) return false
  const { segments } = match.endpoint.pattern
  if (segments[segments.length - 1]?.kind !== 'multi') return true
  if (!path.endsWith('/')) return false
  return segments.length === path.split('/').length - 1
}

function redirectTo(location: string, pattern: string): Resolution {
  const handler: Handler = (req, res) => redirect(req.method, res, location, 301)
  return { handler, pattern, params: dict<string>() }
}

const notFound: Handler = (_, res) => httpError(res, '404 page not found', 404)

function methodNotAllowed(allowed: string[]): Handler {
  return (_, res) => {
    res.setHeader('Allow', allowed.join(', '))
    httpError(res, 'Method Not Allowed', 405)
  }
}

function dict<T>(): Record<string, T> {
  return Object.create(null)
}

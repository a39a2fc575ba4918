import { toStatusInterceptor } from './interceptor'
import { fullPattern, joinPath } from './join'
import { logger } from './logger'
import { ServeMux } from './mux'
import type { Handler, Middleware } from './types'

/**
 * Owns one `ServeMux` and prefixes every pattern it registers with
 * `rootPath`.
 */
export class PatternRegistry {

  readonly mux = new ServeMux()
  rootPath: string
  globalWrapper?: Middleware
  notFoundHandler?: Handler

  constructor(...paths: string[]) {
    this.rootPath = joinPath(...paths)
  }

  fullPattern(pattern: string): string {
    return fullPattern(this.rootPath, pattern)
  }

  /**
   * Registers `pattern` under the root path. A pattern spelled with `-`
   * also answers to `_` in place of each `-`, and the other way around;
   * wildcard names are left as written.
   */
  register(pattern: string, handler: Handler): this {
    pattern = this.fullPattern(pattern)
    logger.debug('register', { pattern })
    this.mux.handle(pattern, handler)

    const alias = aliasOf(pattern)
    if (alias != null) {
      logger.debug('register alias', { pattern: alias })
      this.mux.handle(alias, handler)
    }
    return this
  }

  /**
   * Patterns that match nothing go to `notFoundHandler` when one is set,
   * without passing through `globalWrapper`.
   */
  dispatch: Handler = async (req, res) => {
    logger.debug('dispatch', { path: req.url })
    toStatusInterceptor(req, res)

    if (this.notFoundHandler != null && this.mux.resolve(req).pattern === '') {
      return await this.notFoundHandler(req, res)
    }

    const serve = this.globalWrapper != null
      ? this.globalWrapper(this.mux.serve)
      : this.mux.serve

    await serve(req, res)
  }

}

const WILDCARD = /(\{[^}]*\})/

function aliasOf(pattern: string): string | null {
  const swap = pattern.includes('-')
    ? { from: '-', to: '_' }
    : pattern.includes('_')
      ? { from: '_', to: '-' }
      : null
  if (swap == null) return null
  const alias = pattern
    .split(WILDCARD)
    .map(part => WILDCARD.test(part) ? part : part.replaceAll(swap.from, swap.to))
    .join('')
  return alias === pattern ? null : alias
}

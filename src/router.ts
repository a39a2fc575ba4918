import { joinPath } from './join'
import { PatternRegistry } from './registry'
import { sendJSON } from './res'
import type { Handler, Middleware } from './types'

type Route<R extends Router = Router> = (
  path: string,
  handler: Handler,
  ...chain: Middleware[]
) => R

/**
 * A node in a tree of routers. Each router registers into a
 * `PatternRegistry` and wraps what it registers in its own middleware
 * chain, first-added outermost.
 *
 * The chain is read when a route is registered: `use()` only reaches routes
 * registered after it.
 */
export class Router extends Function {

  protected _registry: PatternRegistry
  protected _chain: Middleware[]

  constructor(...chain: Middleware[]) {
    super()
    this._registry = new PatternRegistry()
    this._chain = chain
  }

  protected static _scoped(registry: PatternRegistry, chain: Middleware[]): Router {
    const router = new Router(...chain)
    router._registry = registry
    return router
  }

  use(...chain: Middleware[]): this {
    this._chain.push(...chain)
    return this
  }

  /**
   * Calls `fn` with a router sharing this one's patterns and path, holding a
   * copy of this router's chain.
   */
  group(fn: (router: Router) => void): this {
    fn(Router._scoped(this._registry, [...this._chain]))
    return this
  }

  /**
   * Creates a router with a mux of its own under `path`, lets `fn` register
   * on it, and mounts it. The sub-router starts with `chain` only; this
   * router's chain still wraps the mount point.
   */
  route(path: string, fn?: ((router: Router) => void) | null, ...chain: Middleware[]): Router {
    const registry = new PatternRegistry(this._registry.rootPath, path)
    registry.notFoundHandler = this._registry.notFoundHandler
    const router = Router._scoped(registry, chain)
    fn?.(router)
    this.mount(path, router)
    return router
  }

  /**
   * Serves everything under `path/` with `handler`, wrapped in this
   * router's chain followed by `chain`.
   */
  mount(path: string, handler: Handler | Router, ...chain: Middleware[]): this {
    const target = handler instanceof Router ? handler.serve : handler
    this._registry.register(path.replace(/\/$/, '') + '/', this._wrap(target, chain))
    return this
  }

  on(method: string, path: string, handler: Handler, ...chain: Middleware[]): this {
    this._registry.register(`${method} ${path}`, this._wrap(handler, chain))
    return this
  }

  any: Route<this> = (path, handler, ...chain) => {
    this._registry.register(path, this._wrap(handler, chain))
    return this
  }

  get: Route<this> = (path, handler, ...chain) => this.on('GET', path, handler, ...chain)
  put: Route<this> = (path, handler, ...chain) => this.on('PUT', path, handler, ...chain)
  post: Route<this> = (path, handler, ...chain) => this.on('POST', path, handler, ...chain)
  head: Route<this> = (path, handler, ...chain) => this.on('HEAD', path, handler, ...chain)
  patch: Route<this> = (path, handler, ...chain) => this.on('PATCH', path, handler, ...chain)
  delete: Route<this> = (path, handler, ...chain) => this.on('DELETE', path, handler, ...chain)
  options: Route<this> = (path, handler, ...chain) => this.on('OPTIONS', path, handler, ...chain)

  setGlobalWrapper(middleware: Middleware | undefined): this {
    this._registry.globalWrapper = middleware
    return this
  }

  setNotFoundHandler(handler: Handler | undefined): this {
    this._registry.notFoundHandler = handler
    return this
  }

  basePath(): string {
    return this._registry.rootPath
  }

  setBasePath(path: string): this {
    this._registry.rootPath = joinPath(path)
    return this
  }

  appendPath(path: string): this {
    this._registry.rootPath = joinPath(this._registry.rootPath, path)
    return this
  }

  serve: Handler = (req, res) => this._registry.dispatch(req, res)

  notFound: Handler = async (req, res) => {
    if (this._registry.notFoundHandler != null) {
      return await this._registry.notFoundHandler(req, res)
    }
    sendJSON(res, 404, { error: 'Not Found' })
  }

  protected _wrap(handler: Handler, chain: Middleware[]): Handler {
    return [...this._chain, ...chain].reduceRight<Handler>((next, middleware) => middleware(next), handler)
  }

}

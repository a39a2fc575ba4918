import type { IncomingMessage, ServerResponse } from 'http'
import { logger } from './logger'
import { Router } from './router'
import type { Middleware } from './types'

export type CallableRouter = Router & ((req: IncomingMessage, res: ServerResponse) => void)

/**
 * A `Router` that doubles as a `http.createServer` request listener.
 */
export default function createRouter(...chain: Middleware[]): CallableRouter {

  const router = new Router(...chain)

  return new Proxy(router, {
    apply(_, __, [req, res]: [IncomingMessage, ServerResponse]) {
      void onRequest(req, res)
    }
  }) as CallableRouter

  async function onRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      await router.serve(req, res)
    } catch (err) {
      logger.error('request failed', { method: req.method, url: req.url, err })
      res.destroy()
    }
  }

}

import type { IncomingMessage, OutgoingHttpHeaders, ServerResponse } from 'http'
import type { Http2ServerResponse } from 'http2'
import type { Socket } from 'net'
import { NotSupportedError } from './errors'
import { logger } from './logger'
import { splitURL } from './url'

interface Flusher {
  flush(): void
}

interface Pusher {
  createPushResponse(
    headers: OutgoingHttpHeaders,
    callback: (err: Error | null, res: Http2ServerResponse) => void
  ): void
}

const interceptors = new WeakMap<ServerResponse, StatusInterceptor>()

/**
 * Watches the status a response commits. A 301 pointing at the request path
 * plus a trailing slash (the dispatcher's own slash redirect) is committed as
 * a 307 instead, so clients repeat the request with its original method.
 */
class StatusInterceptor {

  status?: number

  constructor(readonly res: ServerResponse, readonly originalPath: string) {
    const writeHead = res.writeHead
    res.writeHead = (statusCode: number, ...rest: unknown[]) => {
      if (statusCode === 301 && locationOf(res, rest) === originalPath + '/') {
        logger.debug('rewriting slash redirect', { path: originalPath })
        this.status = statusCode = 307
      }
      Reflect.apply(writeHead, res, [statusCode, ...rest])
      return res
    }
  }

  /**
   * Takes the connection away from the HTTP server. The caller owns the
   * socket afterwards.
   */
  hijack(): Socket {
    const { socket } = this.res
    if (socket == null) throw new NotSupportedError('hijack')
    this.res.detachSocket(socket)
    return socket
  }

  flush(): void {
    if (isFlusher(this.res)) this.res.flush()
  }

  push(path: string, headers: OutgoingHttpHeaders = {}): Promise<Http2ServerResponse> {
    const { res } = this
    if (!isPusher(res)) return Promise.reject(new NotSupportedError('push'))
    return new Promise((resolve, reject) => {
      res.createPushResponse({ ...headers, ':path': path }, (err, pushed) => {
        if (err != null) reject(err)
        else resolve(pushed)
      })
    })
  }

}

export type { StatusInterceptor }

export function toStatusInterceptor(req: IncomingMessage, res: ServerResponse): StatusInterceptor {
  let interceptor = interceptors.get(res)
  if (interceptor != null) return interceptor
  interceptor = new StatusInterceptor(res, splitURL(req.url).path)
  interceptors.set(res, interceptor)
  return interceptor
}

/**
 * The `Location` a `writeHead` call commits: from its headers argument (an
 * object, or a flat `[name, value, ...]` list) when it names one, else the
 * header already set on the response.
 */
function locationOf(res: ServerResponse, args: unknown[]): unknown {
  for (const headers of args) {
    if (Array.isArray(headers)) {
      for (let i = 0; i < headers.length - 1; i += 2) {
        if (String(headers[i]).toLowerCase() === 'location') return headers[i + 1]
      }
    } else if (headers != null && typeof headers === 'object') {
      for (const [name, value] of Object.entries(headers)) {
        if (name.toLowerCase() === 'location') return value
      }
    }
  }
  return res.getHeader('Location')
}

function isFlusher(res: object): res is Flusher {
  return 'flush' in res && typeof res.flush === 'function'
}

function isPusher(res: object): res is Pusher {
  return 'createPushResponse' in res && typeof res.createPushResponse === 'function'
}

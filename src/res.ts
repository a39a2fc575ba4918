import { STATUS_CODES, type ServerResponse } from 'http'

export type JSONValue =
  | number
  | boolean
  | string
  | null
  | Array<JSONValue>
  | { [key: string]: JSONValue }
  | { toJSON(): JSONValue }

export function sendJSON(res: ServerResponse, status: number, data: JSONValue): void {
  res.setHeader('Content-Type', 'application/json; charset=UTF-8')
  res.statusCode = status
  res.end(JSON.stringify(data))
}

/**
 * Answers with a plain-text error: `message` followed by a newline.
 */
export function httpError(res: ServerResponse, message: string, status: number): void {
  res.removeHeader('Content-Length')
  res.setHeader('Content-Type', 'text/plain; charset=utf-8')
  res.setHeader('X-Content-Type-Options', 'nosniff')
  res.statusCode = status
  res.end(message + '\n')
}

export function statusText(status: number): string {
  return STATUS_CODES[status] ?? ''
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&#34;',
  "'": '&#39;'
}

/**
 * Redirects to `location`. GET and HEAD get an HTML content type, and GET a
 * short link body naming the status actually committed.
 */
export function redirect(method: string | undefined, res: ServerResponse, location: string, status: number): void {
  res.setHeader('Location', location)
  if (method === 'GET' || method === 'HEAD') {
    res.setHeader('Content-Type', 'text/html; charset=utf-8')
  }
  res.writeHead(status)
  if (method !== 'GET') return void res.end()
  const href = location.replace(/[&<>"']/g, char => HTML_ESCAPES[char])
  res.end(`<a href="${href}">${statusText(res.statusCode)}</a>.\n\n`)
}

import type { IncomingMessage, ServerResponse } from 'http'

export type Handler = (req: IncomingMessage, res: ServerResponse) => void | Promise<void>

export type Middleware = (next: Handler) => Handler

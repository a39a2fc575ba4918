export { default as createRouter, type CallableRouter } from './src/node'
export { Router } from './src/router'
export { PatternRegistry } from './src/registry'
export { ServeMux, pathValue, setPathValue, type Resolution } from './src/mux'
export { joinPath, fullPattern } from './src/join'
export { toStatusInterceptor, type StatusInterceptor } from './src/interceptor'
export { NotSupportedError } from './src/errors'
export { sendJSON, httpError, type JSONValue } from './src/res'
export { logger, verbose, silent } from './src/logger'
export type { Handler, Middleware } from './src/types'

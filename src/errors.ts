/**
 * Raised when a response capability (socket takeover, server push) is asked
 * of a response that cannot provide it.
 */
export class NotSupportedError extends Error {

  constructor(capability: string, options?: ErrorOptions) {
    super(`${capability} is not supported by this response`, options)
    this.name = this.constructor.name
  }

}

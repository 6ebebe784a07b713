/** Codec misuse detected while binding or extracting a value. */
export class CodecError extends Error {
  readonly codec: string

  constructor(codec: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'CodecError'
    this.codec = codec
  }
}

/**
 * A single log record. Immutable once constructed.
 */
export class LogMessage {
  readonly timestamp: number
  readonly message: string
  readonly bytes: number

  constructor(timestamp: number, message: string) {
    this.timestamp = timestamp
    this.message = message
    this.bytes = Buffer.byteLength(message, 'utf8')
  }

  /**
   * Returns a copy whose UTF-8 encoding is at most `maxBytes` long, never
   * splitting a multi-byte character.
   */
  truncate(maxBytes: number): LogMessage {
    if (this.bytes <= maxBytes) return this

    const encoded = Buffer.from(this.message, 'utf8')
    let end = Math.max(0, maxBytes)
    // back up over continuation bytes (10xxxxxx) to a character boundary
    while (end > 0 && (encoded[end] & 0xc0) === 0x80) {
      end--
    }

    return new LogMessage(this.timestamp, encoded.subarray(0, end).toString('utf8'))
  }
}

import { describe, it, expect } from 'vitest'
import { LogMessage } from '../../../src/lib/logwriter/log-message.js'

describe('LogMessage', () => {
  it('should measure its size in UTF-8 bytes', () => {
    expect(new LogMessage(0, 'abc').bytes).toBe(3)
    expect(new LogMessage(0, 'é').bytes).toBe(2)
    expect(new LogMessage(0, '€').bytes).toBe(3)
  })

  it('should return itself when already within the limit', () => {
    const message = new LogMessage(42, 'short')

    expect(message.truncate(10)).toBe(message)
  })

  it('should truncate to the byte limit and keep the timestamp', () => {
    const truncated = new LogMessage(42, 'abcdefghij').truncate(4)

    expect(truncated.message).toBe('abcd')
    expect(truncated.bytes).toBe(4)
    expect(truncated.timestamp).toBe(42)
  })

  it('should not split a multi-byte character', () => {
    // each euro sign is three bytes
    const truncated = new LogMessage(0, '€€€').truncate(7)

    expect(truncated.message).toBe('€€')
    expect(truncated.bytes).toBe(6)
  })
})

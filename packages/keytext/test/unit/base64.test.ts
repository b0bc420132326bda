import { describe, it, expect } from 'vitest'
import { decodeBase64, encodeBase64 } from '../../src/base64.js'
import { MalformedBase64Error } from '../../src/errors.js'

describe('encodeBase64', () => {
  it('uses the standard alphabet with padding', () => {
    expect(encodeBase64(new Uint8Array([0xfb, 0xff]))).toBe('+/8=')
  })

  it('encodes an empty array as an empty string', () => {
    expect(encodeBase64(new Uint8Array(0))).toBe('')
  })
})

describe('decodeBase64', () => {
  it('decodes padded input', () => {
    expect(Array.from(decodeBase64('+/8='))).toEqual([0xfb, 0xff])
  })

  it('accepts input without padding', () => {
    expect(Array.from(decodeBase64('+/8'))).toEqual([0xfb, 0xff])
    expect(Array.from(decodeBase64('QQ'))).toEqual([0x41])
  })

  it('decodes an empty string to no bytes', () => {
    expect(decodeBase64('').length).toBe(0)
  })

  it('reports the position of the first character outside the alphabet', () => {
    try {
      decodeBase64('not-base64!!')
      expect.unreachable('should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedBase64Error)
      if (err instanceof MalformedBase64Error) {
        expect(err.position).toBe(3)
        expect(err.message).toBe('Invalid base64 character "-" at position 3')
      }
    }
  })

  it('rejects embedded line breaks', () => {
    expect(() => decodeBase64('QUJD\nREVG')).toThrow(MalformedBase64Error)
  })

  it('rejects the URL-safe alphabet', () => {
    expect(() => decodeBase64('-_8')).toThrow(MalformedBase64Error)
  })

  describe('length and padding', () => {
    it.each(['QUJDR', 'QU=J', 'QQ===', 'Q===', '='])('rejects %j', (text) => {
      try {
        decodeBase64(text)
        expect.unreachable('should have thrown')
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedBase64Error)
        if (err instanceof MalformedBase64Error) {
          expect(err.position).toBeUndefined()
        }
      }
    })
  })
})

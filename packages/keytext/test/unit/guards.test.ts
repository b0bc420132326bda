import { describe, it, expect } from 'vitest'
import { isObject } from '../../src/guards.js'

describe('isObject', () => {
  it('accepts plain objects', () => {
    expect(isObject({})).toBe(true)
    expect(isObject({ kty: 'OKP' })).toBe(true)
  })

  it.each([
    ['null', null],
    ['an array', ['OKP']],
    ['a string', 'OKP'],
    ['a number', 64],
    ['undefined', undefined],
  ])('rejects %s', (_label, value) => {
    expect(isObject(value)).toBe(false)
  })
})

import { describe, it, expect } from 'vitest'
import {
  AlgorithmMismatchError,
  InvalidOptionsError,
  KeyTextError,
  MalformedBase64Error,
  MalformedKeyEncodingError,
  NotPublicKeyError,
} from '../../src/errors.js'

describe('error hierarchy', () => {
  it('derives every error from KeyTextError', () => {
    const errors = [
      new AlgorithmMismatchError('m', 'rsa'),
      new NotPublicKeyError('m', 'private'),
      new MalformedBase64Error('m', 0),
      new MalformedKeyEncodingError('m'),
      new InvalidOptionsError('m', 'pemLineLength'),
    ]
    for (const err of errors) {
      expect(err).toBeInstanceOf(KeyTextError)
      expect(err).toBeInstanceOf(Error)
    }
  })

  it('sets name to the class name', () => {
    expect(new KeyTextError('m').name).toBe('KeyTextError')
    expect(new AlgorithmMismatchError('m', undefined).name).toBe('AlgorithmMismatchError')
    expect(new NotPublicKeyError('m', 'private').name).toBe('NotPublicKeyError')
    expect(new MalformedBase64Error('m', undefined).name).toBe('MalformedBase64Error')
    expect(new MalformedKeyEncodingError('m').name).toBe('MalformedKeyEncodingError')
    expect(new InvalidOptionsError('m', 'logger').name).toBe('InvalidOptionsError')
  })

  it('carries machine-readable fields', () => {
    expect(new AlgorithmMismatchError('m', 'ec').actual).toBe('ec')
    expect(new NotPublicKeyError('m', 'private').keyType).toBe('private')
    expect(new MalformedBase64Error('m', 7).position).toBe(7)
    expect(new InvalidOptionsError('m', 'lineSeparator').option).toBe('lineSeparator')
  })
})

import { describe, expect, it } from 'vitest'
import { ConfigError, errorMessage } from './errors.js'

describe('ConfigError', () => {
  it('appends one line per issue', () => {
    const error = new ConfigError('Invalid configuration in /w/workspace.config.json', '/w/workspace.config.json', [
      'hooksDir: expected string',
      '(root): unknown key',
    ])

    expect(error.message).toBe(
      'Invalid configuration in /w/workspace.config.json\n  - hooksDir: expected string\n  - (root): unknown key',
    )
    expect(error.name).toBe('ConfigError')
    expect(error.file).toBe('/w/workspace.config.json')
  })
})

describe('errorMessage', () => {
  it('handles errors and thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage('plain')).toBe('plain')
  })
})

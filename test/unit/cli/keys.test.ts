import { it, expect } from 'vitest'
import { translateKey, translateKeys } from '../../../client/cli/keys.js'

it('maps named keys', () => {
  expect(translateKey('Enter')).toBe('\r')
  expect(translateKey('Escape')).toBe('\x1b')
  expect(translateKey('Up')).toBe('\x1b[A')
  expect(translateKey('BTab')).toBe('\x1b[Z')
})

it('maps ctrl chords case-insensitively', () => {
  expect(translateKey('C-c')).toBe('\x03')
  expect(translateKey('c-d')).toBe('\x04')
  expect(translateKey('C-a')).toBe('\x01')
  expect(translateKey('C-z')).toBe('\x1a')
})

it('maps meta chords to an escape prefix', () => {
  expect(translateKey('M-f')).toBe('\x1bf')
})

it('passes other text through', () => {
  expect(translateKey('show version')).toBe('show version')
})

it('joins a key sequence', () => {
  expect(translateKeys(['q', 'C-c', 'ls', 'Enter'])).toBe('q\x03ls\r')
})

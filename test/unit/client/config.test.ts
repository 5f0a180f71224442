import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'

vi.mock('../../../client/logger', () => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  }
  logger.child.mockReturnValue(logger)
  return { logger }
})

import { configFilePath, readReconnectedTerminals, resolveConfig } from '../../../client/config.js'
import { ConfigError } from '../../../client/errors.js'
import { logger } from '../../../client/logger.js'

describe('resolveConfig', () => {
  let homeDir: string

  beforeEach(() => {
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bspterm-home-'))
    vi.mocked(logger.warn).mockClear()
  })

  afterEach(() => {
    fs.rmSync(homeDir, { recursive: true, force: true })
  })

  function writeConfigFile(contents: string) {
    const file = configFilePath(homeDir)
    fs.mkdirSync(path.dirname(file), { recursive: true })
    fs.writeFileSync(file, contents)
  }

  it('places the config file under ~/.bspterm', () => {
    expect(configFilePath('/home/test')).toBe('/home/test/.bspterm/client.json')
  })

  it('prefers env vars', () => {
    writeConfigFile(JSON.stringify({ socket: '/from/file.sock', currentTerminal: 'file-term' }))
    const config = resolveConfig({
      env: { BSPTERM_SOCKET: 'tcp://127.0.0.1:7000', BSPTERM_CURRENT_TERMINAL: 'env-term' },
      ppid: 1,
      homeDir,
    })
    expect(config).toEqual({
      endpoint: { kind: 'tcp', host: '127.0.0.1', port: 7000 },
      currentTerminalId: 'env-term',
    })
  })

  it('falls back to the config file', () => {
    writeConfigFile(JSON.stringify({ socket: '/from/file.sock', currentTerminal: 'file-term' }))
    const config = resolveConfig({ env: {}, ppid: 1, homeDir })
    expect(config).toEqual({ endpoint: { kind: 'unix', path: '/from/file.sock' }, currentTerminalId: 'file-term' })
  })

  it('falls back to the parent process socket without a config file', () => {
    const config = resolveConfig({ env: { XDG_RUNTIME_DIR: '/run/user/1000' }, ppid: 321, homeDir })
    expect(config).toEqual({ endpoint: { kind: 'unix', path: '/run/user/1000/bspterm-321.sock' } })
  })

  it('ignores an invalid config file with a warning', () => {
    writeConfigFile('{ not json')
    const config = resolveConfig({ env: { TMPDIR: '/var/tmp' }, ppid: 5, homeDir })
    expect(config).toEqual({ endpoint: { kind: 'unix', path: '/var/tmp/bspterm-5.sock' } })
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })

  it('ignores a config file of the wrong shape with a warning', () => {
    writeConfigFile(JSON.stringify({ socket: 42 }))
    const config = resolveConfig({ env: { TMPDIR: '/var/tmp' }, ppid: 5, homeDir })
    expect(config).toEqual({ endpoint: { kind: 'unix', path: '/var/tmp/bspterm-5.sock' } })
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })
})

describe('readReconnectedTerminals', () => {
  it('returns an empty list when the variable is unset', () => {
    expect(readReconnectedTerminals({})).toEqual([])
  })

  it('maps entries to camelCase and drops empty fields', () => {
    const raw = JSON.stringify([
      { terminal_id: 't1', host: '10.0.0.1', group_id: 'g1', group_name: 'lab' },
      { terminal_id: 't2' },
    ])
    expect(readReconnectedTerminals({ BSPTERM_RECONNECTED_TERMINALS: raw })).toEqual([
      { terminalId: 't1', host: '10.0.0.1', groupId: 'g1', groupName: 'lab' },
      { terminalId: 't2' },
    ])
  })

  it('rejects malformed JSON', () => {
    expect(() => readReconnectedTerminals({ BSPTERM_RECONNECTED_TERMINALS: '[' })).toThrow(
      'Invalid JSON in BSPTERM_RECONNECTED_TERMINALS',
    )
  })

  it('rejects entries without a terminal id', () => {
    expect(() => readReconnectedTerminals({ BSPTERM_RECONNECTED_TERMINALS: '[{"host":"h"}]' })).toThrow(ConfigError)
  })
})

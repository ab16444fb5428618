import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  EXIT_INVALID_CONFIG,
  EXIT_INVENTORY_UNREADABLE,
  EXIT_OK,
  runProvisionCommand,
  type ProvisionCommandOptions,
} from '@/cli/provision'
import { captureLogger, LEVEL, messages } from '@/lib/__tests__/helpers'
import { config } from '@/lib/config'
import type { ProvisionApi } from '@/types'

const INVENTORY = [
  '# comment',
  'host1,192.168.1.10',
  'host2,10.0.0.5',
  'host3,172.0.10.1',
  '',
  'invalid line',
  'invalid-host4,999.999.999',
  '',
].join('\n')

describe('runProvisionCommand', () => {
  let dir: string
  let inventoryPath: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'provision-cli-'))
    inventoryPath = join(dir, 'hosts.csv')
    writeFileSync(inventoryPath, INVENTORY)
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  function options(overrides: Partial<ProvisionCommandOptions> = {}): ProvisionCommandOptions {
    return {
      inventory: inventoryPath,
      dryRun: false,
      simulate: false,
      reportEmptyFields: false,
      ...overrides,
    }
  }

  function okApi() {
    const provision = vi.fn<ProvisionApi['provision']>(async () => ({ ok: true, statusCode: 200 }))
    return { api: { provision }, provision }
  }

  it('dry-runs the inventory and exits 0', async () => {
    const { api, provision } = okApi()
    const { logger, entries } = captureLogger()

    const result = await runProvisionCommand(options({ dryRun: true }), { logger, api })

    expect(result.exitCode).toBe(EXIT_OK)
    expect(result.summary).toMatchObject({
      valid: 3,
      parseErrors: 2,
      completed: 0,
      failed: 0,
      dryRun: 3,
    })
    expect(provision).not.toHaveBeenCalled()
    expect(messages(entries, LEVEL.info)).toContain('Parsed inventory: 3 valid entries, 2 parse errors')
    expect(messages(entries, LEVEL.warn)).toEqual([
      "Parse error line 6: expected 'hostname,address'",
      'Parse error line 7: invalid address: 999.999.999',
    ])
  })

  it('exits 0 when some hosts fail to provision', async () => {
    const provision = vi.fn<ProvisionApi['provision']>(async (request) =>
      request.payload.hostname === 'host2'
        ? { ok: false, statusCode: 500, error: 'HTTP 500: boom' }
        : { ok: true, statusCode: 200 })
    const { logger } = captureLogger()

    const result = await runProvisionCommand(options({ retries: 1, apiKey: 'test-secret' }), {
      logger,
      api: { provision },
    })

    expect(result.exitCode).toBe(EXIT_OK)
    expect(result.summary).toMatchObject({ completed: 2, failed: 1, dryRun: 0 })
    expect(provision).toHaveBeenCalledTimes(4)
    expect(provision).toHaveBeenCalledWith({
      endpoint: 'https://api.example.local/',
      credential: 'test-secret',
      payload: { hostname: 'host1', address: '192.168.1.10' },
      timeoutMs: 10_000,
    })
  })

  it('exits 2 when the inventory cannot be read', async () => {
    const { api, provision } = okApi()
    const { logger, entries } = captureLogger()

    const result = await runProvisionCommand(options({ inventory: join(dir, 'missing.csv') }), { logger, api })

    expect(result).toEqual({ exitCode: EXIT_INVENTORY_UNREADABLE })
    expect(provision).not.toHaveBeenCalled()
    const error = entries.find((e) => e.level === LEVEL.error)
    expect(error?.msg).toMatch(/^Inventory file could not be read: /)
  })

  it('exits 1 for invalid settings before reading the inventory', async () => {
    const { api } = okApi()
    const { logger, entries } = captureLogger()

    const result = await runProvisionCommand(options({ concurrency: 0 }), { logger, api })

    expect(result).toEqual({ exitCode: EXIT_INVALID_CONFIG })
    expect(messages(entries, LEVEL.error)).toEqual(['Invalid setting: concurrency: Concurrency must be at least 1'])
    expect(messages(entries, LEVEL.info)).toEqual([])
  })

  it('reads the inventory from stdin when given -', async () => {
    const { api } = okApi()
    const { logger } = captureLogger()
    const stdin = Readable.from([Buffer.from('host1,10.0.0.1\nhost2,bad\n')])

    const result = await runProvisionCommand(options({ inventory: '-', dryRun: true }), { logger, api, stdin })

    expect(result.exitCode).toBe(EXIT_OK)
    expect(result.summary).toMatchObject({ valid: 1, parseErrors: 1, dryRun: 1 })
  })

  it('exits 2 when stdin fails mid-read', async () => {
    const { api, provision } = okApi()
    const { logger, entries } = captureLogger()
    const stdin = new Readable({
      read() {
        this.destroy(new Error('stdin closed unexpectedly'))
      },
    })

    const result = await runProvisionCommand(options({ inventory: '-' }), { logger, api, stdin })

    expect(result).toEqual({ exitCode: EXIT_INVENTORY_UNREADABLE })
    expect(provision).not.toHaveBeenCalled()
    expect(messages(entries, LEVEL.error)).toEqual([
      'Inventory file could not be read: - (stdin closed unexpectedly)',
    ])
  })

  it('rejects a backoff base delay that is not a number', async () => {
    const original = config.backoff.baseDelayMs
    config.backoff.baseDelayMs = Number('abc')
    try {
      const { api } = okApi()
      const { logger, entries } = captureLogger()

      const result = await runProvisionCommand(options({ dryRun: true }), { logger, api })

      expect(result).toEqual({ exitCode: EXIT_INVALID_CONFIG })
      expect(messages(entries, LEVEL.error)).toEqual([
        'Invalid setting: backoff.baseDelayMs: Expected number, received nan',
      ])
    } finally {
      config.backoff.baseDelayMs = original
    }
  })

  it('counts empty-field lines as parse errors when asked to', async () => {
    writeFileSync(inventoryPath, 'host1,10.0.0.1\n,10.0.0.2\n')
    const { api } = okApi()
    const { logger } = captureLogger()

    const result = await runProvisionCommand(options({ dryRun: true, reportEmptyFields: true }), { logger, api })

    expect(result.summary).toMatchObject({ valid: 1, parseErrors: 1 })
  })

  it('finishes cleanly on an inventory with no valid entries', async () => {
    writeFileSync(inventoryPath, '# nothing here\n\n')
    const { api, provision } = okApi()
    const { logger, entries } = captureLogger()

    const result = await runProvisionCommand(options(), { logger, api })

    expect(result.exitCode).toBe(EXIT_OK)
    expect(result.summary).toMatchObject({ valid: 0, completed: 0, failed: 0, dryRun: 0, workers: 0 })
    expect(provision).not.toHaveBeenCalled()
    expect(messages(entries, LEVEL.info)).toContain('No valid entries to process')
  })
})

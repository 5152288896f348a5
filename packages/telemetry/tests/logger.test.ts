import { afterEach, describe, expect, it } from 'vitest'
import type { LogRecord } from '@logtape/logtape'
import {
  configureLogger,
  formatJsonRecord,
  formatMessage,
  getLogger,
  resetLogger,
} from '../src/index.js'

describe('logger', () => {
  const records: LogRecord[] = []
  const capture = (record: LogRecord): void => {
    records.push(record)
  }

  afterEach(async () => {
    records.length = 0
    await resetLogger()
  })

  it('routes gantry categories to the configured sink', async () => {
    await configureLogger({ sink: capture, level: 'info' })

    getLogger(['gantry', 'test']).info`hello ${'world'}`

    expect(records).toHaveLength(1)
    expect(records[0].category).toEqual(['gantry', 'test'])
    expect(formatMessage(records[0])).toBe('hello world')
  })

  it('drops records below the configured level', async () => {
    await configureLogger({ sink: capture, level: 'warning' })

    const logger = getLogger(['gantry', 'test'])
    logger.info`ignored`
    logger.warn`kept`

    expect(records.map(formatMessage)).toEqual(['kept'])
  })

  it('ignores categories outside the gantry root', async () => {
    await configureLogger({ sink: capture, level: 'debug' })

    getLogger(['elsewhere']).error`not ours`

    expect(records).toHaveLength(0)
  })

  it('is a no-op when called twice', async () => {
    await configureLogger({ sink: capture, level: 'info' })
    await configureLogger({ sink: capture, level: 'debug' })

    getLogger(['gantry']).debug`still filtered`

    expect(records).toHaveLength(0)
  })

  it('formats JSON lines with credential properties redacted', async () => {
    await configureLogger({ sink: capture, level: 'info' })

    getLogger(['gantry', 'auth']).info('provisioned {username}', {
      username: 'admin',
      password: 'test-secret',
    })

    const line = JSON.parse(formatJsonRecord(records[0]))
    expect(line.level).toBe('info')
    expect(line.category).toBe('gantry.auth')
    expect(line.message).toBe('provisioned admin')
    expect(line.properties).toEqual({ username: 'admin', password: '[REDACTED]' })
    expect(line.trace_id).toBeUndefined()
  })
})

import { describe, it, expect, afterEach, vi } from 'vitest'
import { logger } from '../utils/logger'

describe('logger', () => {
  afterEach(() => { logger.reset() })

  it('prefixes human lines and sends warnings to stderr', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {})
    const err = vi.spyOn(console, 'error').mockImplementation(() => {})
    logger.info('hello')
    logger.warn('careful')
    expect(out).toHaveBeenCalledWith('ℹ hello')
    expect(err).toHaveBeenCalledWith('⚠ careful')
  })

  it('uses text prefixes with --no-emoji', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.setNoEmoji(true)
    logger.info('plain')
    expect(out).toHaveBeenCalledWith('[info] plain')
  })

  it('honours the level', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.debug('hidden')
    logger.setLevel('debug')
    logger.debug('shown')
    expect(out.mock.calls).toEqual([['• shown']])
  })

  it('suppresses human output in JSON mode and prints JSON', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.setJsonOnly(true)
    logger.info('ignored')
    logger.json({ ok: true })
    expect(out.mock.calls).toEqual([['{\n  "ok": true\n}']])
  })

  it('prints one compact object per line in NDJSON mode', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.setNdjson(true)
    expect(logger.isJson()).toBe(true)
    logger.json({ action: 'deploy', phase: 'building' })
    expect(out.mock.calls).toEqual([['{"action":"deploy","phase":"building"}']])
  })

  it('redacts configured literals from human output', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.setRedactors(['test-secret', /tok_[a-z]+/g])
    logger.info('value test-secret and tok_abc')
    expect(out).toHaveBeenCalledWith('ℹ value ****** and ******')
  })
})

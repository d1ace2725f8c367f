/**
 * Config Loader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { ConfigErrorCode, DEFAULT_COMPARE_CONFIG } from '@polyprompt/core'
import { loadConfig } from './loader.js'

let testDir: string

function writeConfig(name: string, content: string): void {
  writeFileSync(join(testDir, name), content)
}

describe('loadConfig', () => {
  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'polyprompt-config-'))
  })

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true })
  })

  it('should fall back to the built-in configuration when no file exists', async () => {
    const loaded = await loadConfig(undefined, testDir)

    expect(loaded.path).toBeUndefined()
    expect(loaded.config).toBe(DEFAULT_COMPARE_CONFIG)
  })

  it('should throw CONFIG_NOT_FOUND for an explicit path that does not exist', async () => {
    await expect(loadConfig('missing.yaml', testDir)).rejects.toMatchObject({
      code: ConfigErrorCode.CONFIG_NOT_FOUND,
      context: { path: join(testDir, 'missing.yaml') },
    })
  })

  it('should merge a partial default-named file over the built-in configuration', async () => {
    writeConfig(
      'polyprompt.config.yaml',
      [
        'pricing:',
        '  gpt-4o-mini: [0.2, 0.8]',
        '  my-model: [1, 2]',
        'tiers:',
        '  economy:',
        '    models:',
        '      openai: my-model',
        'system_prompts:',
        '  terse: One line only.',
        'defaults:',
        '  numCalls: 2',
        '',
      ].join('\n')
    )

    const { config, path } = await loadConfig(undefined, testDir)

    expect(path).toBe(join(testDir, 'polyprompt.config.yaml'))
    expect(config.pricing['gpt-4o-mini']).toEqual({
      inputPricePerMillion: 0.2,
      outputPricePerMillion: 0.8,
    })
    expect(config.pricing['my-model']).toEqual({ inputPricePerMillion: 1, outputPricePerMillion: 2 })
    expect(config.pricing['claude-3-5-haiku-20241022']).toEqual({
      inputPricePerMillion: 0.8,
      outputPricePerMillion: 4.0,
    })
    expect(config.tiers.economy.models.openai).toBe('my-model')
    expect(config.tiers.economy.models.claude).toBe('claude-3-5-haiku-20241022')
    expect(config.tiers.economy.synthesis).toEqual({
      provider: 'claude',
      model: 'claude-3-5-haiku-20241022',
    })
    expect(config.systemPrompts.terse).toBe('One line only.')
    expect(config.systemPrompts.default).toBe('You are a helpful assistant.')
    expect(config.defaults).toEqual({ ...DEFAULT_COMPARE_CONFIG.defaults, numCalls: 2 })
  })

  it('should leave the built-in configuration untouched', async () => {
    writeConfig('custom.yaml', 'pricing:\n  gpt-4o-mini: [9, 9]\n')

    await loadConfig('custom.yaml', testDir)

    expect(DEFAULT_COMPARE_CONFIG.pricing['gpt-4o-mini']).toEqual({
      inputPricePerMillion: 0.15,
      outputPricePerMillion: 0.6,
    })
  })

  it('should default the synthesis provider of a new tier to claude', async () => {
    writeConfig(
      'custom.yaml',
      [
        'tiers:',
        '  budget:',
        '    models:',
        '      claude: claude-3-5-haiku-20241022',
        '    synthesis: claude-3-5-haiku-20241022',
        '',
      ].join('\n')
    )

    const { config } = await loadConfig('custom.yaml', testDir)

    expect(config.tiers.budget).toEqual({
      description: '',
      models: { claude: 'claude-3-5-haiku-20241022' },
      synthesis: { provider: 'claude', model: 'claude-3-5-haiku-20241022' },
    })
  })

  it('should reject negative prices', async () => {
    writeConfig('custom.yaml', 'pricing:\n  gpt-4o-mini: [-1, 0.6]\n')

    await expect(loadConfig('custom.yaml', testDir)).rejects.toMatchObject({
      code: ConfigErrorCode.INVALID_CONFIG,
      message: expect.stringContaining('pricing.gpt-4o-mini.0'),
    })
  })

  it('should reject unknown keys', async () => {
    writeConfig('custom.yaml', 'tier: luxury\n')

    await expect(loadConfig('custom.yaml', testDir)).rejects.toMatchObject({
      code: ConfigErrorCode.INVALID_CONFIG,
    })
  })

  it('should wrap YAML syntax errors', async () => {
    writeConfig('custom.yaml', 'pricing: [unclosed\n')

    await expect(loadConfig('custom.yaml', testDir)).rejects.toMatchObject({
      code: ConfigErrorCode.INVALID_CONFIG,
      message: expect.stringContaining(`Failed to read config file ${join(testDir, 'custom.yaml')}`),
    })
  })
})

import { describe, it, expect } from 'vitest'
import { ConfigError, ConfigErrorCode, noopLogger } from '@polyprompt/core'
import { MockProvider } from '@polyprompt/core/testing'
import { initializeProviders } from './provider-factory.js'

describe('initializeProviders', () => {
  it('should create one mock provider per distinct name in --mock mode', async () => {
    const registry = initializeProviders({
      providers: ['claude', 'openai', 'claude'],
      env: {},
      requestTimeoutMs: 1000,
      logger: noopLogger,
      mock: true,
    })

    expect([...registry.keys()]).toEqual(['claude', 'openai'])
    const claude = registry.get('claude')
    expect(claude).toBeInstanceOf(MockProvider)

    const response = await claude?.complete({
      model: 'claude-3-5-haiku-20241022',
      systemPrompt: 'You are terse.',
      userPrompt: 'Hi',
      maxTokens: 16,
      temperature: 0,
    })
    expect(response?.text).toBe('Claude response from claude-3-5-haiku-20241022.')
    expect(response?.usage?.outputTokens).toBe(12)
  })

  it('should build real providers when every key is present', () => {
    const registry = initializeProviders({
      providers: ['openai', 'gemini'],
      env: { OPENAI_API_KEY: 'test-secret', GEMINI_API_KEY: 'test-secret' },
      requestTimeoutMs: 1000,
      logger: noopLogger,
    })

    expect(registry.get('openai')?.name).toBe('openai')
    expect(registry.get('gemini')?.name).toBe('gemini')
  })

  it('should fail on a missing key before building any provider', () => {
    let thrown: unknown
    try {
      initializeProviders({
        providers: ['openai', 'claude'],
        env: { OPENAI_API_KEY: 'test-secret' },
        requestTimeoutMs: 1000,
        logger: noopLogger,
      })
    } catch (error) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(ConfigError)
    expect(thrown).toMatchObject({
      code: ConfigErrorCode.MISSING_API_KEY,
      message: 'Missing API key for claude: set ANTHROPIC_API_KEY',
    })
  })
})

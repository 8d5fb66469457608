import { beforeEach, describe, expect, test, vi } from 'vitest'

const mocks = vi.hoisted(() => {
  return {
    generateText: vi.fn(),
    createOpenAI: vi.fn(),
    chat: vi.fn((modelId: string) => ({ modelId }))
  }
})

vi.mock('ai', () => {
  return {
    generateText: mocks.generateText
  }
})

vi.mock('@ai-sdk/openai', () => {
  return {
    createOpenAI: mocks.createOpenAI
  }
})

import { OpenAIDocProvider } from '../../src/infrastructure/llm/openaiDocProvider.js'

describe('OpenAIDocProvider (DocProvider port)', () => {
  beforeEach(() => {
    mocks.generateText.mockReset()
    mocks.createOpenAI.mockReset()
    mocks.createOpenAI.mockReturnValue({ chat: mocks.chat })
  })

  test('throws a readable error when api key is missing', () => {
    expect(() => new OpenAIDocProvider({ apiKey: null, model: 'm1', maxOutputTokens: 100 })).toThrow(
      'Missing DOCWEAVE_API_KEY (or OPENAI_API_KEY) for the openai provider'
    )
  })

  test('passes the key and base URL to the SDK', () => {
    new OpenAIDocProvider({ apiKey: 'test-secret', baseURL: 'http://localhost:8080/v1', model: 'm1', maxOutputTokens: 100 })
    new OpenAIDocProvider({ apiKey: 'test-secret', baseURL: null, model: 'm1', maxOutputTokens: 100 })

    expect(mocks.createOpenAI).toHaveBeenNthCalledWith(1, { apiKey: 'test-secret', baseURL: 'http://localhost:8080/v1' })
    expect(mocks.createOpenAI).toHaveBeenNthCalledWith(2, { apiKey: 'test-secret', baseURL: undefined })
  })

  test('generate sends both prompts to the chat model and returns the text', async () => {
    mocks.generateText.mockResolvedValue({ text: '[]' })
    const provider = new OpenAIDocProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini', maxOutputTokens: 1234 })

    await expect(provider.generate('user prompt', 'system prompt')).resolves.toBe('[]')

    expect(mocks.chat).toHaveBeenCalledWith('gpt-4o-mini')
    expect(mocks.generateText).toHaveBeenCalledWith({
      model: { modelId: 'gpt-4o-mini' },
      system: 'system prompt',
      prompt: 'user prompt',
      temperature: 0,
      maxOutputTokens: 1234
    })
    expect(provider.name).toBe('openai')
    expect(provider.model).toBe('gpt-4o-mini')
  })

  test('provider errors propagate', async () => {
    mocks.generateText.mockRejectedValue(new Error('429 Too Many Requests'))
    const provider = new OpenAIDocProvider({ apiKey: 'test-secret', model: 'm1', maxOutputTokens: 100 })

    await expect(provider.generate('u', 's')).rejects.toThrow('429 Too Many Requests')
  })
})

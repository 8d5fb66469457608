import { generateText } from 'ai'
import { createOpenAI } from '@ai-sdk/openai'
import type { DocProvider } from '../../core/ports/docProvider.js'

export class OpenAIDocProvider implements DocProvider {
  readonly name: string
  readonly model: string
  readonly #openai: ReturnType<typeof createOpenAI>
  readonly #maxOutputTokens: number

  constructor(opts: {
    apiKey: string | null
    baseURL?: string | null
    model: string
    maxOutputTokens: number
    name?: string
  }) {
    if (!opts.apiKey) {
      throw new Error('Missing DOCWEAVE_API_KEY (or OPENAI_API_KEY) for the openai provider')
    }
    this.name = opts.name ?? 'openai'
    this.model = opts.model
    this.#maxOutputTokens = opts.maxOutputTokens
    this.#openai = createOpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL ?? undefined })
  }

  async generate(userPrompt: string, systemPrompt: string): Promise<string> {
    const { text } = await generateText({
      model: this.#openai.chat(this.model),
      system: systemPrompt,
      prompt: userPrompt,
      temperature: 0,
      maxOutputTokens: this.#maxOutputTokens
    })
    return text
  }
}

import type { AppConfig } from '../../config/appConfig.js'
import type { DocProvider } from '../../core/ports/docProvider.js'
import { MockDocProvider } from './mockDocProvider.js'
import { OpenAIDocProvider } from './openaiDocProvider.js'

/**
 * Build the provider named in the validated config.
 *
 * This is the only place that branches on provider names; everything
 * downstream sees the DocProvider port.
 */
export function createDocProvider(config: AppConfig['provider']): DocProvider {
  if (config.name === 'mock') {
    return new MockDocProvider()
  }

  return new OpenAIDocProvider({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    model: config.model,
    maxOutputTokens: config.maxOutputTokens
  })
}

/**
 * Core Ports - Documentation Provider
 *
 * The single capability the pipeline needs from a text-generation backend.
 * Rate limiting, retries and cost accounting live behind this boundary.
 */
export interface DocProvider {
  /** Name recorded in manifest entries and run metadata */
  readonly name: string
  /** Model identifier, recorded in run metadata */
  readonly model: string

  generate(userPrompt: string, systemPrompt: string): Promise<string>
}

import type { ProcessingManifest } from '../domain.js'

/**
 * Core Ports - Manifest Store
 *
 * Incremental ledger of processed source files. Every mutation is persisted
 * before the returned promise settles.
 */
export interface ManifestStore {
  load(): Promise<void>
  /** True only if the file is recorded, its output still exists and its code hash is unchanged */
  isProcessed(sourcePath: string): Promise<boolean>
  markProcessed(sourcePath: string, success: boolean, content?: string): Promise<void>
  snapshot(): ProcessingManifest
}

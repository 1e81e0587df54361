import { statSync } from 'node:fs';

import { z, type ZodType, type ZodTypeDef } from 'zod';

import { ConfigError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { dataPath, readJsonFile } from '../utils/data';

export const ProviderFingerprintSchema = z.object({
  displayName: z.string().min(1),
  footerTextContains: z.array(z.string().min(1)).default([]),
  structuredDataClues: z.array(z.string().min(1)).default([]),
  domainClues: z.array(z.string().min(1)).default([]),
});

export type ProviderFingerprint = z.infer<typeof ProviderFingerprintSchema>;

export const CreditFingerprintSchema = z.object({
  displayName: z.string().min(1),
  domains: z.array(z.string().min(1)).min(1),
});

export type CreditFingerprint = z.infer<typeof CreditFingerprintSchema>;

export const DEFAULT_PROVIDER_FINGERPRINTS = dataPath('provider-fingerprints.json');
export const DEFAULT_CREDIT_FINGERPRINTS = dataPath('credit-fingerprints.json');

/**
 * Keyed fingerprint table backed by a JSON file. The file is re-read whenever
 * its mtime changes, so coverage can be extended while a run is in progress.
 */
export class FingerprintStore<T> {
  private loaded: { mtimeMs: number; table: Map<string, T> } | null = null;

  constructor(
    private readonly filePath: string,
    private readonly schema: ZodType<T, ZodTypeDef, unknown>,
    private readonly logger: Logger
  ) {}

  entries(): Array<[string, T]> {
    return Array.from(this.table().entries());
  }

  get(key: string): T | undefined {
    return this.table().get(key);
  }

  private table(): Map<string, T> {
    try {
      const { mtimeMs } = statSync(this.filePath);
      if (this.loaded?.mtimeMs === mtimeMs) return this.loaded.table;

      const raw = readJsonFile(this.filePath, z.record(z.string(), this.schema));
      this.loaded = { mtimeMs, table: new Map(Object.entries(raw)) };
      this.logger.debug(`Loaded ${this.loaded.table.size} fingerprints from ${this.filePath}`);
      return this.loaded.table;
    } catch (err) {
      if (!this.loaded) {
        throw new ConfigError(`Cannot load fingerprints from ${this.filePath}: ${errorMessage(err)}`);
      }
      this.logger.warn(`Keeping previous fingerprints; reload failed: ${errorMessage(err)}`);
      return this.loaded.table;
    }
  }
}

export function providerFingerprints(
  logger: Logger,
  filePath = DEFAULT_PROVIDER_FINGERPRINTS
): FingerprintStore<ProviderFingerprint> {
  return new FingerprintStore(filePath, ProviderFingerprintSchema, logger);
}

export function creditFingerprints(
  logger: Logger,
  filePath = DEFAULT_CREDIT_FINGERPRINTS
): FingerprintStore<CreditFingerprint> {
  return new FingerprintStore(filePath, CreditFingerprintSchema, logger);
}

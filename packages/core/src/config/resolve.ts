import { ZodError } from 'zod';

import { helixConfigSchema } from './schema';
import { type HelixConfig, type HelixConfigInput } from './types';

export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function resolveConfig(input: HelixConfigInput = {}): HelixConfig {
  try {
    const config = helixConfigSchema.parse(input);
    if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
      throw new ConfigError('Invalid helix config: retry.maxDelayMs must be >= retry.baseDelayMs');
    }
    if (config.signalPeptide.nRegionLength >= config.signalPeptide.window) {
      throw new ConfigError('Invalid helix config: signalPeptide.nRegionLength must be < signalPeptide.window');
    }
    return config;
  } catch (error) {
    if (error instanceof ZodError) {
      const detail = error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid helix config: ${detail}`);
    }
    throw error;
  }
}

/**
 * CLI context manager
 *
 * Loads configuration and installs the configured logger before a command
 * runs.
 */

import { ZodError } from 'zod';
import { loadConfig, type LoadConfigOptions } from '../config/config.js';
import type { ReadoutConfig } from '../config/schema.js';
import { createLogger, setDefaultLogger, type ReadoutLogger } from '../logging/logger.js';
import { CLIError, ExitCode, Guidance } from './errors.js';

/**
 * CLI context shared by all commands
 */
export interface CLIContext {
  /** Loaded configuration */
  config: ReadoutConfig;
  /** Logger built from the logging configuration */
  logger: ReadoutLogger;
}

/**
 * Create CLI context from configuration
 *
 * @throws CLIError with configuration guidance when validation fails
 */
export function createCLIContext(options: LoadConfigOptions = {}): CLIContext {
  let config: ReadoutConfig;
  try {
    config = loadConfig(options);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw CLIError.withGuidance(Guidance.configInvalid(details), ExitCode.INVALID_ARGS, error);
    }
    throw error;
  }

  const logger = createLogger(config.logging);
  setDefaultLogger(logger);

  return { config, logger };
}

/**
 * Run a function with an initialized CLI context
 */
export async function withContext<T>(
  fn: (context: CLIContext) => Promise<T>,
  options: LoadConfigOptions = {}
): Promise<T> {
  const context = createCLIContext(options);
  try {
    return await fn(context);
  } finally {
    context.logger.flush();
  }
}

/**
 * Configuration loader
 *
 * Reads an optional YAML config file. With no file at the default
 * location the built-in defaults are used; an explicitly named file
 * that doesn't exist is an error.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { BusType, formatZodError, validateDaemonConfig } from './config-schema';

export const DEFAULT_CONFIG_FILE = 'config.yml';

/** Runtime config used by the daemon */
export interface DaemonConfig {
  bus: BusType;
  debounceWindowMs: number;
  logging: {
    verbose: boolean;
    pretty: boolean;
  };
  /** File the config was read from, or null for built-in defaults */
  source: string | null;
}

export function defaultConfig(): DaemonConfig {
  return { ...fromValidated(validateDaemonConfig({})), source: null };
}

/**
 * Load and validate config from YAML. A configPath the caller names must exist.
 */
export function loadConfig(configPath?: string): DaemonConfig {
  const explicit = configPath !== undefined;
  const resolvedPath = path.resolve(configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE));

  if (!fs.existsSync(resolvedPath)) {
    if (explicit) {
      throw new Error(`[Config] Config file not found: ${resolvedPath}`);
    }
    return defaultConfig();
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  return { ...parseConfig(raw), source: resolvedPath };
}

/** Parse and validate a YAML document */
export function parseConfig(raw: string): Omit<DaemonConfig, 'source'> {
  let document: unknown;
  try {
    document = parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[Config] Invalid YAML: ${message}`);
  }

  try {
    return fromValidated(validateDaemonConfig(document));
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

function fromValidated(validated: ReturnType<typeof validateDaemonConfig>): Omit<DaemonConfig, 'source'> {
  return {
    bus: validated.bus,
    debounceWindowMs: validated.debounceWindowMs,
    logging: {
      verbose: validated.logging.verbose,
      pretty: validated.logging.pretty,
    },
  };
}

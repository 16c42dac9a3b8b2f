/**
 * Locate and read the versioned YAML configuration files that ship with the
 * service (term tables, clinical pattern libraries).
 */

import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from '../lib/errors';
import { createLogger, errorMessage } from '../lib/logger';

const log = createLogger('ConfigFiles');

export interface LoadedYaml {
  path: string;
  document: unknown;
}

/**
 * Candidate locations, most specific first.
 */
export function configSearchPaths(fileName: string, overridePath?: string): string[] {
  const paths = [
    // Env override
    overridePath,
    // Relative to safety-core/src/services -> safety-core/config
    join(__dirname, '..', '..', 'config', fileName),
    // Built output: dist/safety-core/src/services -> services/safety-core/config
    join(__dirname, '..', '..', '..', '..', 'services', 'safety-core', 'config', fileName),
    // Run from the repo root
    join(process.cwd(), 'services', 'safety-core', 'config', fileName),
    // Run from the service directory
    join(process.cwd(), 'config', fileName)
  ];
  return paths.filter((path): path is string => typeof path === 'string' && path.length > 0);
}

export function parseYamlDocument(raw: string, source: string): unknown {
  try {
    return parseYaml(raw);
  } catch (err: unknown) {
    throw new ConfigurationError(`Failed to parse ${source}: ${errorMessage(err)}`);
  }
}

/**
 * Read the first existing candidate. An explicit override that does not exist
 * is an error rather than a silent fallback to the bundled file.
 */
export function loadYamlConfig(fileName: string, overridePath?: string): LoadedYaml {
  if (overridePath && !existsSync(resolve(overridePath))) {
    throw new ConfigurationError(`Configuration file not found: ${overridePath}`);
  }

  for (const rawPath of configSearchPaths(fileName, overridePath)) {
    const absPath = resolve(rawPath);
    if (existsSync(absPath)) {
      const raw = readFileSync(absPath, 'utf-8');
      const document = parseYamlDocument(raw, absPath);
      log.info(`Loaded ${fileName}`, { path: absPath });
      return { path: absPath, document };
    }
  }

  throw new ConfigurationError(`Configuration file ${fileName} not found in any search path`);
}

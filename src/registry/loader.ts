/**
 * Fleet YAML loading utilities
 *
 * Handles loading and validating the fleet file that declares the desired
 * topology of each fleet.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, isAbsolute } from 'node:path';
import { parseDocument } from 'yaml';
import type { DesiredFleet, FleetLoadOptions } from './types.js';
import { validateFleetDocument } from './validator.js';
import { duplicateKey, parseError, type ValidationIssue } from './errors.js';
import { ConfigError } from '../errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Parse fleet YAML text into a plain value, collecting syntax issues
 *
 * Duplicate mapping keys are rejected rather than silently overwritten, so
 * a node declared twice never collapses into one.
 */
export function parseFleetYaml(content: string): { value: unknown; issues: ValidationIssue[] } {
  const doc = parseDocument(content, { uniqueKeys: true, prettyErrors: true });
  const issues: ValidationIssue[] = doc.errors.map(err => {
    const where = err.linePos ? `line ${err.linePos[0].line}` : '(root)';
    return err.code === 'DUPLICATE_KEY'
      ? duplicateKey(where, err.message.split('\n')[0])
      : parseError(where, err.message.split('\n')[0]);
  });
  if (issues.length > 0) {
    return { value: undefined, issues };
  }
  const value: unknown = doc.toJS();
  return { value, issues };
}

/**
 * Validate fleet YAML text and resolve one fleet
 *
 * Warnings (unknown keys) go to `logger` and do not fail the load.
 *
 * @throws ConfigError carrying every error found
 */
export function parseFleet(
  content: string,
  fleetName: string,
  sourcePath: string,
  logger?: Logger
): DesiredFleet {
  const parsed = parseFleetYaml(content);
  if (parsed.issues.length > 0) {
    throw new ConfigError(`Failed to parse fleet file ${sourcePath}`, parsed.issues);
  }

  const { result, fleet } = validateFleetDocument(parsed.value, fleetName, sourcePath);
  for (const warning of result.warnings) {
    logger?.warn(`${warning.path}: ${warning.message}`, { file: sourcePath });
  }
  if (!fleet) {
    throw new ConfigError(
      `Fleet file validation failed (${result.errors.length} error(s)): ${sourcePath}`,
      result.errors
    );
  }
  return fleet;
}

/**
 * Load and validate a fleet file
 *
 * @param fleetPath - Path to the fleet YAML file
 * @param fleetName - Fleet to resolve out of the file
 * @throws ConfigError if the file is missing, unparseable or invalid
 */
export async function loadFleet(
  fleetPath: string,
  fleetName: string,
  options: FleetLoadOptions = {}
): Promise<DesiredFleet> {
  const absolutePath = isAbsolute(fleetPath)
    ? fleetPath
    : resolve(options.basePath ?? process.cwd(), fleetPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Fleet file not found: ${absolutePath}`);
  }

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read fleet file: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseFleet(content, fleetName, absolutePath, options.logger);
}

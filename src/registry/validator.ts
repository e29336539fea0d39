/**
 * Fleet file validation logic
 *
 * Turns a parsed fleet document into a resolved {@link DesiredFleet}:
 * 1. apiVersion must match
 * 2. The selected fleet must exist
 * 3. Node names must be DNS labels
 * 4. Every node needs a region (its own or the fleet default)
 * 5. Unknown keys are reported as warnings, never errors
 *
 * @example Valid fleet file
 * ```yaml
 * apiVersion: fleet-sync/v1
 * fleets:
 *   nodes:
 *     defaults:
 *       plan: vc2-1c-1gb
 *     registration:
 *       panelUrl: https://panel.example.test
 *     nodes:
 *       node-jp-0:
 *         region: nrt
 * ```
 */

import type {
  DesiredFleet,
  NodeSpec,
  RegistrationInputs,
} from './types.js';
import {
  SUPPORTED_API_VERSION,
  DEFAULT_PLAN,
  DEFAULT_CONFIGURE_PLAYBOOK,
} from './types.js';
import {
  type ValidationIssue,
  type ValidationResult,
  invalidApiVersion,
  invalidFieldType,
  invalidNodeName,
  missingRequiredField,
  unknownField,
  unknownFleet,
  validationResult,
} from './errors.js';

const NODE_NAME_PATTERN = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

const FLEET_FIELDS = ['defaults', 'registration', 'playbooks', 'vars', 'nodes'] as const;
const NODE_FIELDS = ['region', 'plan', 'tags', 'registration'] as const;
const DEFAULTS_FIELDS = ['region', 'plan', 'tags'] as const;
const PLAYBOOK_FIELDS = ['configure', 'reboot'] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a node name against the DNS label rules
 */
export function isValidNodeName(name: string): boolean {
  return NODE_NAME_PATTERN.test(name);
}

/**
 * Result of validating one fleet out of a fleet document
 */
export interface FleetValidation {
  result: ValidationResult;
  fleet?: DesiredFleet;
}

function readString(
  value: unknown,
  path: string,
  issues: ValidationIssue[]
): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    issues.push(invalidFieldType(path, 'non-empty string', value));
    return undefined;
  }
  return value.trim();
}

function readTags(value: unknown, path: string, issues: ValidationIssue[]): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || value.some(t => typeof t !== 'string')) {
    issues.push(invalidFieldType(path, 'list of strings', value));
    return [];
  }
  return [...new Set(value.map(t => String(t)))].sort();
}

function readRecord(
  value: unknown,
  path: string,
  issues: ValidationIssue[]
): Record<string, unknown> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    issues.push(invalidFieldType(path, 'mapping', value));
    return {};
  }
  return value;
}

function warnUnknownFields(
  entry: Record<string, unknown>,
  known: readonly string[],
  path: string,
  issues: ValidationIssue[]
): void {
  for (const key of Object.keys(entry)) {
    if (!known.includes(key)) {
      issues.push(unknownField(path, key, known));
    }
  }
}

function errorCount(issues: ValidationIssue[]): number {
  return issues.filter(i => i.severity === 'error').length;
}

/**
 * Fleet-level defaults applied to every node
 */
interface NodeDefaults {
  region?: string;
  plan?: string;
  tags: string[];
}

function readDefaults(
  value: unknown,
  path: string,
  issues: ValidationIssue[]
): NodeDefaults {
  const raw = readRecord(value, path, issues);
  warnUnknownFields(raw, DEFAULTS_FIELDS, path, issues);
  return {
    region: readString(raw.region, `${path}.region`, issues),
    plan: readString(raw.plan, `${path}.plan`, issues),
    tags: readTags(raw.tags, `${path}.tags`, issues),
  };
}

function resolveNode(
  name: string,
  raw: unknown,
  defaults: NodeDefaults,
  fleetRegistration: RegistrationInputs,
  prefix: string,
  issues: ValidationIssue[]
): NodeSpec | undefined {
  const path = `${prefix}.${name}`;

  if (!isValidNodeName(name)) {
    issues.push(invalidNodeName(path, name));
    return undefined;
  }

  // `node-jp-0:` with no body is allowed when defaults cover region
  if (raw !== null && raw !== undefined && !isRecord(raw)) {
    issues.push(invalidFieldType(path, 'mapping', raw));
    return undefined;
  }
  const entry: Record<string, unknown> = isRecord(raw) ? raw : {};
  const before = errorCount(issues);
  warnUnknownFields(entry, NODE_FIELDS, path, issues);

  const region = readString(entry.region, `${path}.region`, issues) ?? defaults.region;
  if (!region && errorCount(issues) === before) {
    issues.push(missingRequiredField(path, 'region'));
  }

  const plan = readString(entry.plan, `${path}.plan`, issues) ?? defaults.plan ?? DEFAULT_PLAN;

  const tags = [...defaults.tags, ...readTags(entry.tags, `${path}.tags`, issues)];
  const registration = {
    ...fleetRegistration,
    ...readRecord(entry.registration, `${path}.registration`, issues),
  };

  if (!region || errorCount(issues) > before) {
    return undefined;
  }

  return {
    name,
    region,
    plan,
    tags: [...new Set(tags)].sort(),
    registration,
  };
}

/**
 * Validate a parsed fleet document and resolve the named fleet
 *
 * @param document - Parsed YAML document (unknown shape)
 * @param fleetName - Fleet to resolve
 * @param sourcePath - Path for the resolved fleet record
 */
export function validateFleetDocument(
  document: unknown,
  fleetName: string,
  sourcePath: string
): FleetValidation {
  const issues: ValidationIssue[] = [];

  if (!isRecord(document)) {
    issues.push(invalidFieldType('(root)', 'mapping', document));
    return { result: validationResult(issues) };
  }

  if (document.apiVersion === undefined) {
    issues.push(missingRequiredField('(root)', 'apiVersion'));
  } else if (document.apiVersion !== SUPPORTED_API_VERSION) {
    issues.push(invalidApiVersion(document.apiVersion, SUPPORTED_API_VERSION));
  }

  if (!isRecord(document.fleets)) {
    issues.push(
      document.fleets === undefined
        ? missingRequiredField('(root)', 'fleets')
        : invalidFieldType('fleets', 'mapping', document.fleets)
    );
    return { result: validationResult(issues) };
  }

  const rawFleet = Object.hasOwn(document.fleets, fleetName) ? document.fleets[fleetName] : undefined;
  if (rawFleet === undefined) {
    issues.push(unknownFleet(fleetName, Object.keys(document.fleets)));
    return { result: validationResult(issues) };
  }
  if (!isRecord(rawFleet)) {
    issues.push(invalidFieldType(`fleets.${fleetName}`, 'mapping', rawFleet));
    return { result: validationResult(issues) };
  }

  const fleetEntry = rawFleet;
  const fleetPath = `fleets.${fleetName}`;
  warnUnknownFields(fleetEntry, FLEET_FIELDS, fleetPath, issues);
  const defaults = readDefaults(fleetEntry.defaults, `${fleetPath}.defaults`, issues);
  const registration = readRecord(fleetEntry.registration, `${fleetPath}.registration`, issues);
  const vars = readRecord(fleetEntry.vars, `${fleetPath}.vars`, issues);

  const playbooksRaw = readRecord(fleetEntry.playbooks, `${fleetPath}.playbooks`, issues);
  warnUnknownFields(playbooksRaw, PLAYBOOK_FIELDS, `${fleetPath}.playbooks`, issues);
  const configure = readString(playbooksRaw.configure, `${fleetPath}.playbooks.configure`, issues)
    ?? DEFAULT_CONFIGURE_PLAYBOOK;
  const reboot = readString(playbooksRaw.reboot, `${fleetPath}.playbooks.reboot`, issues);

  // An empty node map is valid: it declares that the fleet should be empty
  const rawNodes = readRecord(fleetEntry.nodes, `${fleetPath}.nodes`, issues);
  const nodes: Record<string, NodeSpec> = {};
  for (const [name, rawNode] of Object.entries(rawNodes)) {
    const spec = resolveNode(name, rawNode, defaults, registration, `${fleetPath}.nodes`, issues);
    if (spec) {
      nodes[name] = spec;
    }
  }

  const result = validationResult(issues);
  if (!result.valid) {
    return { result };
  }

  return {
    result,
    fleet: {
      name: fleetName,
      nodes,
      playbooks: reboot ? { configure, reboot } : { configure },
      vars,
      sourcePath,
    },
  };
}

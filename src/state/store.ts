/**
 * Fleet state store
 *
 * Reads and atomically rewrites `<stateDir>/<fleet>.json`. A missing file is
 * an empty fleet. Fields this build does not know are kept aside on read and
 * written back as they were.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { StateError } from '../errors.js';
import { writeFileAtomic } from '../utils/fs-safe.js';
import { isRecord } from '../registry/validator.js';
import { STATE_VERSION, emptyFleetState, type FleetState, type NodeState } from './types.js';

/**
 * Path of the state file for a fleet
 */
export function stateFilePath(stateDir: string, fleet: string): string {
  return join(stateDir, `${fleet}.json`);
}

const NODE_FIELDS = new Set([
  'name',
  'publicAddress',
  'provisionedAt',
  'configFingerprint',
  'configuredAt',
  'providerId',
  'region',
  'plan',
]);
const FLEET_FIELDS = new Set(['version', 'fleet', 'updatedAt', 'nodes']);

function unknownFields(raw: Record<string, unknown>, known: ReadonlySet<string>): Record<string, unknown> | undefined {
  const entries = Object.entries(raw).filter(([key]) => !known.has(key));
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

function readNode(name: string, raw: unknown, statePath: string): NodeState {
  const bad = (field: string) =>
    new StateError(`Malformed record for node "${name}": invalid ${field}`, statePath);

  if (!isRecord(raw)) throw bad('record');
  const { publicAddress, provisionedAt, configFingerprint, configuredAt } = raw;
  if (typeof publicAddress !== 'string' || publicAddress === '') throw bad('publicAddress');
  if (typeof provisionedAt !== 'string') throw bad('provisionedAt');
  if (typeof configFingerprint !== 'string') throw bad('configFingerprint');
  if (configuredAt !== undefined && configuredAt !== null && typeof configuredAt !== 'string') {
    throw bad('configuredAt');
  }

  const node: NodeState = {
    name,
    publicAddress,
    provisionedAt,
    configFingerprint,
    configuredAt: typeof configuredAt === 'string' ? configuredAt : null,
  };
  if (typeof raw.providerId === 'string') node.providerId = raw.providerId;
  if (typeof raw.region === 'string') node.region = raw.region;
  if (typeof raw.plan === 'string') node.plan = raw.plan;
  const extra = unknownFields(raw, NODE_FIELDS);
  if (extra) node.extra = extra;
  return node;
}

/**
 * Validate a parsed state document
 *
 * @throws StateError for a newer format or a malformed record
 */
export function parseFleetState(document: unknown, fleet: string, statePath: string): FleetState {
  if (!isRecord(document)) {
    throw new StateError('State file is not a JSON object', statePath);
  }

  const version = document.version;
  if (typeof version !== 'number' || !Number.isInteger(version)) {
    throw new StateError('State file has no integer "version"', statePath);
  }
  if (version > STATE_VERSION) {
    throw new StateError(
      `State file version ${version} is newer than supported version ${STATE_VERSION}`,
      statePath
    );
  }
  if (document.fleet !== undefined && document.fleet !== fleet) {
    throw new StateError(
      `State file belongs to fleet "${String(document.fleet)}", not "${fleet}"`,
      statePath
    );
  }

  const rawNodes = document.nodes ?? {};
  if (!isRecord(rawNodes)) {
    throw new StateError('State file "nodes" is not an object', statePath);
  }

  const nodes: Record<string, NodeState> = {};
  for (const [name, raw] of Object.entries(rawNodes)) {
    nodes[name] = readNode(name, raw, statePath);
  }

  const state: FleetState = {
    version: STATE_VERSION,
    fleet,
    updatedAt: typeof document.updatedAt === 'string' ? document.updatedAt : null,
    nodes,
  };
  const extra = unknownFields(document, FLEET_FIELDS);
  if (extra) state.extra = extra;
  return state;
}

/**
 * On-disk form of a fleet state: kept unknown fields go back beside the
 * known ones, which take precedence.
 */
export function serializeFleetState(state: FleetState): Record<string, unknown> {
  const { extra, nodes, ...known } = state;
  const records: Record<string, Record<string, unknown>> = {};
  for (const [name, node] of Object.entries(nodes)) {
    const { extra: nodeExtra, ...fields } = node;
    records[name] = { ...nodeExtra, ...fields };
  }
  return { ...extra, ...known, nodes: records };
}

/**
 * Load/persist access to one fleet's state
 */
export interface StateStore {
  readonly statePath: string;
  load(): Promise<FleetState>;
  persist(state: FleetState): Promise<void>;
}

export class FleetStateStore implements StateStore {
  readonly statePath: string;

  constructor(
    stateDir: string,
    readonly fleet: string
  ) {
    this.statePath = stateFilePath(stateDir, fleet);
  }

  async load(): Promise<FleetState> {
    let content: string;
    try {
      content = await readFile(this.statePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return emptyFleetState(this.fleet);
      }
      throw new StateError(
        `Failed to read state file: ${err instanceof Error ? err.message : String(err)}`,
        this.statePath
      );
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (err) {
      throw new StateError(
        `State file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        this.statePath
      );
    }
    return parseFleetState(document, this.fleet, this.statePath);
  }

  /**
   * Replace the state file with `state`, via temp file and rename
   */
  async persist(state: FleetState): Promise<void> {
    const document = serializeFleetState({ ...state, version: STATE_VERSION, fleet: this.fleet });
    await writeFileAtomic(this.statePath, JSON.stringify(document, null, 2) + '\n');
  }
}

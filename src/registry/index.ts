/**
 * Desired fleet loading
 */

export * from './types.js';
export * from './errors.js';
export { validateFleetDocument, isValidNodeName, isRecord, type FleetValidation } from './validator.js';
export { loadFleet, parseFleet, parseFleetYaml } from './loader.js';

/**
 * Which nodes the configuration backend runs against
 */

/**
 * - conservative: full fleet after a registration replacement, otherwise only
 *   new and pending nodes
 * - targeted: new, pending and replaced nodes only
 * - full: always the full fleet
 */
export type ConfigureTargetPolicy = 'conservative' | 'targeted' | 'full';

export const CONFIGURE_POLICIES: readonly ConfigureTargetPolicy[] = ['conservative', 'targeted', 'full'];

export function isConfigurePolicy(value: string): value is ConfigureTargetPolicy {
  return CONFIGURE_POLICIES.some(p => p === value);
}

export interface TargetSelection {
  policy: ConfigureTargetPolicy;
  /** Overrides the policy with the full fleet */
  configureAll: boolean;
  created: string[];
  replaced: string[];
  /** Recorded, unchanged, never configured */
  pending: string[];
  /** Every node that will be recorded after this pass */
  fleet: string[];
}

/**
 * Sorted, de-duplicated names to configure
 */
export function selectConfigureTargets(selection: TargetSelection): string[] {
  const { policy, configureAll, created, replaced, pending, fleet } = selection;

  let names: string[];
  if (configureAll || policy === 'full') {
    names = fleet;
  } else if (policy === 'conservative' && replaced.length > 0) {
    names = fleet;
  } else if (policy === 'targeted') {
    names = [...created, ...replaced, ...pending];
  } else {
    names = [...created, ...pending];
  }

  return [...new Set(names)].sort();
}

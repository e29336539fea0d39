export * from './types.js';
export {
  AnsibleConfigDriver,
  parseRecap,
  renderInventory,
  type AnsibleDriverOptions,
  type RecapEntry,
} from './ansible.js';

export * from './types.js';
export {
  TerraformProvisionDriver,
  parseNodeOutput,
  parseOutputEntry,
  extractPlanSummary,
  TFVARS_FILE,
  PLAN_FILE,
  type TerraformDriverOptions,
} from './terraform.js';

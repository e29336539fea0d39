/**
 * Fleet file validation issue types
 *
 * Provides structured issues for fleet file validation with clear messages
 * and suggestions.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Validation error codes for fleet file validation
 */
export type ValidationErrorCode =
  | 'PARSE_ERROR'
  | 'DUPLICATE_KEY'
  | 'INVALID_API_VERSION'
  | 'UNKNOWN_FLEET'
  | 'INVALID_NODE_NAME'
  | 'INVALID_FIELD_TYPE'
  | 'MISSING_REQUIRED_FIELD'
  | 'UNKNOWN_FIELD';

// =============================================================================
// Validation Issue Types
// =============================================================================

/**
 * Severity level for validation issues
 */
export type ValidationSeverity = 'error' | 'warning';

/**
 * A single validation issue
 */
export interface ValidationIssue {
  /** Error code for programmatic handling */
  code: ValidationErrorCode;
  /** Severity level */
  severity: ValidationSeverity;
  /** Human-readable error message */
  message: string;
  /** Path to the problematic field (e.g., "fleets.nodes.nodes.node-jp-0.region") */
  path: string;
  /** Suggestions for fixing the issue */
  suggestions?: string[];
}

/**
 * Result of fleet file validation
 */
export interface ValidationResult {
  /** Whether validation passed (no errors) */
  valid: boolean;
  /** List of validation issues found */
  issues: ValidationIssue[];
  /** Error-level issues only */
  errors: ValidationIssue[];
  /** Warning-level issues only */
  warnings: ValidationIssue[];
}

// =============================================================================
// Issue Builders
// =============================================================================

export function parseError(path: string, reason: string): ValidationIssue {
  return {
    code: 'PARSE_ERROR',
    severity: 'error',
    message: `Fleet file is not valid YAML: ${reason}`,
    path,
  };
}

export function duplicateKey(path: string, reason: string): ValidationIssue {
  return {
    code: 'DUPLICATE_KEY',
    severity: 'error',
    message: `Duplicate key: ${reason}`,
    path,
    suggestions: [
      'Each node name must appear once per fleet',
      'Rename or remove the duplicate entry',
    ],
  };
}

export function invalidApiVersion(found: unknown, expected: string): ValidationIssue {
  return {
    code: 'INVALID_API_VERSION',
    severity: 'error',
    message: `Unsupported apiVersion ${JSON.stringify(found)}. Expected: ${expected}`,
    path: 'apiVersion',
  };
}

export function unknownFleet(fleet: string, available: string[]): ValidationIssue {
  return {
    code: 'UNKNOWN_FLEET',
    severity: 'error',
    message: `Fleet "${fleet}" is not declared`,
    path: `fleets.${fleet}`,
    suggestions: available.length > 0
      ? [`Available fleets: ${available.join(', ')}`]
      : ['Declare at least one fleet under "fleets"'],
  };
}

export function invalidNodeName(path: string, name: string): ValidationIssue {
  return {
    code: 'INVALID_NODE_NAME',
    severity: 'error',
    message: `Node name "${name}" is not a valid DNS label`,
    path,
    suggestions: ['Use lowercase letters, digits and hyphens (max 63 chars), e.g. node-jp-0'],
  };
}

export function invalidFieldType(path: string, expected: string, found: unknown): ValidationIssue {
  const actual = Array.isArray(found) ? 'array' : found === null ? 'null' : typeof found;
  return {
    code: 'INVALID_FIELD_TYPE',
    severity: 'error',
    message: `Expected ${expected}, found ${actual}`,
    path,
  };
}

export function missingRequiredField(path: string, field: string): ValidationIssue {
  return {
    code: 'MISSING_REQUIRED_FIELD',
    severity: 'error',
    message: `Missing required field: "${field}"`,
    path,
    suggestions: [`Add the required "${field}" field`],
  };
}

/**
 * Unrecognized key; usually a typo, so the loader warns instead of failing
 */
export function unknownField(path: string, field: string, known: readonly string[]): ValidationIssue {
  return {
    code: 'UNKNOWN_FIELD',
    severity: 'warning',
    message: `Unknown field "${field}" is ignored`,
    path: `${path}.${field}`,
    suggestions: [`Known fields: ${known.join(', ')}`],
  };
}

// =============================================================================
// Result Builders
// =============================================================================

/**
 * Build a validation result from collected issues
 */
export function validationResult(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter(i => i.severity === 'error');
  const warnings = issues.filter(i => i.severity === 'warning');
  return {
    valid: errors.length === 0,
    issues,
    errors,
    warnings,
  };
}

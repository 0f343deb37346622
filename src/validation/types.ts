import type { LabUserConfig } from '$types';

export type ConfigField = keyof LabUserConfig;

/**
 * One problem found in the configuration
 */
export interface ValidationIssue {
  field: ConfigField;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  /** Critical problems; initialization stops */
  errors: ValidationIssue[];
  /** Values outside the recommended range */
  warnings: ValidationIssue[];
}

/**
 * Hard limits, plus an optional recommended band that only warns
 */
export interface IntegerRange {
  min: number;
  max: number;
  recommended?: { min: number; max: number };
}

export interface IssueCollector {
  error(field: ConfigField, message: string): void;
  warning(field: ConfigField, message: string): void;
  result(): ValidationResult;
}

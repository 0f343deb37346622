export { validateConfig } from './validator';
export type { ValidationResult, ValidationIssue, ConfigField } from './types';

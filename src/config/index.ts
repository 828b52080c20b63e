/**
 * Admission Control - Configuration Module
 *
 * Barrel export file for configuration management
 */

// Export schema types and validators
export {
  DurationSchema,
  RuleTupleSchema,
  RuleObjectSchema,
  RuleValueSchema,
  RulesSchema,
  BanConfigSchema,
  RedisConfigSchema,
  AdmissionConfigSchema,
  validateConfig,
  safeValidateConfig,
  formatValidationErrors,
} from './schema.js';

export type {
  RedisConfigInput,
  RedisConfig,
  RuleValueInput,
  AdmissionConfigInput,
  AdmissionConfig,
} from './schema.js';

// Export loader functionality
export {
  ConfigLoader,
  createConfigLoader,
  loadConfig,
  buildConfig,
  applyEnvOverrides,
  parseConfigText,
  toRuleInputs,
  toBanPolicy,
} from './loader.js';

export type { ConfigChangeCallback, LoadedConfig } from './loader.js';

export { requireNonEmptyString } from './validators.js';
export { DslError, DslValidationError, YamlLoadError, YamlValidationError } from './errors.js';

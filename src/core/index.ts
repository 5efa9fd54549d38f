export { ConditionEngine } from './condition-engine.js';
export type { ConditionEngineConfig } from './condition-engine.js';
export { OperatorRegistry, OperatorRegistrationError } from './operator-registry.js';
export type { OperatorRegistryConfig } from './operator-registry.js';

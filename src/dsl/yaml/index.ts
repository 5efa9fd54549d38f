export {
  loadConditionFromYAML,
  loadConditionFromFile,
  loadDataFromYAML,
  loadDataFromFile,
  YamlLoadError,
} from './loader.js';
export {
  parseConditionInput,
  parseConditionNode,
  parseConditionChain,
  parseDataRecord,
  toFieldValue,
  toWireFormat,
  YamlValidationError,
} from './schema.js';
export type { WireConditionNode, WireChainLink, WireConditionChain } from './schema.js';

export { ConfigAssembler, decodeUtf8 } from './ConfigAssembler.js';
export type { AssembleRequest, AssembleResult } from './ConfigAssembler.js';
export { candidateFiles, CONFIG_EXTENSIONS } from './CandidateFiles.js';
export { flatten, flattenInto, toJsonObject } from './Flatten.js';
export type { PropertyMap, PropertyValue } from './Flatten.js';
export { parseProfiles } from './Profiles.js';
export { CONFIG_YAML_SCHEMA, loadConfigYaml } from './YamlSchema.js';

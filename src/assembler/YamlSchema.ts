/**
 * YAML schema for configuration files: the YAML 1.2 core schema with exact
 * integers.
 *
 * Timestamps are not a core type, so `release: 2024-01-01` stays the string it
 * was written as. Integers outside Number.isSafeInteger keep their literal
 * text instead of being rounded to the nearest double.
 */

import yaml from 'js-yaml';

const coreInt = yaml.types.int;

const exactInt = new yaml.Type('tag:yaml.org,2002:int', {
  kind: 'scalar',
  resolve: (data: unknown): boolean => coreInt.resolve(data),
  construct: (data: string): number | string => {
    const value: unknown = coreInt.construct(data);
    return typeof value === 'number' && Number.isSafeInteger(value) ? value : data;
  },
});

export const CONFIG_YAML_SCHEMA = yaml.FAILSAFE_SCHEMA.extend([yaml.types.null, yaml.types.bool, exactInt, yaml.types.float]);

export function loadConfigYaml(text: string, filename?: string): unknown {
  return yaml.load(text, { filename, schema: CONFIG_YAML_SCHEMA });
}

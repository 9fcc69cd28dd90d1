/**
 * Spring Cloud Config compatible environment envelope.
 */

import type { GitConfig } from '../config/index.js';
import { toJsonObject } from '../assembler/index.js';
import type { PropertyMap, PropertyValue } from '../assembler/index.js';

export interface PropertySource {
  name: string;
  source: Record<string, PropertyValue>;
}

export interface EnvironmentResponse {
  name: string;
  profiles: string[];
  label?: string;
  version: string;
  state: string;
  propertySources: PropertySource[];
}

/**
 * git:{repo_url}{/subpath}:{raw profile string}
 */
export function propertySourceName(git: Pick<GitConfig, 'repoUrl' | 'subpath'>, rawProfiles: string): string {
  const subpath = git.subpath ? `/${git.subpath}` : '';
  return `git:${git.repoUrl}${subpath}:${rawProfiles}`;
}

export interface EnvironmentResponseInput {
  application: string;
  profiles: string[];
  rawProfiles: string;
  label?: string;
  version: string;
  git: Pick<GitConfig, 'repoUrl' | 'subpath'>;
  properties: PropertyMap;
  foundAny: boolean;
}

export function buildEnvironmentResponse(input: EnvironmentResponseInput): EnvironmentResponse {
  const response: EnvironmentResponse = {
    name: input.application,
    profiles: input.profiles,
    version: input.version,
    state: '',
    propertySources: input.foundAny
      ? [{ name: propertySourceName(input.git, input.rawProfiles), source: toJsonObject(input.properties) }]
      : [],
  };
  if (input.label !== undefined) {
    response.label = input.label;
  }
  return response;
}

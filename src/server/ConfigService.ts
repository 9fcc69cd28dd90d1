/**
 * ConfigService — the request-facing side of the resolution engine.
 *
 * Looks environments up in the registry and drives the assembler, the
 * repository reader and the response builders. It knows nothing about HTTP;
 * unknown environments and missing files surface as NotFoundError, unsafe
 * paths as BadRequestError.
 */

import { ConfigAssembler, parseProfiles } from '../assembler/index.js';
import type { EnvVars } from '../config/index.js';
import type { Environment, EnvironmentRegistry } from '../environment/index.js';
import { NotFoundError } from '../errors/index.js';
import { RepositoryReader, candidateRefs } from '../git/index.js';
import type { GitBackend } from '../git/index.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { validateRelativePath } from '../paths/PathValidator.js';
import { buildEnvironmentResponse, buildFileResponse } from '../response/index.js';
import type { EnvironmentMeta, EnvironmentResponse, FileResponse } from '../response/index.js';
import { TemplateEngine } from '../template/index.js';

registerComponent('service', 'Configuration lookups');
const logger = getLogger('service');

export interface ConfigServiceOptions {
  templates?: TemplateEngine;
}

export class ConfigService {
  readonly reader: RepositoryReader;
  readonly templates: TemplateEngine;
  private readonly assembler: ConfigAssembler;

  constructor(
    readonly registry: EnvironmentRegistry,
    backend: GitBackend,
    options: ConfigServiceOptions = {}
  ) {
    this.reader = new RepositoryReader(backend);
    this.templates = options.templates ?? new TemplateEngine();
    this.assembler = new ConfigAssembler(this.reader, this.templates);
  }

  environment(name: string): Environment {
    const environment = this.registry.get(name);
    if (!environment) {
      throw new NotFoundError(`environment ${name}`);
    }
    return environment;
  }

  /**
   * Spring Cloud Config lookup: merged properties for (application, profiles)
   * at `label`, or at the tracked branch when no label is given.
   */
  async lookup(envName: string, application: string, rawProfiles: string, label?: string): Promise<EnvironmentResponse> {
    const environment = this.environment(envName);
    const profiles = parseProfiles(rawProfiles);

    const { properties, foundAny } = await this.assembler.assemble(
      environment.git,
      { application, profiles, label },
      environment.envVars
    );
    const { commit } = await this.reader.resolveVersion(environment.git, candidateRefs(environment.git, label));

    return buildEnvironmentResponse({
      application,
      profiles,
      rawProfiles,
      label,
      version: commit,
      git: environment.git,
      properties,
      foundAny,
    });
  }

  /**
   * Raw file at `label`; text files are templated, binary files are not.
   */
  async readFile(envName: string, label: string, rawPath: string): Promise<FileResponse> {
    const environment = this.environment(envName);
    const safePath = validateRelativePath(rawPath);

    const bytes = await this.reader.readFile(environment.git, candidateRefs(environment.git, label), safePath);
    if (bytes === null) {
      throw new NotFoundError(`file ${safePath} at ${label}`);
    }

    const response = buildFileResponse(safePath, bytes, environment.envVars, this.templates);
    logger.debug(`Serving ${envName}:${label}:${safePath} as ${response.kind} (${response.contentType})`);
    return response;
  }

  envVars(envName: string): EnvVars {
    return this.environment(envName).envVars;
  }

  async listFiles(envName: string): Promise<string[]> {
    const environment = this.environment(envName);
    return this.reader.listFiles(environment.git, environment.git.branch);
  }

  /**
   * Dashboard metadata for every environment at its tracked branch.
   */
  async environmentMeta(): Promise<EnvironmentMeta[]> {
    const result: EnvironmentMeta[] = [];
    for (const environment of this.registry.all()) {
      const version = await this.reader.resolveVersion(environment.git, candidateRefs(environment.git));
      result.push({
        name: environment.name,
        repo_url: environment.git.repoUrl,
        branch: environment.git.branch,
        workdir: environment.git.workdir,
        subpath: environment.git.subpath ?? '',
        last_commit: version.commit,
        last_commit_date: version.date,
      });
    }
    return result;
  }
}

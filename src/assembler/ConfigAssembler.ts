/**
 * ConfigAssembler — builds the merged property map for one request.
 *
 * Every candidate file that exists at the requested ref is decoded, run
 * through the template engine, parsed as YAML and flattened into a single
 * map in candidate order, so a later file overrides an earlier one key by
 * key. Missing files are skipped. A file that fails to decode or parse fails
 * the whole request.
 */

import type { EnvVars, GitConfig } from '../config/index.js';
import { DecodeError, ParseError } from '../errors/index.js';
import { candidateRefs } from '../git/index.js';
import type { RepositoryReader } from '../git/index.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { TemplateEngine } from '../template/index.js';
import { candidateFiles } from './CandidateFiles.js';
import { flattenInto } from './Flatten.js';
import { loadConfigYaml } from './YamlSchema.js';
import type { PropertyMap } from './Flatten.js';

registerComponent('assembler', 'Configuration file discovery and merge');
const logger = getLogger('assembler');

export interface AssembleRequest {
  application: string;
  profiles: readonly string[];
  label?: string;
}

export interface AssembleResult {
  properties: PropertyMap;
  foundAny: boolean;
  /** Candidate files that existed, in merge order */
  files: string[];
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Strict UTF-8 decode; null when the bytes are not valid UTF-8.
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}

export class ConfigAssembler {
  constructor(
    private readonly reader: RepositoryReader,
    private readonly templates: TemplateEngine
  ) {}

  async assemble(git: GitConfig, request: AssembleRequest, envVars: EnvVars): Promise<AssembleResult> {
    const refs = candidateRefs(git, request.label);
    const properties: PropertyMap = new Map();
    const files: string[] = [];

    for (const file of candidateFiles(request.application, request.profiles)) {
      const bytes = await this.reader.readFile(git, refs, file);
      if (bytes === null) continue;

      files.push(file);
      const text = decodeUtf8(bytes);
      if (text === null) {
        throw new DecodeError(file);
      }

      const unresolved = this.templates.unresolved(text, envVars);
      if (unresolved.length > 0) {
        logger.debug(`${file}: unresolved placeholders left as-is: ${unresolved.join(', ')}`);
      }

      let document: unknown;
      try {
        document = loadConfigYaml(this.templates.substitute(text, envVars), file);
      } catch (err) {
        throw new ParseError(file, err instanceof Error ? err.message : String(err));
      }
      flattenInto(document, properties);
    }

    logger.debug(
      `Assembled ${request.application} [${request.profiles.join(',')}] at ${refs[0]}: ` +
        `${files.length} file(s), ${properties.size} key(s)`
    );
    return { properties, foundAny: files.length > 0, files };
  }
}

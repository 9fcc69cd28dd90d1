/**
 * Placeholder substitution for configuration and raw files.
 *
 * `{{ NAME }}` (whitespace inside the braces optional) is replaced by the
 * value of NAME in the variable map. Unknown names are left byte-for-byte as
 * written. Substitution is a single pass: text produced by a replacement is
 * never scanned again.
 */

export const DEFAULT_PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/;

export interface TemplateEngineOptions {
  /** Pattern whose first capture group is the variable name */
  pattern?: RegExp;
}

export class TemplateEngine {
  private readonly pattern: RegExp;

  constructor(options: TemplateEngineOptions = {}) {
    const source = options.pattern ?? DEFAULT_PLACEHOLDER_PATTERN;
    const flags = source.flags.includes('g') ? source.flags : `${source.flags}g`;
    this.pattern = new RegExp(source.source, flags);
  }

  substitute(text: string, vars: Readonly<Record<string, string>>): string {
    return text.replace(this.pattern, (match: string, name: string) =>
      Object.prototype.hasOwnProperty.call(vars, name) ? (vars[name] ?? match) : match
    );
  }

  /**
   * Names referenced by placeholders, in order of first appearance.
   */
  placeholders(text: string): string[] {
    const names = new Set<string>();
    for (const match of text.matchAll(this.pattern)) {
      const name = match[1];
      if (name !== undefined) names.add(name);
    }
    return [...names];
  }

  /**
   * Referenced names that `vars` does not define.
   */
  unresolved(text: string, vars: Readonly<Record<string, string>>): string[] {
    return this.placeholders(text).filter((name) => !Object.prototype.hasOwnProperty.call(vars, name));
  }
}

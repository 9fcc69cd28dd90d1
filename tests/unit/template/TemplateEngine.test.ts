import { describe, it, expect } from '@jest/globals';
import { TemplateEngine } from '../../../src/template/TemplateEngine.js';

describe('TemplateEngine', () => {
  const engine = new TemplateEngine();

  it('should replace known placeholders with or without inner whitespace', () => {
    expect(engine.substitute('url: {{DB_HOST}}:{{ DB_PORT }}', { DB_HOST: 'db', DB_PORT: '5432' })).toBe(
      'url: db:5432'
    );
  });

  it('should leave unknown placeholders exactly as written', () => {
    expect(engine.substitute('a: {{  MISSING }} b: {{X}}', { X: '1' })).toBe('a: {{  MISSING }} b: 1');
  });

  it('should not touch malformed placeholders', () => {
    expect(engine.substitute('{{ 1ABC }} {{A-B}} {A}', { A: 'x', '1ABC': 'y' })).toBe('{{ 1ABC }} {{A-B}} {A}');
  });

  it('should not rescan substituted text', () => {
    expect(engine.substitute('{{ A }}', { A: '{{ B }}', B: 'deep' })).toBe('{{ B }}');
  });

  it('should be idempotent when values contain no placeholders', () => {
    const vars = { HOST: 'db.internal', PORT: '5432' };
    const once = engine.substitute('host: {{HOST}}\nport: {{ PORT }}\nother: {{ NOPE }}\n', vars);
    expect(engine.substitute(once, vars)).toBe(once);
  });

  it('should ignore inherited object properties', () => {
    expect(engine.substitute('{{ toString }}', {})).toBe('{{ toString }}');
  });

  it('should substitute empty values', () => {
    expect(engine.substitute('x={{ EMPTY }};', { EMPTY: '' })).toBe('x=;');
  });

  it('should report placeholders and unresolved names', () => {
    const text = '{{ A }} {{B}} {{ A }} {{ C }}';
    expect(engine.placeholders(text)).toEqual(['A', 'B', 'C']);
    expect(engine.unresolved(text, { B: '2' })).toEqual(['A', 'C']);
  });

  it('should accept a custom pattern', () => {
    const dollar = new TemplateEngine({ pattern: /\$\{([A-Z_]+)\}/ });
    expect(dollar.substitute('${HOST} {{ HOST }}', { HOST: 'h' })).toBe('h {{ HOST }}');
  });
});

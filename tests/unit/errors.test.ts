import { describe, it, expect } from '@jest/globals';
import {
  ConfigurationError,
  GitOperationError,
  IoError,
  NotFoundError,
  ParseError,
  isConfigServerError,
} from '../../src/errors/index.js';

describe('errors', () => {
  it('should carry kind and class name', () => {
    const error = new NotFoundError('environment prod');
    expect(error.kind).toBe('not_found');
    expect(error.name).toBe('NotFoundError');
    expect(error.message).toBe('Not found: environment prod');
    expect(error).toBeInstanceOf(Error);
    expect(isConfigServerError(error)).toBe(true);
    expect(isConfigServerError(new Error('plain'))).toBe(false);
  });

  it('should keep git context in structured fields', () => {
    const error = new GitOperationError('fetch', 'fatal: repository not found', ['fetch', '--all']);
    expect(error.message).toBe('git fetch failed: fatal: repository not found');
    expect(error.stage).toBe('fetch');
    expect(error.args).toEqual(['fetch', '--all']);
  });

  it('should wrap IO causes', () => {
    const cause = new Error('ENOENT: no such file');
    const error = new IoError('reading config.yaml', cause);
    expect(error.message).toBe('IO error during reading config.yaml: ENOENT: no such file');
    expect(error.cause).toBe(cause);
  });

  it('should describe parse and configuration failures', () => {
    expect(new ParseError('app.yml', 'bad indentation').message).toBe('Failed to parse app.yml: bad indentation');
    expect(new ConfigurationError('Invalid configuration', ['http: Required', 'git: Required']).message).toBe(
      'Invalid configuration: http: Required; git: Required'
    );
    expect(new ConfigurationError('No environments').message).toBe('No environments');
  });
});

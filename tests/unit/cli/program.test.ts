import { describe, it, expect } from '@jest/globals';
import { DEFAULT_CONFIG_FILE, parseCliOptions } from '../../../src/cli/program.js';

describe('parseCliOptions', () => {
  it('should default to config.yaml without --check', () => {
    expect(parseCliOptions(['node', 'git-config-server'])).toEqual({ config: DEFAULT_CONFIG_FILE, check: false });
  });

  it('should read -c and --check', () => {
    expect(parseCliOptions(['node', 'git-config-server', '-c', '/etc/cfg.yaml', '--check'])).toEqual({
      config: '/etc/cfg.yaml',
      check: true,
    });
  });

  it('should read the long --config form', () => {
    expect(parseCliOptions(['node', 'git-config-server', '--config=other.yaml']).config).toBe('other.yaml');
  });
});

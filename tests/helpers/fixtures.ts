import { EnvironmentRegistry } from '../../src/environment/EnvironmentRegistry.js';
import { InMemoryGitBackend, gitConfig } from './InMemoryGitBackend.js';

export const COMMIT_DATE = '2026-01-05T09:00:00+00:00';

/**
 * Two tenants: "prod" (files under services/, a v1 tag only on origin) and
 * "dev" (no configuration files at all).
 */
export function createTenantFixture(): { backend: InMemoryGitBackend; registry: EnvironmentRegistry } {
  const prodGit = gitConfig('prod', { subpath: 'services' });
  const devGit = gitConfig('dev');

  const backend = new InMemoryGitBackend()
    .setRef(prodGit.workdir, 'main', {
      commit: 'prod-main-commit',
      date: COMMIT_DATE,
      files: {
        'services/application.yml': 'shared: base\nk: 1\n',
        'services/billing-dev.yml': 'k: 2\ndb:\n  host: "{{ DB_HOST }}"\n',
        'services/broken.yml': 'a: [unclosed\n',
        'services/conf/app.txt': 'host={{ DB_HOST }} missing={{ NOPE }}',
        'services/logo.png': Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00]),
        'root-secret.yml': 'secret: outside\n',
      },
    })
    .setRef(prodGit.workdir, 'origin/v1', {
      commit: 'prod-v1-commit',
      date: COMMIT_DATE,
      files: { 'services/billing.yml': 'k: v1\n' },
    })
    .setRef(devGit.workdir, 'main', { commit: 'dev-main-commit', date: COMMIT_DATE, files: { 'README.md': '# dev\n' } });

  const registry = new EnvironmentRegistry([
    { name: 'prod', git: prodGit, envVars: { DB_HOST: 'prod-db', MSG: 'say "hi" $USER' } },
    { name: 'dev', git: devGit, envVars: {} },
  ]);

  return { backend, registry };
}

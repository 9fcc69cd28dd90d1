import { describe, it, expect, beforeEach } from '@jest/globals';
import { ConfigAssembler, decodeUtf8 } from '../../../src/assembler/ConfigAssembler.js';
import { toJsonObject } from '../../../src/assembler/Flatten.js';
import { RepositoryReader } from '../../../src/git/RepositoryReader.js';
import { TemplateEngine } from '../../../src/template/TemplateEngine.js';
import { DecodeError, ParseError } from '../../../src/errors/index.js';
import { InMemoryGitBackend, gitConfig } from '../../helpers/InMemoryGitBackend.js';

const DATE = '2026-01-05T09:00:00+00:00';

describe('ConfigAssembler', () => {
  const git = gitConfig('billing');
  let backend: InMemoryGitBackend;
  let assembler: ConfigAssembler;

  beforeEach(() => {
    backend = new InMemoryGitBackend();
    assembler = new ConfigAssembler(new RepositoryReader(backend), new TemplateEngine());
  });

  it('should let later candidates override earlier ones', async () => {
    backend.setRef(git.workdir, 'main', {
      commit: 'c1',
      date: DATE,
      files: {
        'application.yml': 'k: 1\nshared: base\n',
        'billing-dev.yml': 'k: 2\n',
      },
    });

    const result = await assembler.assemble(git, { application: 'billing', profiles: ['dev'] }, {});

    expect(toJsonObject(result.properties)).toEqual({ k: 2, shared: 'base' });
    expect(result.foundAny).toBe(true);
    expect(result.files).toEqual(['application.yml', 'billing-dev.yml']);
  });

  it('should apply profiles in request order', async () => {
    backend.setRef(git.workdir, 'main', {
      commit: 'c1',
      date: DATE,
      files: {
        'billing-a.yaml': 'who: a\n',
        'billing-b.yaml': 'who: b\n',
      },
    });

    const ab = await assembler.assemble(git, { application: 'billing', profiles: ['a', 'b'] }, {});
    const ba = await assembler.assemble(git, { application: 'billing', profiles: ['b', 'a'] }, {});

    expect(ab.properties.get('who')).toBe('b');
    expect(ba.properties.get('who')).toBe('a');
  });

  it('should report nothing found when no candidate exists', async () => {
    backend.setRef(git.workdir, 'main', { commit: 'c1', date: DATE, files: { 'other.yml': 'a: 1\n' } });

    const result = await assembler.assemble(git, { application: 'billing', profiles: ['dev'] }, {});

    expect(result.foundAny).toBe(false);
    expect(result.properties.size).toBe(0);
  });

  it('should substitute variables before parsing', async () => {
    backend.setRef(git.workdir, 'main', {
      commit: 'c1',
      date: DATE,
      files: { 'billing.yml': 'db:\n  url: jdbc://{{ DB_HOST }}:{{DB_PORT}}\n  pool: {{ POOL }}\n' },
    });

    const result = await assembler.assemble(
      git,
      { application: 'billing', profiles: [] },
      { DB_HOST: 'db.internal', DB_PORT: '5432', POOL: '8' }
    );

    expect(toJsonObject(result.properties)).toEqual({ 'db.url': 'jdbc://db.internal:5432', 'db.pool': 8 });
  });

  it('should read files under the subpath at the requested label', async () => {
    const scoped = gitConfig('billing', { subpath: 'services' });
    backend.setRef(scoped.workdir, 'origin/release', {
      commit: 'c2',
      date: DATE,
      files: { 'services/billing.yml': 'v: release\n', 'billing.yml': 'v: outside\n' },
    });

    const result = await assembler.assemble(scoped, { application: 'billing', profiles: [], label: 'release' }, {});

    expect(toJsonObject(result.properties)).toEqual({ v: 'release' });
  });

  it('should fail the request on a parse error', async () => {
    backend.setRef(git.workdir, 'main', {
      commit: 'c1',
      date: DATE,
      files: { 'application.yml': 'ok: 1\n', 'billing.yml': 'a: [unclosed\n' },
    });

    await expect(assembler.assemble(git, { application: 'billing', profiles: [] }, {})).rejects.toBeInstanceOf(
      ParseError
    );
  });

  it('should fail the request on invalid UTF-8', async () => {
    backend.setRef(git.workdir, 'main', {
      commit: 'c1',
      date: DATE,
      files: { 'billing.yml': Buffer.from([0x61, 0x3a, 0x20, 0xff, 0xfe]) },
    });

    await expect(assembler.assemble(git, { application: 'billing', profiles: [] }, {})).rejects.toBeInstanceOf(
      DecodeError
    );
  });
});

describe('decodeUtf8', () => {
  it('should decode valid UTF-8 and reject invalid bytes', () => {
    expect(decodeUtf8(Buffer.from('héllo', 'utf-8'))).toBe('héllo');
    expect(decodeUtf8(Buffer.from([0xc3, 0x28]))).toBeNull();
  });
});

import { describe, it, expect } from '@jest/globals';
import { buildEnvironmentResponse, propertySourceName } from '../../../src/response/EnvironmentResponse.js';
import { buildFileResponse, guessContentType, textContent } from '../../../src/response/FileResponse.js';
import { notFoundBody, renderShellExport, shellEscape } from '../../../src/response/ProtocolResponses.js';
import { renderUiPage } from '../../../src/response/UiMeta.js';
import { TemplateEngine } from '../../../src/template/TemplateEngine.js';

describe('EnvironmentResponse', () => {
  const git = { repoUrl: 'https://git.example.test/config.git', subpath: undefined };

  it('should name the property source after repo, subpath and raw profiles', () => {
    expect(propertySourceName(git, 'dev,db')).toBe('git:https://git.example.test/config.git:dev,db');
    expect(propertySourceName({ ...git, subpath: 'services' }, 'dev')).toBe(
      'git:https://git.example.test/config.git/services:dev'
    );
  });

  it('should build the envelope with one property source', () => {
    const response = buildEnvironmentResponse({
      application: 'billing',
      profiles: ['dev', 'db'],
      rawProfiles: 'dev, db',
      label: 'v1',
      version: 'abc123',
      git,
      properties: new Map<string, string | number | boolean | null>([
        ['a', 1],
        ['b', null],
      ]),
      foundAny: true,
    });

    expect(response).toEqual({
      name: 'billing',
      profiles: ['dev', 'db'],
      label: 'v1',
      version: 'abc123',
      state: '',
      propertySources: [{ name: 'git:https://git.example.test/config.git:dev, db', source: { a: 1, b: null } }],
    });
  });

  it('should omit the label and property sources when nothing was found', () => {
    const response = buildEnvironmentResponse({
      application: 'billing',
      profiles: ['dev'],
      rawProfiles: 'dev',
      version: '',
      git,
      properties: new Map(),
      foundAny: false,
    });

    expect(response).toEqual({ name: 'billing', profiles: ['dev'], version: '', state: '', propertySources: [] });
    expect('label' in response).toBe(false);
  });
});

describe('FileResponse', () => {
  const templates = new TemplateEngine();

  it('should template text and guess its content type', () => {
    const response = buildFileResponse('conf/app.json', Buffer.from('{"host":"{{ HOST }}"}'), { HOST: 'db' }, templates);
    expect(response).toEqual({ kind: 'text', body: '{"host":"db"}', contentType: 'application/json' });
  });

  it('should fall back to text/plain for unknown text types', () => {
    const response = buildFileResponse('README.unknownext', Buffer.from('hi {{ X }}'), { X: 'there' }, templates);
    expect(response).toEqual({ kind: 'text', body: 'hi there', contentType: 'text/plain' });
  });

  it('should serve content with a NUL byte unmodified', () => {
    const bytes = Buffer.from('{{ HOST }}\0rest', 'utf-8');
    const response = buildFileResponse('blob.unknownbin', bytes, { HOST: 'db' }, templates);

    expect(response.kind).toBe('binary');
    expect(response.body).toEqual(bytes);
    expect(response.contentType).toBe('application/octet-stream');
  });

  it('should treat invalid UTF-8 as binary and keep the extension type', () => {
    const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0xff]);
    const response = buildFileResponse('logo.png', bytes, {}, templates);
    expect(response).toEqual({ kind: 'binary', body: bytes, contentType: 'image/png' });
  });

  it('should detect text content', () => {
    expect(textContent(Buffer.from('plain'))).toBe('plain');
    expect(textContent(Buffer.from([0x61, 0x00]))).toBeNull();
    expect(guessContentType('x.yml', 'text/plain')).toBe('text/yaml');
  });
});

describe('ProtocolResponses', () => {
  it('should build the 404 body', () => {
    expect(notFoundBody('/prod/app/dev', new Date('2026-03-01T12:00:00.123Z'))).toEqual({
      timestamp: '2026-03-01T12:00:00.123Z',
      status: 404,
      error: 'Not Found',
      path: '/prod/app/dev',
    });
  });

  it('should escape backslash, quote and dollar', () => {
    expect(shellEscape('a\\b"c$d')).toBe('a\\\\b\\"c\\$d');
  });

  it('should render one export line per variable', () => {
    expect(renderShellExport({ HOST: 'db', MSG: 'say "hi" $USER' })).toBe(
      'export HOST="db"\nexport MSG="say \\"hi\\" \\$USER"\n'
    );
    expect(renderShellExport({})).toBe('');
  });
});

describe('renderUiPage', () => {
  it('should embed the metadata and escape "<"', () => {
    const page = renderUiPage('<script>const META = __META_JSON__;</script>', {
      base_path: '/',
      environments: [],
      auth_enabled: false,
    });
    expect(page).toBe('<script>const META = {"base_path":"/","environments":[],"auth_enabled":false};</script>');
  });

  it('should keep values from closing the script element', () => {
    const page = renderUiPage('__META_JSON__', {
      base_path: '/</script>',
      environments: [],
      auth_enabled: true,
    });
    expect(page).toBe('{"base_path":"\\u003c/script>","environments":[],"auth_enabled":true}');
  });
});

/**
 * Raw file responses.
 *
 * Content with a NUL byte, or that is not valid UTF-8, is binary and is
 * served byte-for-byte. Everything else is text and goes through template
 * substitution before it is served.
 */

import * as mime from 'mime-types';
import { decodeUtf8 } from '../assembler/index.js';
import type { EnvVars } from '../config/index.js';
import type { TemplateEngine } from '../template/index.js';

export const OCTET_STREAM = 'application/octet-stream';
export const TEXT_PLAIN = 'text/plain';

export type FileResponse =
  | { kind: 'binary'; body: Buffer; contentType: string }
  | { kind: 'text'; body: string; contentType: string };

/**
 * The decoded text, or null when the bytes are binary.
 */
export function textContent(bytes: Uint8Array): string | null {
  return bytes.includes(0) ? null : decodeUtf8(bytes);
}

export function guessContentType(filePath: string, fallback: string): string {
  return mime.lookup(filePath) || fallback;
}

export function buildFileResponse(
  filePath: string,
  bytes: Buffer,
  envVars: EnvVars,
  templates: TemplateEngine
): FileResponse {
  const text = textContent(bytes);
  if (text === null) {
    return { kind: 'binary', body: bytes, contentType: guessContentType(filePath, OCTET_STREAM) };
  }
  return {
    kind: 'text',
    body: templates.substitute(text, envVars),
    contentType: guessContentType(filePath, TEXT_PLAIN),
  };
}

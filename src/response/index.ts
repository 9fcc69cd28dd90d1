export { buildEnvironmentResponse, propertySourceName } from './EnvironmentResponse.js';
export type { EnvironmentResponse, EnvironmentResponseInput, PropertySource } from './EnvironmentResponse.js';
export { buildFileResponse, guessContentType, textContent, OCTET_STREAM, TEXT_PLAIN } from './FileResponse.js';
export type { FileResponse } from './FileResponse.js';
export { notFoundBody, shellEscape, renderShellExport } from './ProtocolResponses.js';
export type { NotFoundBody } from './ProtocolResponses.js';
export { renderUiPage, META_PLACEHOLDER } from './UiMeta.js';
export type { UiMeta, EnvironmentMeta } from './UiMeta.js';

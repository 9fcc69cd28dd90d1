export { TemplateEngine, DEFAULT_PLACEHOLDER_PATTERN } from './TemplateEngine.js';
export type { TemplateEngineOptions } from './TemplateEngine.js';

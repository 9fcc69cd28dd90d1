/**
 * Servlet exports
 */

export { createConfigRouter } from './ConfigServlet.js';
export { createFileRouter } from './FileServlet.js';
export { createEnvRouter } from './EnvServlet.js';
export { createUiRouter, DEFAULT_UI_TEMPLATE } from './UiServlet.js';
export type { UiOptions } from './UiServlet.js';
export { createHealthRouter } from './HealthServlet.js';

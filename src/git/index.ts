export type { GitBackend } from './GitBackend.js';
export { GitCliBackend } from './GitCliBackend.js';
export type { GitResult } from './GitCliBackend.js';
export { candidateRefs, validateLabel } from './RefResolver.js';
export { RepositoryReader, toRepoPath, scopeToSubpath } from './RepositoryReader.js';
export type { ResolvedVersion } from './RepositoryReader.js';
export { GitMirrorManager, effectiveRefreshIntervalSecs, MIN_REFRESH_INTERVAL_SECS } from './GitMirrorManager.js';
export type { MirrorStatus } from './GitMirrorManager.js';

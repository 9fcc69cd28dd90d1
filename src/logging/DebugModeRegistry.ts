/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Components register at module load
 * (e.g. "git", "api"); operators raise a single component to DEBUG/TRACE via
 * LOG_DEBUG_COMPONENTS without flooding the rest of the output.
 */

import { LogLevel, isLevelEnabled, parseLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

export interface ComponentInfo {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component. An existing override survives re-registration.
 */
export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  const existing = registry.get(name);
  registry.set(name, {
    name,
    description,
    levelOverride: defaultLevel ?? existing?.levelOverride,
  });
}

export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * Effective level for a component. Child components ("git.refresh") fall back
 * to their parent's override before the global level.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current: string | undefined = name;
  while (current) {
    const override = registry.get(current)?.levelOverride;
    if (override) return override;
    const dot = current.lastIndexOf('.');
    current = dot > 0 ? current.substring(0, dot) : undefined;
  }
  return globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return isLevelEnabled(messageLevel, getEffectiveLevel(name, globalLevel));
}

export function getRegisteredComponents(globalLevel: LogLevel): ComponentInfo[] {
  const result: ComponentInfo[] = [];
  for (const [, reg] of registry) {
    result.push({
      name: reg.name,
      description: reg.description,
      effectiveLevel: reg.levelOverride ?? globalLevel,
      hasOverride: reg.levelOverride !== undefined,
    });
  }
  return result.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Apply overrides such as ["git", "api:TRACE"]. A bare name means DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

export function resetDebugRegistry(): void {
  registry.clear();
}

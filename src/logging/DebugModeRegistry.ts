/**
 * Debug Mode Registry
 *
 * Per-component level overrides. Engine subsystems register under a
 * component name ("codec", "composer", ...) so operators can raise one
 * subsystem to DEBUG or TRACE without flooding the rest.
 */

import { LogLevel, isLevelEnabled, parseLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

export interface ComponentLevelInfo {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Declare a loggable component. An existing override survives re-registration.
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
 * Effective level for a component. Child components ("composer.values")
 * inherit the nearest ancestor's override.
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

export function getRegisteredComponents(globalLevel: LogLevel): ComponentLevelInfo[] {
  return [...registry.values()]
    .map((reg) => ({
      name: reg.name,
      description: reg.description,
      effectiveLevel: reg.levelOverride ?? globalLevel,
      hasOverride: reg.levelOverride !== undefined,
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Apply overrides of the form ["composer", "fingerprint:TRACE"].
 * Entries without a level get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      const name = entry.substring(0, colonIndex);
      setComponentLevel(name, parseLogLevel(entry.substring(colonIndex + 1), LogLevel.DEBUG));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  registry.clear();
}

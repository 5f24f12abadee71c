/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Components register themselves at
 * module load (e.g. "conversion", "database"); operators can then raise a
 * single component to DEBUG or TRACE without flooding the rest of the output.
 */

import { LogLevel, isLevelEnabled, parseLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

export interface RegisteredComponent {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component. An existing override survives
 * re-registration.
 */
export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  const existing = registry.get(name);
  registry.set(name, {
    name,
    description,
    levelOverride: defaultLevel ?? existing?.levelOverride,
  });
}

/**
 * Set a log level override for a specific component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

/**
 * Clear a component's level override, reverting to global level.
 */
export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * Effective level for a component. Child components ("conversion.hl7")
 * inherit their parent's override.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current = name;
  for (;;) {
    const override = registry.get(current)?.levelOverride;
    if (override) return override;

    const dot = current.lastIndexOf('.');
    if (dot <= 0) return globalLevel;
    current = current.substring(0, dot);
  }
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return isLevelEnabled(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * All registered components with their effective levels, sorted by name.
 */
export function getRegisteredComponents(globalLevel: LogLevel): RegisteredComponent[] {
  const result: RegisteredComponent[] = [];

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
 * Apply overrides from config entries like ["conversion", "database:TRACE"].
 * Entries without a level suffix get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      const name = entry.substring(0, colonIndex);
      const levelStr = entry.substring(colonIndex + 1);
      setComponentLevel(name, levelStr.trim() ? parseLogLevel(levelStr) : LogLevel.DEBUG);
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

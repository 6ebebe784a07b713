import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { AppConfigSchema, type AppConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

/** Prefix of environment variables that override configuration values. */
export const CONFIG_ENV_PREFIX = 'TYPED_SQLITE_'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge source into target. Source values override target values.
 * Arrays from source replace target arrays (no concatenation).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target }
  for (const key of Object.keys(source)) {
    const sourceVal = source[key]
    const targetVal = result[key]
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal)
    } else {
      result[key] = sourceVal
    }
  }
  return result
}

/**
 * Coerce string values to appropriate types.
 * Environment variables are always strings; this converts numeric strings
 * and boolean strings to their proper types.
 */
function coerceValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false

  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value)

  return value
}

/**
 * Find the actual key in an object that matches the given key case-insensitively.
 * Returns the original-cased key if found, or the input key if no match exists.
 */
function findCaseInsensitiveKey(obj: Record<string, unknown>, key: string): string {
  const lowerKey = key.toLowerCase()
  for (const k of Object.keys(obj)) {
    if (k.toLowerCase() === lowerKey) return k
  }
  return key
}

/**
 * Set a nested value in an object using a path array.
 * Resolves each path segment case-insensitively against existing keys.
 */
function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj
  for (let i = 0; i < path.length - 1; i++) {
    const resolvedKey = findCaseInsensitiveKey(current, path[i])
    const next = current[resolvedKey]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[resolvedKey] = created
      current = created
    }
  }
  const finalKey = findCaseInsensitiveKey(current, path[path.length - 1])
  current[finalKey] = value
}

/**
 * Apply TYPED_SQLITE_ prefixed environment variable overrides to config.
 * Double underscores (__) indicate nested paths:
 *   TYPED_SQLITE_DATABASE__BUSYTIMEOUTMS=250 -> config.database.busyTimeoutMs = 250
 */
function applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(CONFIG_ENV_PREFIX) || value === undefined) continue
    const path = key.slice(CONFIG_ENV_PREFIX.length).toLowerCase().split('__')
    setNestedValue(config, path, coerceValue(value))
  }
  return config
}

/**
 * Recursively freeze an object and all nested objects.
 */
function deepFreeze<T extends Record<string, unknown>>(obj: T): Readonly<T> {
  Object.freeze(obj)
  for (const value of Object.values(obj)) {
    if (isPlainObject(value) && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

/**
 * Load, validate, and return a frozen AppConfig.
 *
 * Pipeline: read file -> parse JSON -> merge defaults -> apply env overrides
 *           -> validate against TypeBox schema -> freeze
 *
 * @param configPath - Path to typed-sqlite.config.json
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath: string): AppConfig {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let userConfig: unknown
  try {
    userConfig = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }
  if (!isPlainObject(userConfig)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }

  // Clone so overrides never touch DEFAULT_CONFIG
  const config = applyEnvOverrides(structuredClone(deepMerge(DEFAULT_CONFIG, userConfig)))

  if (!Value.Check(AppConfigSchema, config)) {
    const fields = [...Value.Errors(AppConfigSchema, config)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  return deepFreeze(config)
}

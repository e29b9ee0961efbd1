/**
 * Regula Config Loader
 *
 * Loads and merges configuration from .regula/config.yaml files
 * with support for inheritance via "extends" field.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { GovernanceConfig } from '../types.js'
import { GovernanceConfigSchema, formatIssues } from './schemas.js'
import {
  CircularExtendsError,
  ConfigNotFoundError,
  ExtendsDepthError,
  InvalidConfigError
} from './errors.js'

export const CONFIG_DIR = '.regula'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const MAX_SEARCH_DEPTH = 5
const MAX_EXTENDS_DEPTH = 10

type ConfigRecord = Record<string, unknown>

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value)
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item))
  }

  if (isRecord(value)) {
    const result: ConfigRecord = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item)
    }
    return result
  }

  return value
}

function isRecord(value: unknown): value is ConfigRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: GovernanceConfig = {
  version: '1',
  organs: [],
  flow: {
    policy: 'warn',
    unrestricted: []
  },
  registry: {
    path: 'registry.json'
  },
  seeds: {
    pattern: '*/*/seed.yaml'
  },
  audit: {
    empty_organ: 'off',
    organ_requirements: {}
  },
  dispatch: {
    concurrency: 4,
    retries: 3,
    retry_delay_ms: 1000,
    timeout_ms: 30000
  }
}

/**
 * Find the .regula directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    const configDir = path.join(currentDir, CONFIG_DIR)
    const configFile = path.join(configDir, CONFIG_FILE)

    if (fs.existsSync(configFile)) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }

    currentDir = parentDir
    depth++
  }

  return null
}

/**
 * Load a single config file
 */
function loadConfigFile(configPath: string, required: boolean = true): ConfigRecord {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new ConfigNotFoundError(configPath)
    }
    return {}
  }

  const content = fs.readFileSync(configPath, 'utf-8')
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    const cause = error instanceof Error ? error : undefined
    throw new InvalidConfigError(cause?.message ?? 'YAML parse error', configPath, cause)
  }

  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw new InvalidConfigError('Top level must be a YAML mapping', configPath)
  }

  // Expand environment variables in all string values
  const expanded = expandEnvVarsInValue(parsed)
  return isRecord(expanded) ? expanded : {}
}

/**
 * Deep merge two config objects. Arrays and scalars from `source` replace
 * those in `target`.
 */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target }

  for (const key of Object.keys(source)) {
    const sourceValue = source[key]
    const targetValue = result[key]

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      // Deep merge objects
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined) {
      // Override with source value
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Load config with inheritance support. The result is not validated yet.
 */
function loadConfigWithExtends(
  configPath: string,
  visited: Set<string> = new Set(),
  depth: number = 0
): ConfigRecord {
  if (depth > MAX_EXTENDS_DEPTH) {
    throw new ExtendsDepthError(MAX_EXTENDS_DEPTH)
  }

  const absolutePath = path.resolve(configPath)

  if (visited.has(absolutePath)) {
    throw new CircularExtendsError(absolutePath)
  }

  visited.add(absolutePath)

  const { extends: parent, ...config } = loadConfigFile(absolutePath)

  // Handle extends
  if (parent !== undefined) {
    if (typeof parent !== 'string') {
      throw new InvalidConfigError('"extends" must be a path string', absolutePath)
    }
    const extendsPath = path.resolve(path.dirname(absolutePath), parent)
    const parentConfig = loadConfigWithExtends(extendsPath, visited, depth + 1)

    // Merge: parent <- current
    return deepMerge(parentConfig, config)
  }

  return config
}

/**
 * Validate a merged config object against the schema, filling defaults.
 */
export function parseConfig(raw: ConfigRecord, configPath?: string): GovernanceConfig {
  const defaults: ConfigRecord = { ...DEFAULT_CONFIG }
  const result = GovernanceConfigSchema.safeParse(deepMerge(defaults, raw))
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error), configPath)
  }
  return result.data
}

/**
 * Load configuration from the nearest .regula/config.yaml
 * Also merges config.local.yaml if it exists (for machine-local overrides)
 *
 * @throws ConfigNotFoundError when `required` is set and no config exists
 */
export function loadConfig(
  startDir?: string,
  options: { required?: boolean } = {}
): GovernanceConfig {
  const configDir = findConfigDir(startDir)

  if (!configDir) {
    if (options.required) {
      throw new ConfigNotFoundError()
    }
    // No config found, return defaults
    return parseConfig({})
  }

  const configPath = path.join(configDir, CONFIG_FILE)
  let config = loadConfigWithExtends(configPath)

  // Load and merge local config
  const localConfigPath = path.join(configDir, CONFIG_LOCAL_FILE)
  const localConfig = loadConfigFile(localConfigPath, false)

  if (Object.keys(localConfig).length > 0) {
    config = deepMerge(config, localConfig)
  }

  return parseConfig(config, configPath)
}

/**
 * Resolve a config-relative path (registry file, seed workspace) against
 * the project root that holds the .regula directory.
 */
export function resolveConfigPath(configDir: string, target: string): string {
  return path.resolve(path.dirname(configDir), target)
}

/**
 * Check if a config directory exists
 */
export function configExists(startDir?: string): boolean {
  return findConfigDir(startDir) !== null
}

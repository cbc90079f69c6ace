/**
 * CLI Configuration
 *
 * Persistent case settings stored in ~/.config/dm-ingest/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or DM_INGEST_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { isSupportedEncoding } from '../parser/encoding'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Account owner id used to decide which messages were sent */
  ownerId?: string | undefined
  /** Encodings tried before the built-in cascade */
  encodings?: string[] | undefined
  /** Bytes read when detecting a file's format */
  sampleBytes?: number | undefined
  /** Directory for JSON output */
  outputDir?: string | undefined
  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

const STRING_KEYS: readonly ConfigKey[] = ['ownerId', 'outputDir']
const NUMBER_KEYS: readonly ConfigKey[] = ['sampleBytes']
const ARRAY_KEYS: readonly ConfigKey[] = ['encodings']
const ALL_KEYS: readonly ConfigKey[] = [...STRING_KEYS, ...NUMBER_KEYS, ...ARRAY_KEYS]

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  ownerId: 'Account owner id (e.g. a username or jid) for sent/received attribution',
  encodings: 'Encodings to try first, comma-separated (default: utf-8,utf-16,windows-1252)',
  sampleBytes: 'Bytes read for format detection (default: 8192)',
  outputDir: 'Directory for relative --json output paths (default: current directory)'
}

/**
 * Get the type of a config key, for CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  if (NUMBER_KEYS.includes(key)) return 'number'
  if (ARRAY_KEYS.includes(key)) return 'comma-separated'
  return 'string'
}

export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'dm-ingest')
}

/**
 * Get the config file path.
 * Priority: configFile arg > DM_INGEST_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.DM_INGEST_CONFIG) {
    return process.env.DM_INGEST_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

function readStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined
  return value.filter((item): item is string => typeof item === 'string')
}

/**
 * Keep only well-typed known keys from a parsed config file.
 */
function toConfig(data: unknown): Config {
  if (typeof data !== 'object' || data === null) return {}
  const record: Record<string, unknown> = { ...data }
  const config: Config = {}
  if (typeof record.ownerId === 'string') config.ownerId = record.ownerId
  if (typeof record.outputDir === 'string') config.outputDir = record.outputDir
  if (typeof record.sampleBytes === 'number') config.sampleBytes = record.sampleBytes
  if (typeof record.updatedAt === 'string') config.updatedAt = record.updatedAt
  const encodings = readStringArray(record.encodings)
  if (encodings) config.encodings = encodings
  return config
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  try {
    const content = await readFile(path, 'utf-8')
    return toConfig(JSON.parse(content))
  } catch {
    return null
  }
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

export type ConfigValue = string | number | string[]

/**
 * Parse a string value into the appropriate type for a config key.
 */
export function parseConfigValue(key: ConfigKey, value: string): ConfigValue {
  if (NUMBER_KEYS.includes(key)) {
    return Number.parseInt(value, 10)
  }
  if (ARRAY_KEYS.includes(key)) {
    return value.split(',').map((v) => v.trim())
  }
  return value
}

/**
 * Describe why a parsed value cannot be stored, or null when it can.
 */
export function validateConfigValue(key: ConfigKey, value: ConfigValue): string | null {
  if (key === 'sampleBytes') {
    return typeof value === 'number' && Number.isInteger(value) && value > 0
      ? null
      : 'sampleBytes must be a positive integer'
  }
  if (key === 'encodings') {
    const labels = Array.isArray(value) ? value : [String(value)]
    const unknown = labels.filter((label) => !isSupportedEncoding(label))
    return unknown.length > 0 ? `Unknown encoding: ${unknown.join(', ')}` : null
  }
  return String(value).trim() ? null : `${key} must not be empty`
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.join(',')
  }
  return String(value)
}

export function isValidConfigKey(key: string): key is ConfigKey {
  return ALL_KEYS.some((k) => k === key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...ALL_KEYS].sort()
}

function applyValue(config: Config, key: ConfigKey, value: ConfigValue): Config {
  switch (key) {
    case 'ownerId':
      return { ...config, ownerId: String(value) }
    case 'outputDir':
      return { ...config, outputDir: String(value) }
    case 'sampleBytes':
      return { ...config, sampleBytes: typeof value === 'number' ? value : Number(value) }
    case 'encodings':
      return { ...config, encodings: Array.isArray(value) ? value : [String(value)] }
  }
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: ConfigValue,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  await saveConfig(applyValue(config, key, value), configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

export interface ResolvedSettings {
  ownerId: string | undefined
  encodings: string[]
  sampleBytes: number | undefined
  outputDir: string | undefined
}

/**
 * Resolve parse settings.
 * Priority: CLI flag > DM_INGEST_OWNER env (owner only) > config file > default
 */
export async function resolveSettings(
  flags: { ownerId?: string | undefined; encodings?: string[] | undefined },
  configFile?: string
): Promise<ResolvedSettings> {
  const config = (await loadConfig(configFile)) ?? {}
  return {
    ownerId: flags.ownerId ?? process.env.DM_INGEST_OWNER ?? config.ownerId,
    encodings: flags.encodings ?? config.encodings ?? [],
    sampleBytes: config.sampleBytes,
    outputDir: config.outputDir
  }
}

/**
 * Config Command
 *
 * Manage persistent case settings stored in ~/.config/dm-ingest/config.json.
 * Supports list, set, and unset operations.
 */

import type { CLIArgs } from '../args'
import {
  type ConfigKey,
  formatConfigValue,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  setConfigValue,
  unsetConfigValue,
  validateConfigValue
} from '../config'
import type { Logger } from '../logger'

/**
 * Execute the config command.
 */
export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<void> {
  switch (args.configAction) {
    case 'list':
      await listConfig(args.configFile, logger)
      break
    case 'set':
      await setConfig(args, logger)
      break
    case 'unset':
      await unsetConfig(args, logger)
      break
  }
}

async function listConfig(configFile: string | undefined, logger: Logger): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}

  logger.log(`\nConfig file: ${getConfigPath(configFile)}\n`)

  const setKeys = getValidConfigKeys().filter((key) => config[key] !== undefined)
  if (setKeys.length === 0) {
    logger.log('No settings configured. Run `dm-ingest config --help` for available settings.')
  }
  for (const key of setKeys) {
    logger.log(`  ${key}: ${formatConfigValue(config[key])}`)
  }

  const envOwner = process.env.DM_INGEST_OWNER
  if (envOwner) {
    logger.log(`\n  ownerId is overridden by DM_INGEST_OWNER=${envOwner}`)
  }
  if (config.updatedAt) {
    logger.verbose(`Last updated ${config.updatedAt}`)
  }
}

function requireKey(key: string | undefined, usage: string): ConfigKey {
  if (!key) {
    throw new Error(`Missing key. Usage: ${usage}`)
  }
  if (!isValidConfigKey(key)) {
    throw new Error(`Invalid key: ${key}. Valid keys: ${getValidConfigKeys().join(', ')}`)
  }
  return key
}

async function setConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const usage = 'dm-ingest config set <key> <value>'
  const key = requireKey(args.configKey, usage)
  if (args.configValue === undefined) {
    throw new Error(`Missing value. Usage: ${usage}`)
  }

  const value = parseConfigValue(key, args.configValue)
  const problem = validateConfigValue(key, value)
  if (problem) {
    throw new Error(problem)
  }

  await setConfigValue(key, value, args.configFile)
  logger.success(`Set ${key}=${formatConfigValue(value)}`)
}

async function unsetConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const key = requireKey(args.configKey, 'dm-ingest config unset <key>')
  await unsetConfigValue(key, args.configFile)
  logger.success(`Unset ${key}`)
}

/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export interface CLIArgs {
  command: string
  input: string
  /** Force a parser by platform name instead of detecting */
  platform: string | undefined
  ownerId: string | undefined
  encodings: string[] | undefined
  jsonOutput: string | undefined
  quiet: boolean
  verbose: boolean
  configFile: string | undefined
  /** For config command: action (list, set, unset) */
  configAction: 'list' | 'set' | 'unset'
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Normalize messaging-platform exports into conversations.

Supported formats (auto-detected):
  • Twitter DM export (PGP-signed .txt)
  • Kik Messenger CSV export
  • Snapchat chat history CSV

Examples:
  $ dm-ingest detect export.csv
  $ dm-ingest parse direct-messages.txt
  $ dm-ingest parse chat_history.csv --owner some_user --json out.json`

function createProgram(): Command {
  const program = new Command()
    .name('dm-ingest')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--config-file <path>', 'Config file path (or set DM_INGEST_CONFIG)')

  // ============ PARSE ============
  program
    .command('parse')
    .description('Parse an export: detect format, rebuild conversations, report problems')
    .argument('<input>', 'Export file')
    .option('-p, --platform <name>', 'Skip detection and use this parser')
    .option('--owner <id>', 'Account owner id (or set DM_INGEST_OWNER)')
    .option('--encoding <encodings>', 'Encodings to try first, comma-separated')
    .option('--json [file]', 'Output as JSON (to file if specified, otherwise stdout)')

  // ============ DETECT ============
  program
    .command('detect')
    .description('Show which parser would handle a file')
    .argument('<input>', 'Export file')

  // ============ FORMATS ============
  program.command('formats').description('List supported formats and file filters')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  dm-ingest config                          List current settings
  dm-ingest config set ownerId some_user    Set the account owner
  dm-ingest config unset encodings          Remove custom encodings`
    )

  return program
}

function parseEncodings(value: unknown): string[] | undefined {
  if (typeof value !== 'string') return undefined
  const encodings = value
    .split(',')
    .map((e) => e.trim())
    .filter((e) => e.length > 0)
  return encodings.length > 0 ? encodings : undefined
}

function parseJsonOutput(value: unknown): string | undefined {
  if (value === true) return 'stdout'
  return typeof value === 'string' ? value : undefined
}

function buildCLIArgs(commandName: string, input: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: commandName,
    input,
    platform: typeof opts.platform === 'string' ? opts.platform : undefined,
    ownerId: typeof opts.owner === 'string' ? opts.owner : undefined,
    encodings: parseEncodings(opts.encoding),
    jsonOutput: parseJsonOutput(opts.json),
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    configFile: typeof opts.configFile === 'string' ? opts.configFile : undefined,
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): 'list' | 'set' | 'unset' {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

function buildConfigCLIArgs(
  action: string | undefined,
  key: string | undefined,
  value: string | undefined,
  opts: Record<string, unknown>
): CLIArgs {
  const base = buildCLIArgs('config', '', opts)
  return {
    ...base,
    configAction: parseConfigAction(action),
    configKey: key,
    configValue: value
  }
}

/**
 * Wire action handlers that capture the parsed args instead of running anything.
 */
function attachActions(program: Command, capture: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    cmd.action((input?: string) => {
      capture(buildCLIArgs(cmd.name(), input ?? '', cmd.optsWithGlobals()))
    })
  }

  const configCmd = program.commands.find((c) => c.name() === 'config')
  if (configCmd) {
    configCmd.action((action?: string, key?: string, value?: string) => {
      capture(buildConfigCLIArgs(action, key, value, configCmd.optsWithGlobals()))
    })
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result ?? buildCLIArgs('help', '', {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
    program.configureOutput({ writeOut: () => {}, writeErr: () => {} })
  }

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help/version
    if (!result) {
      return buildCLIArgs('help', '', {})
    }
  }

  return result ?? buildCLIArgs('help', '', {})
}

/**
 * Command-Line Arguments (with commander)
 * =======================================
 *
 * Derives one commander option per property of an owner, so that any owner
 * can be configured from the command line:
 *
 * ```ts
 * const program = new Command()
 * const args = addParserArguments(owner, program)
 * program.parse()
 * applyArguments(owner, program.opts(), args)
 * ```
 *
 * Booleans take an optional `true`/`false`, numbers and colours are parsed
 * when read, choices are limited to the declared choices, and list, bounds
 * and point properties take one value per item.
 */

import { InvalidArgumentError, Option, type Command, type OptionValues } from 'commander'
import { log } from './config'
import { errorMessage } from './errors'
import { getChoices, type PropertyOwner } from './properties'
import type { PropertyDecl, PropertyName, PropertySchema } from './properties-types'
import { serialise } from './serialise'

// =============================================================================
// TYPES
// =============================================================================

interface CliOptions<S extends PropertySchema> {
  /** Properties that get no option. */
  exclude?: readonly PropertyName<S>[]
  /** Short flags by property name; `false` for no short flags at all. */
  shortArgs?: Partial<Record<PropertyName<S>, string>> | false
  /** Long flags by property name. Defaults to the name with `_` as `-`. */
  longArgs?: Partial<Record<PropertyName<S>, string>>
  /** Help text by property name. */
  help?: Partial<Record<PropertyName<S>, string>>
}

/** The option registered for each property. */
type CliArguments<S extends PropertySchema> = ReadonlyMap<PropertyName<S>, Option>

const LETTERS = 'abcdefgijklmnopqrstuvwxyzABCDEFGIJKLMNOPQRSTUVWXYZ'

// =============================================================================
// IMPLEMENTATION
// =============================================================================

/**
 * Picks a free short flag for `name`: one of its own letters if possible,
 * then any other letter. `-h` stays reserved for help.
 */
function pickShortFlag(name: string, used: Set<string>): string | undefined {
  const candidates = [...name.replace(/[^a-zA-Z]/g, '')].flatMap(letter => [letter.toLowerCase(), letter.toUpperCase()])
  const flag = [...candidates, ...LETTERS].find(letter => letter !== 'h' && letter !== 'H' && !used.has(letter))
  if (flag !== undefined) used.add(flag)
  return flag
}

function strictParser(name: string, parse: (text: string) => unknown): (text: string) => unknown {
  return text => {
    try {
      return parse(text)
    } catch (error) {
      throw new InvalidArgumentError(`${name}: ${errorMessage(error)}`)
    }
  }
}

function makeOption(flags: string, description: string, decl: PropertyDecl, choices: string[]): Option {
  if (decl.kind === 'list') return new Option(`${flags} <values...>`, description)

  switch (decl.type) {
    case 'boolean':
      return new Option(`${flags} [bool]`, description).argParser(strictParser(flags, decl.parse))
    case 'choice':
      return choices.length > 0
        ? new Option(`${flags} <choice>`, description).choices(choices)
        : new Option(`${flags} <choice>`, description)
    case 'string':
      return new Option(`${flags} <text>`, description)
    case 'colour':
      return new Option(`${flags} <colour>`, description).argParser(strictParser(flags, decl.parse))
    case 'int':
    case 'real':
      return new Option(`${flags} <number>`, description).argParser(strictParser(flags, decl.parse))
  }
}

/**
 * Registers one option per property on `program` and returns them, keyed by
 * property name, for `applyArguments` and `generateArguments`.
 */
function addParserArguments<S extends PropertySchema>(
  owner: PropertyOwner<S>,
  program: Command,
  options: CliOptions<S> = {}
): CliArguments<S> {
  const excluded = new Set<string>(options.exclude)
  const used = new Set<string>()
  const registered = new Map<PropertyName<S>, Option>()
  const names = owner.getPropertyNames().filter(name => !excluded.has(name))

  // Explicit short flags first, so generated ones cannot take them.
  const shortArgs: Partial<Record<PropertyName<S>, string>> | undefined =
    options.shortArgs === false ? undefined : options.shortArgs ?? {}
  names.forEach(name => {
    const explicit = shortArgs?.[name]
    if (explicit !== undefined) used.add(explicit)
  })

  for (const name of names) {
    const decl: PropertyDecl = owner.getProp(name)
    const long = options.longArgs?.[name] ?? name.replace(/_/g, '-')
    const short = shortArgs === undefined ? undefined : shortArgs[name] ?? pickShortFlag(name, used)
    const flags = short === undefined ? `--${long}` : `-${short}, --${long}`
    const description = options.help?.[name] ?? `${name} (default: ${serialise(owner, name)})`
    const choices = decl.kind === 'value' && decl.type === 'choice' ? getChoices(owner, name) : []

    const option = makeOption(flags, description, decl, choices)
    program.addOption(option)
    registered.set(name, option)
    log.debug(`Added command-line option ${flags} for ${owner.label}.${name}`)
  }

  return registered
}

/**
 * Sets every property whose option was given. Errors from `set()` (a
 * `CastError`, `ValidationError` or `LengthMismatchError`) propagate.
 */
function applyArguments<S extends PropertySchema>(
  owner: PropertyOwner<S>,
  values: OptionValues,
  args: CliArguments<S>
): void {
  for (const [name, option] of args) {
    const raw: unknown = values[option.attributeName()]
    if (raw === undefined) continue
    const decl: PropertyDecl = owner.getProp(name)
    if (decl.kind === 'list') {
      const items = Array.isArray(raw) ? raw : [raw]
      owner.setValue(name, items.map(item => decl.item.parse(String(item))))
    } else {
      owner.setValue(name, raw)
    }
  }
}

/** The argv (without the program name) that reproduces the owner's current values. */
function generateArguments<S extends PropertySchema>(owner: PropertyOwner<S>, args: CliArguments<S>): string[] {
  const argv: string[] = []
  for (const [name, option] of args) {
    const flag = option.long ?? option.short
    if (flag === undefined) continue
    const decl: PropertyDecl = owner.getProp(name)
    const value = owner.getValue(name)
    if (decl.kind === 'list') {
      const items = Array.isArray(value) ? value : []
      argv.push(flag, ...items.map(item => decl.item.format(item)))
    } else {
      argv.push(flag, decl.format(value))
    }
  }
  return argv
}

export { addParserArguments, applyArguments, generateArguments, type CliOptions, type CliArguments }

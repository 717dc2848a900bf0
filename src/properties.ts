/**
 * Property Owners
 * ===============
 *
 * A `PropertyOwner` turns a schema of declarations (see
 * `properties-types.ts`) into one container per property and gives named,
 * typed access to them:
 *
 * ```ts
 * const view = createOwner({
 *   zoom: Real({ minval: 1, maxval: 8, default: 1 }),
 *   mode: Choice(['fast', 'accurate'])
 * }, { label: 'view' })
 *
 * view.addListener('zoom', 'redraw', zoom => redraw(zoom))
 * view.set('zoom', 2)
 * view.get('mode') // 'fast'
 * ```
 *
 * Each container is named after its property and receives the owner as its
 * context. A change to any property revalidates the others, since a
 * declaration may depend on them (a `required` predicate, a custom
 * `validateFn`).
 */

import { log, uniqueName } from './config'
import { CastError, PropertyError, UnknownPropertyError } from './errors'
import { PropertyValueList } from './list'
import type { NotificationQueue } from './queue'
import { enabledFlags, stringList } from './properties-types'
import type {
  ContainerOf,
  ListDecl,
  PropertyContext,
  PropertyDecl,
  PropertyName,
  PropertySchema,
  ValueDecl,
  ValueOf
} from './properties-types'
import { useNotificationQueue } from './ergonomic'
import {
  PropertyValue,
  type AnyContainer,
  type AnyPropertyValue,
  type AttributeListener,
  type Listener
} from './value'

// =============================================================================
// TYPES
// =============================================================================

interface OwnerOptions {
  /** Shown in log output and by `toString()`. */
  label?: string
  queue?: NotificationQueue
}

type OwnerListener = Listener<unknown, PropertyContext>

// =============================================================================
// IMPLEMENTATION
// =============================================================================

class PropertyOwner<S extends PropertySchema> implements PropertyContext {
  readonly label: string
  readonly schema: S
  readonly queue: NotificationQueue
  private readonly containers = new Map<string, AnyContainer<PropertyContext>>()

  /** Pre-notify hook shared by every container of this owner. */
  private readonly revalidateOthers: OwnerListener = (_value, _valid, _owner, changed) => {
    this.containers.forEach((container, name) => {
      if (name !== changed) container.revalidate()
    })
  }

  constructor(schema: S, options: OwnerOptions = {}) {
    this.schema = schema
    this.label = options.label ?? uniqueName('PropertyOwner')
    this.queue = options.queue ?? useNotificationQueue()

    for (const [name, decl] of Object.entries(schema)) {
      this.containers.set(name, decl.kind === 'list' ? this.createList(name, decl) : this.createValue(name, decl))
    }
    // Declarations may read each other, which only works once all exist.
    this.containers.forEach(container => container.refreshValidity())
    log.debug(`Created owner ${this.label} with properties ${[...this.containers.keys()].join(', ')}`)
  }

  private createValue(name: string, decl: ValueDecl<unknown>): AnyContainer<PropertyContext> {
    return new PropertyValue<unknown, PropertyContext>({
      context: this,
      name,
      value: decl.defaultValue,
      cast: decl.cast,
      validate: decl.validate,
      equals: decl.equals,
      allowInvalid: decl.allowInvalid,
      attributes: { ...decl.constraints },
      preNotify: this.revalidateOthers,
      queue: this.queue
    })
  }

  private createList(name: string, decl: ListDecl<unknown>): AnyContainer<PropertyContext> {
    return new PropertyValueList<unknown, PropertyContext>({
      context: this,
      name,
      values: decl.defaultValue,
      itemCast: decl.item.cast,
      itemValidate: decl.item.validate,
      itemEquals: decl.item.equals,
      itemAllowInvalid: decl.item.allowInvalid,
      itemAttributes: { ...decl.item.constraints },
      listValidate: decl.validate,
      allowInvalid: decl.allowInvalid,
      attributes: { ...decl.constraints },
      preNotify: this.revalidateOthers,
      queue: this.queue
    })
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  isPropertyName(name: string): name is PropertyName<S> {
    return this.containers.has(name)
  }

  /** Property names in declaration order. */
  getPropertyNames(): PropertyName<S>[] {
    return Object.keys(this.schema).filter((name): name is PropertyName<S> => this.isPropertyName(name))
  }

  /** The declaration of `name`. */
  getProp<K extends PropertyName<S>>(name: K): S[K] {
    return this.schema[name]
  }

  /**
   * The container of `name`, typed by its declaration. The constructor builds
   * each container from the `kind` of `schema[name]`, the same field
   * `ContainerOf` maps on, so the assertion holds for every `K`.
   */
  getPropVal<K extends PropertyName<S>>(name: K): ContainerOf<S[K]> {
    return this.requireContainer(name) as ContainerOf<S[K]>
  }

  getContainer(name: string): AnyContainer<PropertyContext> | undefined {
    return this.containers.get(name)
  }

  /** @throws UnknownPropertyError */
  requireContainer(name: string): AnyContainer<PropertyContext> {
    const container = this.containers.get(name)
    if (container === undefined) {
      throw new UnknownPropertyError(`${this.label} has no property "${name}"`, { owner: this.label, property: name })
    }
    return container
  }

  // ---------------------------------------------------------------------------
  // Values
  // ---------------------------------------------------------------------------

  /** The plain value of `name`; a list property yields an array copy. */
  get<K extends PropertyName<S>>(name: K): ValueOf<S[K]> {
    const value = this.getValue(name)
    return value as ValueOf<S[K]>
  }

  /**
   * Sets `name`. A list property takes an array of the same length.
   *
   * @throws CastError, ValidationError, LengthMismatchError
   */
  set<K extends PropertyName<S>>(name: K, value: ValueOf<S[K]>): void {
    this.setValue(name, value)
  }

  /** Untyped `get()`, for code that works over any schema. */
  getValue(name: string): unknown {
    const container = this.requireContainer(name)
    return container.kind === 'list' ? container.values() : container.get()
  }

  /** Untyped `set()`, for code that works over any schema. */
  setValue(name: string, value: unknown): void {
    const container = this.requireContainer(name)
    if (container.kind === 'list' && !Array.isArray(value)) {
      throw new CastError(`${container.describe()} takes a list of values`, undefined, { property: name, value })
    }
    container.set(value)
  }

  // ---------------------------------------------------------------------------
  // Listeners
  // ---------------------------------------------------------------------------

  addListener(name: PropertyName<S>, listenerName: string, callback: OwnerListener, overwrite = false): void {
    this.requireContainer(name).addListener(listenerName, callback, overwrite)
  }

  removeListener(name: PropertyName<S>, listenerName: string): void {
    this.requireContainer(name).removeListener(listenerName)
  }

  enableListener(name: PropertyName<S>, listenerName: string): void {
    this.requireContainer(name).enableListener(listenerName)
  }

  disableListener(name: PropertyName<S>, listenerName: string): void {
    this.requireContainer(name).disableListener(listenerName)
  }

  hasListener(name: PropertyName<S>, listenerName: string): boolean {
    return this.requireContainer(name).hasListener(listenerName)
  }

  isListenerEnabled(name: PropertyName<S>, listenerName: string): boolean {
    return this.requireContainer(name).isListenerEnabled(listenerName)
  }

  addConstraintListener(name: PropertyName<S>, listenerName: string, callback: AttributeListener<PropertyContext>): void {
    this.requireContainer(name).addAttributeListener(listenerName, callback)
  }

  removeConstraintListener(name: PropertyName<S>, listenerName: string): void {
    this.requireContainer(name).removeAttributeListener(listenerName)
  }

  // ---------------------------------------------------------------------------
  // Constraints
  // ---------------------------------------------------------------------------

  getConstraint(name: PropertyName<S>, constraint: string): unknown {
    return this.requireContainer(name).getAttribute(constraint)
  }

  /**
   * Changes one constraint of `name`. A scalar value is cast again, so a
   * clamped number follows a new limit.
   */
  setConstraint(name: PropertyName<S>, constraint: string, value: unknown): void {
    const container = this.requireContainer(name)
    container.setAttribute(constraint, value)
    if (container.kind === 'value') container.recast()
  }

  getItemConstraint(name: PropertyName<S>, index: number, constraint: string): unknown {
    return this.itemOf(name, index).getAttribute(constraint)
  }

  setItemConstraint(name: PropertyName<S>, index: number, constraint: string, value: unknown): void {
    const item = this.itemOf(name, index)
    item.setAttribute(constraint, value)
    item.recast()
  }

  private itemOf(name: PropertyName<S>, index: number): AnyPropertyValue<PropertyContext> {
    const container = this.requireContainer(name)
    if (container.kind !== 'list') {
      throw new PropertyError(`${container.describe()} is not a list`, 'NOT_A_LIST', { property: name })
    }
    const item = container.getPropertyValueList().at(index)
    if (item === undefined) {
      throw new UnknownPropertyError(`${container.describe()} has no item ${index}`, { property: name, index })
    }
    return item
  }

  // ---------------------------------------------------------------------------
  // Notification
  // ---------------------------------------------------------------------------

  notify(name: PropertyName<S>): void {
    this.requireContainer(name).notify()
  }

  enableNotification(name: PropertyName<S>): void {
    this.requireContainer(name).setNotificationState(true)
  }

  disableNotification(name: PropertyName<S>): void {
    this.requireContainer(name).setNotificationState(false)
  }

  getNotificationState(name: PropertyName<S>): boolean {
    return this.requireContainer(name).getNotificationState()
  }

  setNotificationState(name: PropertyName<S>, state: boolean): void {
    this.requireContainer(name).setNotificationState(state)
  }

  enableAllNotification(): void {
    this.containers.forEach(container => container.setNotificationState(true))
  }

  disableAllNotification(): void {
    this.containers.forEach(container => container.setNotificationState(false))
  }

  // ---------------------------------------------------------------------------
  // Validity
  // ---------------------------------------------------------------------------

  /** Validity of one property, or of all of them. */
  isValid(name?: PropertyName<S>): boolean {
    if (name !== undefined) return this.requireContainer(name).isValid()
    return [...this.containers.values()].every(container => container.isValid())
  }

  /** `[name, message]` for every invalid property, in declaration order. */
  validateAll(): Array<[PropertyName<S>, string]> {
    const failures: Array<[PropertyName<S>, string]> = []
    for (const name of this.getPropertyNames()) {
      const container = this.requireContainer(name)
      container.refreshValidity()
      if (!container.isValid()) failures.push([name, container.getValidationMessage() ?? 'Invalid value'])
    }
    return failures
  }

  toString(): string {
    const names = this.getPropertyNames()
    const width = Math.max(0, ...names.map(name => name.length))
    const lines = names.map(name => {
      const container = this.requireContainer(name)
      const text = container.kind === 'list' ? container.toString() : String(container.get())
      return `  ${name.padEnd(width)} = ${text}`
    })
    return [`${this.label}:`, ...lines].join('\n')
  }
}

function createOwner<S extends PropertySchema>(schema: S, options: OwnerOptions = {}): PropertyOwner<S> {
  return new PropertyOwner(schema, options)
}

// =============================================================================
// CHOICE HELPERS
// =============================================================================

function choiceContainer<S extends PropertySchema>(
  owner: PropertyOwner<S>,
  name: PropertyName<S>
): AnyContainer<PropertyContext> {
  const decl: PropertyDecl = owner.getProp(name)
  if (decl.kind !== 'value' || decl.type !== 'choice') {
    throw new PropertyError(`${owner.label}.${name} is not a choice`, 'NOT_A_CHOICE', { property: name })
  }
  return owner.requireContainer(name)
}

function getChoices<S extends PropertySchema>(owner: PropertyOwner<S>, name: PropertyName<S>): string[] {
  return stringList(choiceContainer(owner, name).getAttribute('choices'))
}

function getLabels<S extends PropertySchema>(owner: PropertyOwner<S>, name: PropertyName<S>): string[] {
  return stringList(choiceContainer(owner, name).getAttribute('labels'))
}

function isChoiceEnabled<S extends PropertySchema>(owner: PropertyOwner<S>, name: PropertyName<S>, choice: string): boolean {
  return enabledFlags(choiceContainer(owner, name).getAttribute('choiceEnabled'))[choice] === true
}

function setChoiceEnabled<S extends PropertySchema>(
  owner: PropertyOwner<S>,
  name: PropertyName<S>,
  choice: string,
  enabled: boolean
): void {
  const container = choiceContainer(owner, name)
  const flags = enabledFlags(container.getAttribute('choiceEnabled'))
  container.setAttribute('choiceEnabled', { ...flags, [choice]: enabled })
}

function enableChoice<S extends PropertySchema>(owner: PropertyOwner<S>, name: PropertyName<S>, choice: string): void {
  setChoiceEnabled(owner, name, choice, true)
}

function disableChoice<S extends PropertySchema>(owner: PropertyOwner<S>, name: PropertyName<S>, choice: string): void {
  setChoiceEnabled(owner, name, choice, false)
}

/**
 * Replaces the available choices, all enabled. The current value is kept
 * when it is still a choice, otherwise the first choice is selected.
 */
function setChoices<S extends PropertySchema>(
  owner: PropertyOwner<S>,
  name: PropertyName<S>,
  choices: readonly string[],
  labels: readonly string[] = choices
): void {
  if (labels.length !== choices.length) {
    throw new PropertyError('A label is required for every choice', 'INVALID_DECLARATION', { property: name })
  }
  const container = choiceContainer(owner, name)
  container.setAttribute('labels', [...labels])
  container.setAttribute('choiceEnabled', Object.fromEntries(choices.map(choice => [choice, true])))
  container.setAttribute('choices', [...choices])
  const current = container.get()
  if (typeof current !== 'string' || !choices.includes(current)) container.set(choices[0] ?? '')
}

function addChoice<S extends PropertySchema>(
  owner: PropertyOwner<S>,
  name: PropertyName<S>,
  choice: string,
  label: string = choice
): void {
  const choices = getChoices(owner, name)
  if (choices.includes(choice)) return
  const labels = getLabels(owner, name)
  const flags = enabledFlags(choiceContainer(owner, name).getAttribute('choiceEnabled'))
  setChoices(owner, name, [...choices, choice], [...labels, label])
  Object.entries(flags)
    .filter(([, enabled]) => !enabled)
    .forEach(([disabled]) => disableChoice(owner, name, disabled))
}

export {
  PropertyOwner,
  createOwner,
  getChoices,
  getLabels,
  isChoiceEnabled,
  enableChoice,
  disableChoice,
  setChoices,
  addChoice,
  type OwnerOptions,
  type OwnerListener
}

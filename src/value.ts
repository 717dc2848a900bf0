/**
 * Value Container
 * ===============
 *
 * `PropertyValue` holds one observable value: it casts and validates input,
 * keeps a registry of named listeners and of attributes (constraints such as
 * `minval`), and hands notifications to a `NotificationQueue`.
 *
 * The stored value is always the cast of the most recently set input, even
 * when that value is invalid (unless `allowInvalid` is false). Validity is
 * cached and recomputed whenever the value or an attribute changes, and is
 * delivered to listeners alongside the value.
 *
 * Containers are binding-aware: `notify()` first brings every container
 * bound to this one (see `bindable.ts`) in line with it, then queues one
 * notification round per container whose state changed.
 */

import { getConfig, log, uniqueName } from './config'
import { deepEqual, strictEqual } from './equality'
import { CastError, DuplicateNameError, ValidationError, errorMessage } from './errors'
import { useNotificationQueue } from './ergonomic'
import type { NotificationQueue, QueuedCall } from './queue'

// =============================================================================
// TYPES
// =============================================================================

/** Constraints and metadata attached to a container, e.g. `{ minval: 0 }`. */
type Attributes = Record<string, unknown>

type CastFunction<T, C> = (context: C, attributes: Readonly<Attributes>, value: T) => T

/**
 * Throws (any `Error`) when `value` is invalid. The error message is kept as
 * the container's validation message.
 */
type ValidateFunction<T, C> = (context: C, attributes: Readonly<Attributes>, value: T) => void

type EqualityFunction<T> = (a: T, b: T) => boolean

/** Receives the value, its validity, the container context and the container name. */
type Listener<V, C> = (value: V, valid: boolean, context: C, name: string) => void

type AttributeListener<C> = (context: C, attribute: string, value: unknown, name: string) => void

interface ListenerRecord<V, C> {
  readonly name: string
  readonly callback: Listener<V, C>
  enabled: boolean
  /** Registration marker; increases monotonically per container. */
  readonly order: number
}

interface Validity {
  valid: boolean
  message?: string
}

/**
 * What the binding layer needs to see of a container, independent of its
 * value type.
 */
interface LinkedContainer {
  readonly id: string
  readonly name: string
  readonly links: ReadonlyMap<string, ContainerLink>
  detachLink(peerId: string): void
  collectNotifications(includePostNotify?: boolean): QueuedCall[]
  collectAttributeNotifications(attribute: string, value: unknown): QueuedCall[]
}

interface LinkFlags {
  syncValue: boolean
  syncAttributes: boolean
}

/**
 * A live link between two containers, installed by the binding layer. Each
 * side stores the link under the id of the other side.
 */
interface ContainerLink {
  readonly syncValue: boolean
  readonly syncAttributes: boolean
  /** Changes which kinds of state the link carries. */
  configure(flags: LinkFlags): void
  /** Pushes the whole state of `from` (attributes, then value) to the other side and notifies. */
  synchronise(from: LinkedContainer): void
  /** Detaches the link from both sides. */
  dispose(): void
  /** The other side, or `undefined` once it has been garbage-collected. */
  peerOf(container: LinkedContainer): LinkedContainer | undefined
  /**
   * Copies the state of `from` onto the other side without notifying, and
   * returns the notifications the other side now owes. `undefined` means
   * the copy was refused and propagation should stop at this link.
   */
  pushValue(from: LinkedContainer): QueuedCall[] | undefined
  pushAttribute(from: LinkedContainer, attribute: string, value: unknown): QueuedCall[] | undefined
}

/**
 * A container seen without its value type, as held by registries of
 * heterogeneous properties and by the binding layer.
 */
interface ContainerView<C = unknown> extends LinkedContainer {
  readonly context: C
  readonly queue: NotificationQueue
  describe(): string
  get(): unknown
  set(value: unknown): void
  isValid(): boolean
  getValidationMessage(): string | undefined
  revalidate(): void
  refreshValidity(): boolean
  getNotificationState(): boolean
  setNotificationState(state: boolean): void
  notify(includePostNotify?: boolean): void
  addListener(name: string, callback: Listener<unknown, C>, overwrite?: boolean): void
  removeListener(name: string): void
  enableListener(name: string): void
  disableListener(name: string): void
  hasListener(name: string): boolean
  isListenerEnabled(name: string): boolean
  getListenerNames(): string[]
  addAttributeListener(name: string, listener: AttributeListener<C>): void
  removeAttributeListener(name: string): void
  getAttribute(name: string): unknown
  getAttributes(): Attributes
  setAttribute(name: string, value: unknown): void
  assignAttribute(name: string, value: unknown): boolean
  setPreNotifyFunction(fn: Listener<unknown, C> | undefined): void
  attachLink(peerId: string, link: ContainerLink): void
  getLink(peerId: string): ContainerLink | undefined
}

interface AnyPropertyValue<C = unknown> extends ContainerView<C> {
  readonly kind: 'value'
  adopt(value: unknown): boolean
  recast(): void
}

interface AnyPropertyValueList<C = unknown> extends ContainerView<C> {
  readonly kind: 'list'
  readonly length: number
  values(): unknown[]
  getPropertyValueList(): AnyPropertyValue<C>[]
  createItem(value: unknown): AnyPropertyValue<C>
  adoptItems(next: AnyPropertyValue<C>[]): boolean
}

type AnyContainer<C = unknown> = AnyPropertyValue<C> | AnyPropertyValueList<C>

interface ContainerOptions<V, C> {
  /** Passed through to every callback, never interpreted. */
  context: C
  name?: string
  preNotify?: Listener<V, C>
  postNotify?: Listener<V, C>
  allowInvalid?: boolean
  attributes?: Attributes
  queue?: NotificationQueue
}

interface PropertyValueOptions<T, C> extends ContainerOptions<T, C> {
  value: T
  cast?: CastFunction<T, C>
  validate?: ValidateFunction<T, C>
  equals?: EqualityFunction<T>
}

const RESERVED_LISTENER_NAMES = ['prenotify', 'postnotify']

let containerCount = 0

// =============================================================================
// PROPAGATION THROUGH BINDINGS
// =============================================================================

/**
 * Walks the binding graph breadth-first from `source`, pushing state across
 * every link that carries `kind`, and collects the notifications owed by the
 * containers that changed. Each container is visited once, so cycles in the
 * graph terminate. Containers whose ids are in `skip` are treated as visited.
 */
function propagate(
  source: LinkedContainer,
  kind: 'value' | 'attribute',
  push: (link: ContainerLink, from: LinkedContainer) => QueuedCall[] | undefined,
  skip: readonly string[] = []
): QueuedCall[] {
  const visited = new Set<string>([source.id, ...skip])
  const pending: LinkedContainer[] = [source]
  const calls: QueuedCall[] = []

  for (let from = pending.shift(); from !== undefined; from = pending.shift()) {
    for (const link of [...from.links.values()]) {
      if (kind === 'value' ? !link.syncValue : !link.syncAttributes) continue
      const peer = link.peerOf(from)
      if (peer === undefined || visited.has(peer.id)) continue
      visited.add(peer.id)
      const owed = push(link, from)
      if (owed === undefined) continue
      calls.push(...owed)
      pending.push(peer)
    }
  }

  return calls
}

function describeContext(context: unknown): string {
  if (typeof context !== 'object' || context === null) return typeof context
  if ('label' in context && typeof context.label === 'string') return context.label
  return context.constructor.name
}

// =============================================================================
// SHARED CONTAINER BEHAVIOUR
// =============================================================================

/**
 * Listener, attribute and notification bookkeeping shared by scalar and list
 * containers. `V` is what `get()` returns and what listeners receive.
 */
abstract class ObservableContainer<V, C> implements LinkedContainer {
  abstract readonly kind: 'value' | 'list'
  readonly id: string
  readonly name: string
  readonly context: C
  readonly queue: NotificationQueue

  protected readonly allowInvalid: boolean
  protected attributes: Attributes
  protected valid = false
  protected validationMessage: string | undefined = undefined

  private notification = true
  private preNotifyFn: Listener<V, C> | undefined
  private postNotifyFn: Listener<V, C> | undefined
  private readonly listeners = new Map<string, ListenerRecord<V, C>>()
  private readonly attributeListeners = new Map<string, AttributeListener<C>>()
  private readonly linkMap = new Map<string, ContainerLink>()
  private listenerOrder = 0

  protected constructor(options: ContainerOptions<V, C>, defaultPrefix: string) {
    containerCount += 1
    this.id = `container-${containerCount}`
    this.name = options.name ?? uniqueName(defaultPrefix)
    this.context = options.context
    this.queue = options.queue ?? useNotificationQueue()
    this.allowInvalid = options.allowInvalid ?? true
    this.attributes = { ...options.attributes }
    this.preNotifyFn = options.preNotify
    this.postNotifyFn = options.postNotify
  }

  /** The current value. No side effects. */
  abstract get(): V

  /** Runs the validate function(s) against the current value. */
  protected abstract computeValidity(): Validity

  /** `<context label or type>.<container name>`, used in log output. */
  describe(): string {
    return `${describeContext(this.context)}.${this.name}`
  }

  // ---------------------------------------------------------------------------
  // Validity
  // ---------------------------------------------------------------------------

  isValid(): boolean {
    return this.valid
  }

  /** The message of the last validation failure, if the value is invalid. */
  getValidationMessage(): string | undefined {
    return this.validationMessage
  }

  /**
   * Recomputes validity without touching the value; notifies if validity
   * changed.
   */
  revalidate(): void {
    if (this.refreshValidity()) this.notify()
  }

  /** @internal Recomputes validity silently, returning whether it changed. */
  refreshValidity(): boolean {
    const { valid, message } = this.computeValidity()
    this.validationMessage = message
    if (valid === this.valid) return false
    this.valid = valid
    return true
  }

  // ---------------------------------------------------------------------------
  // Notification state
  // ---------------------------------------------------------------------------

  enableNotification(): void {
    this.notification = true
  }

  disableNotification(): void {
    this.notification = false
  }

  getNotificationState(): boolean {
    return this.notification
  }

  setNotificationState(state: boolean): void {
    if (state) this.enableNotification()
    else this.disableNotification()
  }

  setPreNotifyFunction(fn: Listener<V, C> | undefined): void {
    this.preNotifyFn = fn
  }

  setPostNotifyFunction(fn: Listener<V, C> | undefined): void {
    this.postNotifyFn = fn
  }

  // ---------------------------------------------------------------------------
  // Listeners
  // ---------------------------------------------------------------------------

  /**
   * Registers `callback` under `name`. Listeners run in registration order,
   * after the pre-notify hook and before the post-notify hook.
   *
   * @throws DuplicateNameError if `name` is taken (and `overwrite` is false)
   *         or reserved.
   */
  addListener(name: string, callback: Listener<V, C>, overwrite = false): void {
    if (RESERVED_LISTENER_NAMES.includes(name.toLowerCase())) {
      throw new DuplicateNameError(`Listener name "${name}" is reserved`, { container: this.name })
    }
    const prior = this.listeners.get(name)
    if (prior !== undefined && !overwrite) {
      throw new DuplicateNameError(`Listener "${name}" already exists on ${this.describe()}`, {
        container: this.name,
        listener: name
      })
    }
    log.debug(`Adding listener on ${this.describe()}: ${name}`)
    this.listenerOrder += 1
    this.listeners.set(name, { name, callback, enabled: true, order: this.listenerOrder })
  }

  removeListener(name: string): void {
    log.debug(`Removing listener on ${this.describe()}: ${name}`)
    this.listeners.delete(name)
  }

  enableListener(name: string): void {
    const record = this.listeners.get(name)
    if (record !== undefined) record.enabled = true
  }

  disableListener(name: string): void {
    const record = this.listeners.get(name)
    if (record !== undefined) record.enabled = false
  }

  hasListener(name: string): boolean {
    return this.listeners.has(name)
  }

  isListenerEnabled(name: string): boolean {
    return this.listeners.get(name)?.enabled ?? false
  }

  /** Listener names in registration order. */
  getListenerNames(): string[] {
    return [...this.listeners.values()].sort((a, b) => a.order - b.order).map(record => record.name)
  }

  // ---------------------------------------------------------------------------
  // Attributes
  // ---------------------------------------------------------------------------

  addAttributeListener(name: string, listener: AttributeListener<C>): void {
    log.debug(`Adding attribute listener on ${this.describe()}: ${name}`)
    this.attributeListeners.set(name, listener)
  }

  removeAttributeListener(name: string): void {
    this.attributeListeners.delete(name)
  }

  getAttribute(name: string): unknown {
    return this.attributes[name]
  }

  hasAttribute(name: string): boolean {
    return name in this.attributes
  }

  /** A copy of all attributes. */
  getAttributes(): Attributes {
    return { ...this.attributes }
  }

  /**
   * Sets one attribute. When the value differs from the current one,
   * attribute listeners are notified and the container is revalidated,
   * since a changed constraint can change validity.
   */
  setAttribute(name: string, value: unknown): void {
    if (!this.assignAttribute(name, value)) return
    log.debug(`Attribute on ${this.describe()} changed: ${name} = ${String(value)}`)
    this.notifyAttributeListeners(name, value)
    this.revalidate()
  }

  setAttributes(attributes: Attributes): void {
    Object.entries(attributes).forEach(([name, value]) => this.setAttribute(name, value))
  }

  /** @internal Stores an attribute without notifying; returns whether it changed. */
  assignAttribute(name: string, value: unknown): boolean {
    if (name in this.attributes && deepEqual(this.attributes[name], value)) return false
    this.attributes = { ...this.attributes, [name]: value }
    return true
  }

  /**
   * Queues every attribute listener of this container, and of the containers
   * bound to it with attribute syncing, which receive the attribute first.
   */
  notifyAttributeListeners(name: string, value: unknown): void {
    if (!this.notification) return
    const calls = this.collectAttributeNotifications(name, value)
    calls.push(...propagate(this, 'attribute', (link, from) => link.pushAttribute(from, name, value)))
    this.queue.callAll(calls)
  }

  /** @internal */
  collectAttributeNotifications(attribute: string, value: unknown): QueuedCall[] {
    if (!this.notification) return []
    const description = this.describe()
    return [...this.attributeListeners.entries()].map(([listenerName, listener]) => ({
      description: `${listenerName} (${description}, attribute ${attribute})`,
      run: () => {
        if (!this.notification || this.attributeListeners.get(listenerName) !== listener) return
        listener(this.context, attribute, value, this.name)
      }
    }))
  }

  // ---------------------------------------------------------------------------
  // Notification
  // ---------------------------------------------------------------------------

  /**
   * Queues the pre-notify hook, every enabled listener and the post-notify
   * hook, after bringing bound containers in line with this one (their
   * notifications are queued after this container's). Does nothing while
   * notification is disabled.
   *
   * @param includePostNotify Pass false to leave out the post-notify hook;
   *        list containers use this to notify items without re-notifying
   *        the list.
   */
  notify(includePostNotify = true): void {
    if (!this.notification) return
    const calls = this.collectNotifications(includePostNotify)
    calls.push(...propagate(this, 'value', (link, from) => link.pushValue(from)))
    this.queue.callAll(calls)
  }

  /**
   * @internal Builds the queued calls for one notification round. The value
   * and validity are captured now; whether each call still runs (notification
   * enabled, listener registered and enabled, hook unchanged) is decided when
   * the queue reaches it.
   */
  collectNotifications(includePostNotify = true): QueuedCall[] {
    if (!this.notification) return []

    const value = this.get()
    const valid = this.valid
    const description = this.describe()
    const calls: QueuedCall[] = []

    const pre = this.preNotifyFn
    if (pre !== undefined) {
      calls.push({
        description: `PreNotify (${description})`,
        run: () => {
          if (this.notification && this.preNotifyFn === pre) pre(value, valid, this.context, this.name)
        }
      })
    }

    for (const record of this.listeners.values()) {
      if (!record.enabled) continue
      calls.push({
        description: `${record.name} (${description})`,
        run: () => {
          if (!this.notification || this.listeners.get(record.name) !== record || !record.enabled) return
          record.callback(value, valid, this.context, this.name)
        }
      })
    }

    const post = this.postNotifyFn
    if (post !== undefined && includePostNotify) {
      calls.push({
        description: `PostNotify (${description})`,
        run: () => {
          if (this.notification && this.postNotifyFn === post) post(value, valid, this.context, this.name)
        }
      })
    }

    return calls
  }

  // ---------------------------------------------------------------------------
  // Binding links
  // ---------------------------------------------------------------------------

  get links(): ReadonlyMap<string, ContainerLink> {
    return this.linkMap
  }

  /** @internal */
  attachLink(peerId: string, link: ContainerLink): void {
    this.linkMap.set(peerId, link)
  }

  /** @internal */
  detachLink(peerId: string): void {
    this.linkMap.delete(peerId)
  }

  /** @internal */
  getLink(peerId: string): ContainerLink | undefined {
    return this.linkMap.get(peerId)
  }
}

// =============================================================================
// SCALAR CONTAINER
// =============================================================================

/**
 * An observable, validated value.
 *
 * @example
 * ```ts
 * const age = new PropertyValue({
 *   context: owner,
 *   value: 0,
 *   cast: (_ctx, _atts, v) => Math.trunc(v),
 *   validate: (_ctx, atts, v) => { if (v < 0) throw new Error('Must be at least 0') },
 *   allowInvalid: false
 * })
 * age.addListener('log', value => console.log(value))
 * age.set(41.7) // logs 41
 * ```
 */
class PropertyValue<T, C = unknown> extends ObservableContainer<T, C> {
  readonly kind = 'value'
  private value: T
  private readonly castFn: CastFunction<T, C> | undefined
  private readonly validateFn: ValidateFunction<T, C> | undefined
  private readonly equalsFn: EqualityFunction<T>

  constructor(options: PropertyValueOptions<T, C>) {
    super(options, getConfig().idPrefix)
    this.castFn = options.cast
    this.validateFn = options.validate
    this.equalsFn = options.equals ?? strictEqual
    this.value = this.castValue(options.value)
    this.refreshValidity()
  }

  get(): T {
    return this.value
  }

  /**
   * Casts `newValue`, validates it and stores it. Listeners are notified
   * through the queue when the value or its validity changed.
   *
   * @throws CastError if the cast function throws; nothing changes.
   * @throws ValidationError if the value is invalid and `allowInvalid` is
   *         false; nothing changes.
   */
  set(newValue: T): void {
    const value = this.castValue(newValue)
    const { valid, message } = this.check(value)
    const changed = valid !== this.valid || !this.equalsFn(value, this.value)

    if (!changed) {
      this.value = value
      return
    }

    if (!valid && !this.allowInvalid) {
      log.debug(`Rejected invalid value for ${this.describe()}: ${String(value)} (${message ?? ''})`)
      throw new ValidationError(message ?? 'Invalid value', { container: this.name, value })
    }

    log.debug(
      `Value ${this.describe()} changed: ${String(this.value)} -> ${String(value)} ` +
        `(${valid ? 'valid' : `invalid - ${message ?? ''}`})`
    )
    this.value = value
    this.valid = valid
    this.validationMessage = message
    this.notify()
  }

  /**
   * Passes the current value through the cast function again, e.g. after a
   * clamping limit changed.
   */
  recast(): void {
    this.set(this.value)
  }

  /** Compares against a raw value or another container using the equality function. */
  equals(other: T | PropertyValue<T, C>): boolean {
    const value = other instanceof PropertyValue ? other.get() : other
    return this.equalsFn(this.value, value)
  }

  /** The equality function this container compares values with. */
  getEqualityFunction(): EqualityFunction<T> {
    return this.equalsFn
  }

  /**
   * @internal Stores `value` without notifying, bypassing `allowInvalid`;
   * returns whether the value or its validity changed. Used to bring a bound
   * container in line with its peer.
   *
   * @throws CastError if the cast function throws.
   */
  adopt(value: T): boolean {
    const cast = this.castValue(value)
    const { valid, message } = this.check(cast)
    const changed = valid !== this.valid || !this.equalsFn(cast, this.value)
    this.value = cast
    this.valid = valid
    this.validationMessage = message
    return changed
  }

  toString(): string {
    return `PV(${String(this.value)})`
  }

  protected computeValidity(): Validity {
    return this.check(this.value)
  }

  private castValue(value: T): T {
    if (this.castFn === undefined) return value
    try {
      return this.castFn(this.context, this.attributes, value)
    } catch (error) {
      throw new CastError(`Cannot cast ${String(value)} for ${this.describe()}: ${errorMessage(error)}`, error, {
        container: this.name
      })
    }
  }

  private check(value: T): Validity {
    if (this.validateFn === undefined) return { valid: true }
    try {
      this.validateFn(this.context, this.attributes, value)
      return { valid: true }
    } catch (error) {
      return { valid: false, message: errorMessage(error) }
    }
  }
}

export {
  ObservableContainer,
  PropertyValue,
  propagate,
  type Attributes,
  type CastFunction,
  type ValidateFunction,
  type EqualityFunction,
  type Listener,
  type AttributeListener,
  type ListenerRecord,
  type Validity,
  type LinkedContainer,
  type ContainerView,
  type AnyPropertyValue,
  type AnyPropertyValueList,
  type AnyContainer,
  type ContainerLink,
  type LinkFlags,
  type ContainerOptions,
  type PropertyValueOptions
}

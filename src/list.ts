/**
 * List Container
 * ==============
 *
 * `PropertyValueList` is an observable sequence whose items are themselves
 * `PropertyValue` containers. Item listeners only hear about their own item;
 * list listeners hear about every structural change (insert, remove, move,
 * reorder) and every item value change, once per operation.
 *
 * Operations that only reassign existing items (`set`, `setSlice`,
 * `setItem`) keep the length fixed. Reordering moves the existing item
 * containers, so listeners registered on an item survive it.
 */

import { log } from './config'
import { strictEqual } from './equality'
import {
  CastError,
  IndexError,
  InvalidOrderError,
  LengthMismatchError,
  ValidationError,
  ValueNotFoundError,
  errorMessage
} from './errors'
import {
  ObservableContainer,
  PropertyValue,
  type AttributeListener,
  type Attributes,
  type CastFunction,
  type ContainerOptions,
  type EqualityFunction,
  type Listener,
  type ValidateFunction,
  type Validity
} from './value'

// =============================================================================
// TYPES
// =============================================================================

interface PropertyValueListOptions<T, C> extends ContainerOptions<PropertyValueList<T, C>, C> {
  values?: readonly T[]
  itemCast?: CastFunction<T, C>
  itemValidate?: ValidateFunction<T, C>
  itemEquals?: EqualityFunction<T>
  itemAllowInvalid?: boolean
  itemAttributes?: Attributes
  /** Validates the list as a whole, receiving the plain item values. */
  listValidate?: ValidateFunction<readonly T[], C>
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

class PropertyValueList<T, C = unknown> extends ObservableContainer<PropertyValueList<T, C>, C> {
  readonly kind = 'list'
  private items: PropertyValue<T, C>[] = []
  private readonly itemCast: CastFunction<T, C> | undefined
  private readonly itemValidate: ValidateFunction<T, C> | undefined
  private readonly itemEquals: EqualityFunction<T>
  private readonly itemAllowInvalid: boolean
  private readonly itemAttributes: Attributes
  private readonly listValidate: ValidateFunction<readonly T[], C> | undefined

  /** Post-notify hook installed on every item: an item change is a list change. */
  private readonly itemChanged: Listener<T, C> = () => {
    this.refreshValidity()
    this.notify()
  }

  /** Item attribute changes are reported to list-level attribute listeners. */
  private readonly itemAttributeChanged: AttributeListener<C> = (_context, attribute, value) => {
    this.queue.callAll(this.collectAttributeNotifications(attribute, value))
  }

  constructor(options: PropertyValueListOptions<T, C>) {
    super(options, 'PropertyValueList')
    this.itemCast = options.itemCast
    this.itemValidate = options.itemValidate
    this.itemEquals = options.itemEquals ?? strictEqual
    this.itemAllowInvalid = options.itemAllowInvalid ?? true
    this.itemAttributes = { ...options.itemAttributes }
    this.listValidate = options.listValidate
    this.items = (options.values ?? []).map(value => this.createItem(value))
    this.refreshValidity()
  }

  // ---------------------------------------------------------------------------
  // Reading
  // ---------------------------------------------------------------------------

  /** The list itself; it is the user-facing handle on the sequence. */
  get(): PropertyValueList<T, C> {
    return this
  }

  get length(): number {
    return this.items.length
  }

  /** A plain array of the item values. */
  values(): T[] {
    return this.items.map(item => item.get())
  }

  /**
   * The value at `index`; negative indices count from the end.
   *
   * @throws IndexError
   */
  at(index: number): T {
    return this.items[this.normaliseIndex(index)].get()
  }

  /**
   * Position of the first item equal to `value`.
   *
   * @throws ValueNotFoundError
   */
  index(value: T): number {
    const position = this.items.findIndex(item => this.itemEquals(item.get(), value))
    if (position < 0) {
      throw new ValueNotFoundError(`${String(value)} is not in ${this.describe()}`, { container: this.name })
    }
    return position
  }

  count(value: T): number {
    return this.items.filter(item => this.itemEquals(item.get(), value)).length
  }

  includes(value: T): boolean {
    return this.items.some(item => this.itemEquals(item.get(), value))
  }

  /**
   * A copy of the item containers. Listeners may be registered on the
   * items; changing the returned array does not change the list.
   */
  getPropertyValueList(): PropertyValue<T, C>[] {
    return [...this.items]
  }

  /** Element-wise comparison using the item equality function. */
  equals(other: readonly T[] | PropertyValueList<T, C>): boolean {
    const values = other instanceof PropertyValueList ? other.values() : other
    if (values.length !== this.items.length) return false
    return this.items.every((item, i) => this.itemEquals(item.get(), values[i]))
  }

  [Symbol.iterator](): Iterator<T> {
    return this.values()[Symbol.iterator]()
  }

  toString(): string {
    return `[${this.values().map(value => String(value)).join(', ')}]`
  }

  // ---------------------------------------------------------------------------
  // Reassigning existing items
  // ---------------------------------------------------------------------------

  /**
   * Assigns every item at once. Each item is cast and validated by its own
   * rules; the list is notified once, then the items whose value changed.
   *
   * @throws LengthMismatchError if `values` has a different length.
   */
  set(values: readonly T[]): void {
    if (values.length !== this.items.length) {
      throw new LengthMismatchError(
        `Lengths don't match: ${this.describe()} has ${this.items.length} items, got ${values.length}`,
        { container: this.name }
      )
    }
    this.assign(0, values)
  }

  /** Assigns one item. */
  setItem(index: number, value: T): void {
    this.assign(this.normaliseIndex(index), [value])
  }

  /**
   * Slice assignment: replaces the items in `[start, end)` with `values`.
   *
   * @throws LengthMismatchError if the slice and `values` differ in length.
   */
  setSlice(start: number, end: number, values: readonly T[]): void {
    const from = this.clampIndex(start)
    const to = Math.max(from, this.clampIndex(end))
    if (to - from !== values.length) {
      throw new LengthMismatchError(
        `Slice assignment of ${values.length} values to a slice of length ${to - from} would change the length of ${this.describe()}`,
        { container: this.name }
      )
    }
    this.assign(from, values)
  }

  private assign(start: number, values: readonly T[]): void {
    if (values.length === 0) return

    if (!this.allowInvalid) {
      const prospective = this.values()
      values.forEach((value, i) => {
        prospective[start + i] = this.castItem(this.items[start + i], value)
      })
      this.rejectIfInvalid(prospective)
    }

    const changed: PropertyValue<T, C>[] = []
    try {
      values.forEach((value, i) => {
        const item = this.items[start + i]
        const before = item.get()
        const state = item.getNotificationState()
        item.disableNotification()
        try {
          item.set(value)
        } finally {
          item.setNotificationState(state)
        }
        if (!this.itemEquals(item.get(), before)) changed.push(item)
      })
    } finally {
      const validityChanged = this.refreshValidity()
      if (changed.length > 0 || validityChanged) {
        log.debug(`Notifying list-level listeners (${this.describe()})`)
        this.notify()
        changed.forEach(item => item.notify(false))
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Structural changes
  // ---------------------------------------------------------------------------

  insert(index: number, value: T): void {
    this.insertAll(index, [value])
  }

  insertAll(index: number, values: readonly T[]): void {
    const next = [...this.items]
    next.splice(this.clampIndex(index), 0, ...values.map(value => this.createItem(value)))
    this.commit(next)
  }

  append(value: T): void {
    this.insertAll(this.items.length, [value])
  }

  extend(values: Iterable<T>): void {
    this.insertAll(this.items.length, [...values])
  }

  /**
   * Removes and returns the value at `index` (the last item by default).
   *
   * @throws IndexError
   */
  pop(index = -1): T {
    const position = this.normaliseIndex(index)
    const next = [...this.items]
    const [popped] = next.splice(position, 1)
    this.commit(next)
    return popped.get()
  }

  /**
   * Removes the first item equal to `value`.
   *
   * @throws ValueNotFoundError
   */
  remove(value: T): void {
    this.pop(this.index(value))
  }

  /**
   * Removes one matching item per value in `values`, in a single change.
   *
   * @throws ValueNotFoundError if any value has no remaining match; the list
   *         is left untouched.
   */
  removeAll(values: Iterable<T>): void {
    const next = [...this.items]
    for (const value of values) {
      const position = next.findIndex(item => this.itemEquals(item.get(), value))
      if (position < 0) {
        throw new ValueNotFoundError(`${String(value)} is not in ${this.describe()}`, { container: this.name })
      }
      next.splice(position, 1)
    }
    this.commit(next)
  }

  /** Moves the item at `from` so that it ends up at `to`. */
  move(from: number, to: number): void {
    const source = this.normaliseIndex(from)
    const next = [...this.items]
    const [item] = next.splice(source, 1)
    next.splice(this.clampIndex(to, next.length), 0, item)
    this.commit(next)
  }

  /**
   * Rearranges the items so that position `i` holds the item previously at
   * `order[i]`.
   *
   * @throws InvalidOrderError unless `order` is a permutation of the indices.
   */
  reorder(order: readonly number[]): void {
    const n = this.items.length
    const seen = new Set(order)
    const isPermutation =
      order.length === n && seen.size === n && order.every(i => Number.isInteger(i) && i >= 0 && i < n)
    if (!isPermutation) {
      throw new InvalidOrderError(`Indices [${order.join(', ')}] must cover the list range [0..${n - 1}]`, {
        container: this.name
      })
    }
    if (order.every((i, position) => i === position)) return
    this.commit(order.map(i => this.items[i]))
  }

  // ---------------------------------------------------------------------------
  // Internals shared with the binding layer
  // ---------------------------------------------------------------------------

  /**
   * @internal Wraps `value` in a new item container configured with this
   * list's item functions and attributes.
   *
   * @throws ValidationError if items may not be invalid and `value` is.
   */
  createItem(value: T): PropertyValue<T, C> {
    const item = new PropertyValue<T, C>({
      context: this.context,
      name: `${this.name}_Item`,
      value,
      cast: this.itemCast,
      validate: this.itemValidate,
      equals: this.itemEquals,
      allowInvalid: this.itemAllowInvalid,
      attributes: this.itemAttributes,
      postNotify: this.itemChanged,
      queue: this.queue
    })
    if (!this.itemAllowInvalid && !item.isValid()) {
      throw new ValidationError(item.getValidationMessage() ?? 'Invalid value', { container: this.name, value })
    }
    item.addAttributeListener(this.name, this.itemAttributeChanged)
    return item
  }

  /**
   * @internal Installs `next` as the item sequence without notifying;
   * returns whether the sequence or the list validity changed.
   */
  adoptItems(next: PropertyValue<T, C>[]): boolean {
    const structural = !this.sameSequence(next)
    this.items.filter(item => !next.includes(item)).forEach(item => this.releaseItem(item))
    this.items = next
    const validityChanged = this.refreshValidity()
    return structural || validityChanged
  }

  /** @internal */
  getItemEquality(): EqualityFunction<T> {
    return this.itemEquals
  }

  protected computeValidity(): Validity {
    return this.validityOf(this.values())
  }

  private commit(next: PropertyValue<T, C>[]): void {
    if (!this.allowInvalid) this.rejectIfInvalid(next.map(item => item.get()))
    if (this.adoptItems(next)) {
      log.debug(`List ${this.describe()} changed: ${this.toString()}`)
      this.notify()
    }
  }

  private rejectIfInvalid(values: readonly T[]): void {
    const { valid, message } = this.validityOf(values)
    if (!valid) throw new ValidationError(message ?? 'Invalid list', { container: this.name })
  }

  private validityOf(values: readonly T[]): Validity {
    if (this.listValidate === undefined) return { valid: true }
    try {
      this.listValidate(this.context, this.attributes, values)
      return { valid: true }
    } catch (error) {
      return { valid: false, message: errorMessage(error) }
    }
  }

  /** Detaches a removed item so that it no longer reports to the list. */
  private releaseItem(item: PropertyValue<T, C>): void {
    item.setPostNotifyFunction(undefined)
    item.removeAttributeListener(this.name)
  }

  private castItem(item: PropertyValue<T, C>, value: T): T {
    if (this.itemCast === undefined) return value
    try {
      return this.itemCast(this.context, item.getAttributes(), value)
    } catch (error) {
      throw new CastError(`Cannot cast ${String(value)} for ${this.describe()}: ${errorMessage(error)}`, error, {
        container: this.name
      })
    }
  }

  private sameSequence(next: readonly PropertyValue<T, C>[]): boolean {
    return next.length === this.items.length && next.every((item, i) => item === this.items[i])
  }

  /** Resolves a negative index and checks the range. */
  private normaliseIndex(index: number): number {
    const position = index < 0 ? this.items.length + index : index
    if (!Number.isInteger(position) || position < 0 || position >= this.items.length) {
      throw new IndexError(`Index ${index} is out of range for ${this.describe()} (length ${this.items.length})`, {
        container: this.name
      })
    }
    return position
  }

  /** Insertion-style index: negative counts from the end, then clamped to `[0, length]`. */
  private clampIndex(index: number, length = this.items.length): number {
    const position = index < 0 ? length + index : index
    return Math.min(Math.max(position, 0), length)
  }
}

export { PropertyValueList, type PropertyValueListOptions }

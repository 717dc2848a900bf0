/**
 * Property Declarations
 * =====================
 *
 * Factories describing the kinds of property an owner can carry. A
 * declaration is a plain object: its default value, its default constraints
 * (stored on the container as attributes, so they can be changed per
 * owner), and the cast, validate and equality rules handed to the container.
 * It also knows how to turn a value into a string and back, which
 * `serialise.ts` and `cli.ts` rely on.
 *
 * ```ts
 * const schema = {
 *   visible: Bool({ default: true }),
 *   zoom:    Real({ minval: 0.5, maxval: 8, clamped: true, default: 1 }),
 *   mode:    Choice(['fast', 'accurate']),
 *   range:   Bounds({ ndims: 2 })
 * }
 * ```
 */

import { deepEqual, strictEqual } from './equality'
import { IndexError, PropertyError } from './errors'
import type { PropertyValueList } from './list'
import type { Attributes, PropertyValue } from './value'

// =============================================================================
// TYPES
// =============================================================================

/** What containers created for an owner receive as their context. */
interface PropertyContext {
  readonly label: string
  /** The plain value of another property on the same owner. */
  getValue(name: string): unknown
}

type ValueType = 'boolean' | 'int' | 'real' | 'string' | 'choice' | 'colour'
type ListType = 'list' | 'bounds' | 'point'

/** `true`/`false`, or a predicate on the owner (e.g. another property's value). */
type Requirement = boolean | ((owner: PropertyContext) => boolean)

/** Return false to mark `value` invalid. */
type CustomValidator<T> = (owner: PropertyContext, attributes: Readonly<Attributes>, value: T) => boolean

interface CommonOptions<T> {
  default?: T
  required?: Requirement
  validateFn?: CustomValidator<T>
  allowInvalid?: boolean
}

/**
 * A scalar property declaration. Its rules are declared as methods so that a
 * `ValueDecl<number>` can sit in a schema next to a `ValueDecl<string>`.
 */
interface ValueDecl<T> {
  readonly kind: 'value'
  readonly type: ValueType
  readonly defaultValue: T
  readonly allowInvalid: boolean
  readonly constraints: Readonly<Attributes>
  cast(owner: PropertyContext, attributes: Readonly<Attributes>, value: T): T
  validate(owner: PropertyContext, attributes: Readonly<Attributes>, value: T): void
  equals(a: T, b: T): boolean
  parse(text: string): T
  format(value: T): string
}

/** A list property declaration; `item` describes every element. */
interface ListDecl<T> {
  readonly kind: 'list'
  readonly type: ListType
  readonly item: ValueDecl<T>
  readonly defaultValue: readonly T[]
  readonly allowInvalid: boolean
  readonly constraints: Readonly<Attributes>
  validate(owner: PropertyContext, attributes: Readonly<Attributes>, values: readonly T[]): void
}

type PropertyDecl = ValueDecl<unknown> | ListDecl<unknown>

type PropertySchema = Record<string, PropertyDecl>

type PropertyName<S extends PropertySchema> = keyof S & string

/** The plain value an owner's `get()` returns for a declaration. */
type ValueOf<D> = D extends ListDecl<infer T> ? T[] : D extends ValueDecl<infer T> ? T : never

/** The container an owner creates for a declaration. */
type ContainerOf<D> = D extends ListDecl<infer T>
  ? PropertyValueList<T, PropertyContext>
  : D extends ValueDecl<infer T>
    ? PropertyValue<T, PropertyContext>
    : never

type RGB = readonly [number, number, number]

const AXES = ['x', 'y', 'z', 't'] as const

type AxisName = (typeof AXES)[number]

/** An axis index, or its name. */
type Axis = number | AxisName

// =============================================================================
// SHARED RULES
// =============================================================================

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === ''
}

/** The checks every declaration applies: `required`, then `validateFn`. */
function checkCommon<T>(options: CommonOptions<T>, owner: PropertyContext, attributes: Readonly<Attributes>, value: T): void {
  const required = options.required ?? false
  if (isAbsent(value) && (typeof required === 'boolean' ? required : required(owner))) {
    throw new Error('A value is required')
  }
  if (options.validateFn !== undefined && !options.validateFn(owner, attributes, value)) {
    throw new Error('Value does not meet custom validation rules')
  }
}

function numberAttribute(attributes: Readonly<Attributes>, name: string): number | undefined {
  const value = attributes[name]
  return typeof value === 'number' ? value : undefined
}

function toNumber(value: unknown): number {
  const number = typeof value === 'string' ? Number(value.trim()) : Number(value)
  if (!Number.isFinite(number) || (typeof value === 'string' && value.trim() === '')) {
    throw new Error(`${String(value)} is not a number`)
  }
  return number
}

// =============================================================================
// BOOLEAN
// =============================================================================

function parseBoolean(text: string): boolean {
  const lower = text.trim().toLowerCase()
  return lower !== '' && lower !== 'false' && lower !== '0'
}

function Bool(options: CommonOptions<boolean> = {}): ValueDecl<boolean> {
  return {
    kind: 'value',
    type: 'boolean',
    defaultValue: options.default ?? false,
    allowInvalid: options.allowInvalid ?? true,
    constraints: {},
    cast: (_owner, _attributes, value) => (typeof value === 'string' ? parseBoolean(value) : Boolean(value)),
    validate: (owner, attributes, value) => checkCommon(options, owner, attributes, value),
    equals: strictEqual,
    parse: parseBoolean,
    format: value => String(value)
  }
}

// =============================================================================
// NUMBERS
// =============================================================================

interface NumberOptions extends CommonOptions<number> {
  minval?: number
  maxval?: number
  /** Clamp values into `[minval, maxval]` instead of marking them invalid. */
  clamped?: boolean
  /** Let widgets edit `minval`/`maxval`. */
  editLimits?: boolean
}

interface RealOptions extends NumberOptions {
  /** Values closer than this are equal. */
  precision?: number
}

function defaultNumber(options: NumberOptions): number {
  const { minval, maxval } = options
  if (options.default !== undefined) return options.default
  if (minval !== undefined && maxval !== undefined) return (minval + maxval) / 2
  return minval ?? maxval ?? 0
}

function numberDecl(
  type: 'int' | 'real',
  options: NumberOptions,
  convert: (value: number) => number,
  equals: (a: number, b: number) => boolean
): ValueDecl<number> {
  return {
    kind: 'value',
    type,
    defaultValue: defaultNumber(options),
    allowInvalid: options.allowInvalid ?? true,
    constraints: {
      minval: options.minval,
      maxval: options.maxval,
      clamped: options.clamped ?? false,
      editLimits: options.editLimits ?? false
    },
    cast: (_owner, attributes, value) => {
      const number = convert(toNumber(value))
      if (attributes.clamped !== true) return number
      const minval = numberAttribute(attributes, 'minval')
      const maxval = numberAttribute(attributes, 'maxval')
      if (minval !== undefined && number < minval) return minval
      if (maxval !== undefined && number > maxval) return maxval
      return number
    },
    validate: (owner, attributes, value) => {
      checkCommon(options, owner, attributes, value)
      const minval = numberAttribute(attributes, 'minval')
      const maxval = numberAttribute(attributes, 'maxval')
      if (minval !== undefined && value < minval) throw new Error(`Must be at least ${minval}`)
      if (maxval !== undefined && value > maxval) throw new Error(`Must be at most ${maxval}`)
    },
    equals,
    parse: text => convert(toNumber(text)),
    format: value => String(value)
  }
}

function Int(options: NumberOptions = {}): ValueDecl<number> {
  return numberDecl('int', options, Math.trunc, strictEqual)
}

function Real(options: RealOptions = {}): ValueDecl<number> {
  const precision = options.precision ?? 1e-9
  return numberDecl('real', options, value => value, (a, b) => Math.abs(a - b) < precision)
}

/** A `Real` limited to `[0, 100]` by default, starting at 50. */
function Percentage(options: RealOptions = {}): ValueDecl<number> {
  return Real({ ...options, minval: options.minval ?? 0, maxval: options.maxval ?? 100, default: options.default ?? 50 })
}

// =============================================================================
// STRINGS AND CHOICES
// =============================================================================

interface StringOptions extends CommonOptions<string> {
  minlen?: number
  maxlen?: number
}

function Str(options: StringOptions = {}): ValueDecl<string> {
  return {
    kind: 'value',
    type: 'string',
    defaultValue: options.default ?? '',
    allowInvalid: options.allowInvalid ?? true,
    constraints: { minlen: options.minlen, maxlen: options.maxlen },
    cast: (_owner, _attributes, value) => (isAbsent(value) ? '' : String(value)),
    validate: (owner, attributes, value) => {
      checkCommon(options, owner, attributes, value)
      if (value === '') return
      const minlen = numberAttribute(attributes, 'minlen')
      const maxlen = numberAttribute(attributes, 'maxlen')
      if (minlen !== undefined && value.length < minlen) throw new Error(`Must have length at least ${minlen}`)
      if (maxlen !== undefined && value.length > maxlen) throw new Error(`Must have length at most ${maxlen}`)
    },
    equals: strictEqual,
    parse: text => text,
    format: value => value
  }
}

interface ChoiceOptions extends CommonOptions<string> {
  labels?: readonly string[]
}

/** Reads a constraint holding a list of strings. */
function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  return value.filter((item): item is string => typeof item === 'string')
}

/** Reads the `choiceEnabled` constraint. */
function enabledFlags(value: unknown): Record<string, boolean> {
  const flags: Record<string, boolean> = {}
  if (typeof value !== 'object' || value === null) return flags
  for (const [choice, enabled] of Object.entries(value)) flags[choice] = enabled === true
  return flags
}

/**
 * A string restricted to a set of choices, each of which can be disabled.
 * Pass a record to give choices (keys) and labels (values) together.
 */
function Choice(choices: readonly string[] | Readonly<Record<string, string>> = [], options: ChoiceOptions = {}): ValueDecl<string> {
  const values = Array.isArray(choices) ? [...choices] : Object.keys(choices)
  const labels = options.labels ?? (Array.isArray(choices) ? values : Object.values(choices))
  if (labels.length !== values.length) {
    throw new PropertyError('A label is required for every choice', 'INVALID_DECLARATION')
  }

  return {
    kind: 'value',
    type: 'choice',
    defaultValue: options.default ?? values[0] ?? '',
    allowInvalid: options.allowInvalid ?? true,
    constraints: {
      choices: values,
      labels: [...labels],
      choiceEnabled: Object.fromEntries(values.map(choice => [choice, true]))
    },
    cast: (_owner, _attributes, value) => (isAbsent(value) ? '' : String(value)),
    validate: (owner, attributes, value) => {
      checkCommon(options, owner, attributes, value)
      const known = stringList(attributes.choices)
      if (known.length === 0 || value === '') return
      if (!known.includes(value)) throw new Error(`Invalid choice (${value})`)
      if (enabledFlags(attributes.choiceEnabled)[value] === false) throw new Error(`Choice is disabled (${value})`)
    },
    equals: strictEqual,
    parse: text => text,
    format: value => value
  }
}

// =============================================================================
// COLOURS
// =============================================================================

function clampUnit(value: number): number {
  return Math.min(Math.max(value, 0), 1)
}

function toRGB(value: readonly unknown[]): RGB {
  if (value.length < 3) throw new Error('Colour must be a sequence of three values')
  const [r, g, b] = value.slice(0, 3).map(channel => clampUnit(toNumber(channel)))
  return [r, g, b]
}

/** `#rrggbb` (or `#rgb`) to channels in `[0, 1]`. */
function parseColour(text: string): RGB {
  const hex = text.trim().replace(/^#/, '')
  const full = hex.length === 3 ? [...hex].map(digit => digit + digit).join('') : hex
  if (!/^[0-9a-fA-F]{6}$/.test(full)) throw new Error(`${text} is not a colour`)
  return toRGB([0, 2, 4].map(offset => parseInt(full.slice(offset, offset + 2), 16) / 255))
}

function formatColour(value: RGB): string {
  return '#' + value.map(channel => Math.round(clampUnit(channel) * 255).toString(16).padStart(2, '0')).join('')
}

/** An RGB colour, each channel in `[0, 1]`. White by default. */
function Colour(options: CommonOptions<RGB> = {}): ValueDecl<RGB> {
  return {
    kind: 'value',
    type: 'colour',
    defaultValue: options.default ?? [1, 1, 1],
    allowInvalid: options.allowInvalid ?? true,
    constraints: {},
    cast: (_owner, _attributes, value) => (typeof value === 'string' ? parseColour(value) : toRGB(value)),
    validate: (owner, attributes, value) => {
      checkCommon(options, owner, attributes, value)
      if (value.some(channel => channel < 0 || channel > 1)) throw new Error('Colour values must be between 0.0 and 1.0')
    },
    equals: deepEqual,
    parse: parseColour,
    format: formatColour
  }
}

// =============================================================================
// LISTS
// =============================================================================

interface ListOptions<T> {
  default?: readonly T[]
  minlen?: number
  maxlen?: number
  validateFn?: CustomValidator<readonly T[]>
  allowInvalid?: boolean
}

function checkLength(attributes: Readonly<Attributes>, values: readonly unknown[]): void {
  const minlen = numberAttribute(attributes, 'minlen')
  const maxlen = numberAttribute(attributes, 'maxlen')
  if (minlen !== undefined && values.length < minlen) throw new Error(`Must have length at least ${minlen}`)
  if (maxlen !== undefined && values.length > maxlen) throw new Error(`Must have length at most ${maxlen}`)
}

function listDecl<T>(
  type: ListType,
  item: ValueDecl<T>,
  options: ListOptions<T>,
  constraints: Attributes,
  check?: (attributes: Readonly<Attributes>, values: readonly T[]) => void
): ListDecl<T> {
  return {
    kind: 'list',
    type,
    item,
    defaultValue: options.default ?? [],
    allowInvalid: options.allowInvalid ?? true,
    constraints: { minlen: options.minlen, maxlen: options.maxlen, ...constraints },
    validate: (owner, attributes, values) => {
      checkLength(attributes, values)
      if (options.validateFn !== undefined && !options.validateFn(owner, attributes, values)) {
        throw new Error('Value does not meet custom validation rules')
      }
      check?.(attributes, values)
    }
  }
}

/** A list whose items follow `item`'s rules. */
function List<T>(item: ValueDecl<T>, options: ListOptions<T> = {}): ListDecl<T> {
  return listDecl('list', item, options, {})
}

interface BoundsOptions extends ListOptions<number> {
  /** One to four dimensions; fixed per declaration. */
  ndims?: number
  /** Store reals (default) or ints. */
  real?: boolean
  /** Minimum distance kept between each low and high value. */
  minDistance?: number
  editLimits?: boolean
  /** One label per value, `2 * ndims` in all. */
  labels?: readonly string[]
}

function checkDimensions(ndims: number, values: readonly unknown[], expected: number, labels?: readonly string[]): void {
  if (!Number.isInteger(ndims) || ndims < 1 || ndims > 4) {
    throw new PropertyError('Only one to four dimensions are supported', 'INVALID_DECLARATION')
  }
  if (values.length !== expected) {
    throw new PropertyError(`${expected} values are required`, 'INVALID_DECLARATION')
  }
  if (labels !== undefined && labels.length !== expected) {
    throw new PropertyError('A label for each value is required', 'INVALID_DECLARATION')
  }
}

/**
 * Numeric `(lo, hi)` pairs in up to four dimensions, stored flat:
 * `[xlo, xhi, ylo, yhi, ...]`. Items are clamped to their own `minval` and
 * `maxval`, which `BoundsValue.setLimits` sets for both ends of an axis.
 */
function Bounds(options: BoundsOptions = {}): ListDecl<number> {
  const ndims = options.ndims ?? 1
  const minDistance = options.minDistance ?? 0
  const defaults = options.default ?? Array.from({ length: ndims }, () => [0, minDistance]).flat()
  checkDimensions(ndims, defaults, ndims * 2, options.labels)

  const editLimits = options.editLimits ?? false
  const item = options.real === false ? Int({ clamped: true, editLimits }) : Real({ clamped: true, editLimits })

  return listDecl(
    'bounds',
    item,
    { ...options, default: defaults, minlen: ndims * 2, maxlen: ndims * 2 },
    { ndims, minDistance, editLimits, labels: options.labels },
    (attributes, values) => {
      const distance = numberAttribute(attributes, 'minDistance') ?? 0
      for (let axis = 0; axis < values.length / 2; axis++) {
        const lo = values[axis * 2]
        const hi = values[axis * 2 + 1]
        if (lo > hi) {
          throw new Error(`Minimum bound must be smaller than maximum bound (dimension ${axis}, ${lo} - ${hi})`)
        }
        if (hi - lo < distance) throw new Error(`Minimum and maximum bounds must be at least ${distance} apart`)
      }
    }
  )
}

interface PointOptions extends ListOptions<number> {
  ndims?: number
  real?: boolean
  editLimits?: boolean
  labels?: readonly string[]
}

/** A point in one to four dimensions, one value per axis. */
function Point(options: PointOptions = {}): ListDecl<number> {
  const ndims = options.ndims ?? 2
  const defaults = options.default ?? Array.from({ length: ndims }, () => 0)
  checkDimensions(ndims, defaults, ndims, options.labels)

  const editLimits = options.editLimits ?? false
  const item = options.real === false ? Int({ clamped: true, editLimits }) : Real({ clamped: true, editLimits })

  return listDecl(
    'point',
    item,
    { ...options, default: defaults, minlen: ndims, maxlen: ndims },
    { ndims, editLimits, labels: options.labels }
  )
}

// =============================================================================
// AXIS ACCESSORS
// =============================================================================

function axisIndex(axis: Axis): number {
  return typeof axis === 'number' ? axis : AXES.indexOf(axis)
}

/**
 * Axis-wise access to a bounds list, whose items are stored as
 * `[lo0, hi0, lo1, hi1, ...]`.
 *
 * @example
 * ```ts
 * const range = new BoundsValue(owner.getPropVal('range'))
 * range.setRange('y', 10, 20)
 * range.getLen('y') // 10
 * ```
 */
class BoundsValue<C = unknown> {
  constructor(readonly list: PropertyValueList<number, C>) {}

  get ndims(): number {
    return this.list.length / 2
  }

  getLo(axis: Axis): number {
    return this.list.at(this.position(axis))
  }

  getHi(axis: Axis): number {
    return this.list.at(this.position(axis) + 1)
  }

  getRange(axis: Axis): [number, number] {
    return [this.getLo(axis), this.getHi(axis)]
  }

  getLen(axis: Axis): number {
    return Math.abs(this.getHi(axis) - this.getLo(axis))
  }

  setLo(axis: Axis, value: number): void {
    this.list.setItem(this.position(axis), value)
  }

  setHi(axis: Axis, value: number): void {
    this.list.setItem(this.position(axis) + 1, value)
  }

  /** Sets both ends in one change. */
  setRange(axis: Axis, lo: number, hi: number): void {
    const position = this.position(axis)
    this.list.setSlice(position, position + 2, [lo, hi])
  }

  getMin(axis: Axis): number | undefined {
    return this.limit(this.position(axis), 'minval')
  }

  getMax(axis: Axis): number | undefined {
    return this.limit(this.position(axis) + 1, 'maxval')
  }

  setMin(axis: Axis, value: number): void {
    this.items(axis).forEach(item => item.setAttribute('minval', value))
  }

  setMax(axis: Axis, value: number): void {
    this.items(axis).forEach(item => item.setAttribute('maxval', value))
  }

  getLimits(axis: Axis): [number | undefined, number | undefined] {
    return [this.getMin(axis), this.getMax(axis)]
  }

  setLimits(axis: Axis, minval: number, maxval: number): void {
    this.setMin(axis, minval)
    this.setMax(axis, maxval)
  }

  private position(axis: Axis): number {
    const index = axisIndex(axis)
    if (index < 0 || index >= this.ndims) {
      throw new IndexError(`Axis ${axis} is out of range for ${this.list.describe()} (${this.ndims} dimensions)`)
    }
    return index * 2
  }

  private items(axis: Axis): PropertyValue<number, C>[] {
    const position = this.position(axis)
    return this.list.getPropertyValueList().slice(position, position + 2)
  }

  private limit(position: number, attribute: string): number | undefined {
    const value = this.list.getPropertyValueList()[position].getAttribute(attribute)
    return typeof value === 'number' ? value : undefined
  }
}

/** Axis-wise access to a point list. */
class PointValue<C = unknown> {
  constructor(readonly list: PropertyValueList<number, C>) {}

  get ndims(): number {
    return this.list.length
  }

  getAxis(axis: Axis): number {
    return this.list.at(this.position(axis))
  }

  setAxis(axis: Axis, value: number): void {
    this.list.setItem(this.position(axis), value)
  }

  getMin(axis: Axis): number | undefined {
    return this.limit(axis, 'minval')
  }

  getMax(axis: Axis): number | undefined {
    return this.limit(axis, 'maxval')
  }

  setMin(axis: Axis, value: number): void {
    this.item(axis).setAttribute('minval', value)
  }

  setMax(axis: Axis, value: number): void {
    this.item(axis).setAttribute('maxval', value)
  }

  getLimits(axis: Axis): [number | undefined, number | undefined] {
    return [this.getMin(axis), this.getMax(axis)]
  }

  setLimits(axis: Axis, minval: number, maxval: number): void {
    this.setMin(axis, minval)
    this.setMax(axis, maxval)
  }

  private position(axis: Axis): number {
    const index = axisIndex(axis)
    if (index < 0 || index >= this.ndims) {
      throw new IndexError(`Axis ${axis} is out of range for ${this.list.describe()} (${this.ndims} dimensions)`)
    }
    return index
  }

  private item(axis: Axis): PropertyValue<number, C> {
    return this.list.getPropertyValueList()[this.position(axis)]
  }

  private limit(axis: Axis, attribute: string): number | undefined {
    const value = this.item(axis).getAttribute(attribute)
    return typeof value === 'number' ? value : undefined
  }
}

export {
  Bool,
  Int,
  Real,
  Percentage,
  Str,
  Choice,
  Colour,
  List,
  Bounds,
  Point,
  BoundsValue,
  PointValue,
  AXES,
  stringList,
  enabledFlags,
  parseColour,
  formatColour,
  type PropertyContext,
  type ValueType,
  type ListType,
  type Requirement,
  type CustomValidator,
  type CommonOptions,
  type NumberOptions,
  type RealOptions,
  type StringOptions,
  type ChoiceOptions,
  type ListOptions,
  type BoundsOptions,
  type PointOptions,
  type ValueDecl,
  type ListDecl,
  type PropertyDecl,
  type PropertySchema,
  type PropertyName,
  type ValueOf,
  type ContainerOf,
  type RGB,
  type AxisName,
  type Axis
}

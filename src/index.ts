/**
 * propvalue: Observable, Validated Properties
 * ============================================
 *
 * Typed properties declared on owner objects. Each property lives in a
 * container that casts and validates what it is given, notifies named
 * listeners through a FIFO notification queue, and can be bound to
 * containers on other owners, including along a parent/child sync
 * hierarchy.
 *
 * - Notification queue with flat, ordered dispatch
 * - Scalar and list containers with attributes (constraints)
 * - Two-way bindings with identity-correlated list items
 * - Parent/child sync hierarchy driven by boolean sync flags
 * - Declarations: booleans, numbers, strings, choices, colours, lists,
 *   bounds and points
 * - String serialisation and command-line options
 *
 * Widgets for lit-html live in the `propvalue/lit` entry point.
 *
 * @license MIT
 */

export {
  configure,
  getConfig,
  resetConfig,
  type Logger,
  type PropsConfig
} from './config'

export {
  PropertyError,
  CastError,
  ValidationError,
  DuplicateNameError,
  LengthMismatchError,
  ValueNotFoundError,
  InvalidOrderError,
  IllegalSyncError,
  IndexError,
  UnknownPropertyError,
  type ErrorDetails
} from './errors'

export { NotificationQueue, defaultQueue, type QueuedCall, type NotificationQueueOptions } from './queue'

export {
  withNotificationQueue,
  setNotificationQueue,
  resetNotificationQueue,
  tryUseNotificationQueue,
  useNotificationQueue
} from './ergonomic'

export { strictEqual, deepEqual } from './equality'

export {
  PropertyValue,
  type Attributes,
  type CastFunction,
  type ValidateFunction,
  type EqualityFunction,
  type Listener,
  type AttributeListener,
  type ContainerView,
  type AnyPropertyValue,
  type AnyPropertyValueList,
  type AnyContainer,
  type ContainerOptions,
  type PropertyValueOptions
} from './value'

export { PropertyValueList, type PropertyValueListOptions } from './list'

export {
  bind,
  unbind,
  isBound,
  getBoundPeers,
  bindProps,
  unbindProps,
  isBoundProps,
  type BindOptions
} from './bindable'

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
  type PropertyContext,
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
  type Axis,
  type AxisName
} from './properties-types'

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
} from './properties'

export { SyncablePropertyOwner, createSyncableOwner, type SyncOptions, type SyncListener } from './syncable'

export { suppress, suppressAll, skip, type SuppressOptions, type SkipOptions } from './suppress'

export { DELIMITER, serialise, deserialise, serialiseAll } from './serialise'

export { addParserArguments, applyArguments, generateArguments, type CliOptions, type CliArguments } from './cli'

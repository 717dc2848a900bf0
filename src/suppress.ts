/**
 * Scoped notification suppression. Each helper runs a callback with some
 * notifications switched off and restores the previous state afterwards,
 * whether the callback returns or throws.
 */

import type { PropertyOwner } from './properties'
import type { PropertyName, PropertySchema } from './properties-types'

interface SuppressOptions {
  /** Notify the suppressed properties once the callback has run. */
  notify?: boolean
}

interface SkipOptions {
  /** Only skip the listener while the property is valid. */
  ignoreInvalid?: boolean
}

/**
 * Runs `fn` with notification disabled on `names`.
 *
 * @example
 * ```ts
 * suppress(owner, ['lo', 'hi'], () => {
 *   owner.set('lo', 5)
 *   owner.set('hi', 10)
 * }, { notify: true })
 * ```
 */
function suppress<S extends PropertySchema, TResult>(
  owner: PropertyOwner<S>,
  names: PropertyName<S> | readonly PropertyName<S>[],
  fn: () => TResult,
  options: SuppressOptions = {}
): TResult {
  const list: readonly PropertyName<S>[] = typeof names === 'string' ? [names] : names
  const states = list.map(name => owner.getNotificationState(name))
  list.forEach(name => owner.disableNotification(name))
  try {
    return fn()
  } finally {
    list.forEach((name, i) => owner.setNotificationState(name, states[i]))
    if (options.notify === true) list.forEach(name => owner.notify(name))
  }
}

/** Runs `fn` with every property's notification disabled, then enables them all. */
function suppressAll<S extends PropertySchema, TResult>(owner: PropertyOwner<S>, fn: () => TResult): TResult {
  owner.disableAllNotification()
  try {
    return fn()
  } finally {
    owner.enableAllNotification()
  }
}

/**
 * Runs `fn` with `listenerName` disabled on `names`, so that a listener can
 * change the properties it listens to without hearing about it.
 */
function skip<S extends PropertySchema, TResult>(
  owner: PropertyOwner<S>,
  names: PropertyName<S> | readonly PropertyName<S>[],
  listenerName: string,
  fn: () => TResult,
  options: SkipOptions = {}
): TResult {
  const list: readonly PropertyName<S>[] = typeof names === 'string' ? [names] : names
  const skipped = list.filter(name => {
    if (!owner.isListenerEnabled(name, listenerName)) return false
    return options.ignoreInvalid !== true || owner.isValid(name)
  })
  skipped.forEach(name => owner.disableListener(name, listenerName))
  try {
    return fn()
  } finally {
    skipped.forEach(name => owner.enableListener(name, listenerName))
  }
}

export { suppress, suppressAll, skip, type SuppressOptions, type SkipOptions }

/**
 * Binding Layer
 * =============
 *
 * `bind(a, b)` links two containers so that a change on either side is
 * carried to the other. The link is a pair record stored on both containers;
 * `notify()` on either one walks its links and brings the other side in line
 * before any listener runs, so listeners on both sides always observe the
 * same state and each side is notified once per change.
 *
 * Links hold weak references to their containers: a binding never keeps an
 * owner alive. A link whose other side has been collected is dropped the
 * next time it is used.
 *
 * List pairs correlate their items by identity rather than by value. An
 * insert, removal or reordering on one side is replayed on the other by
 * creating, dropping or moving the correlated items, silently, after which
 * the other list is notified once.
 */

import { log } from './config'
import { PropertyError } from './errors'
import type { PropertyValueList } from './list'
import type { QueuedCall } from './queue'
import {
  propagate,
  type AnyContainer,
  type AnyPropertyValue,
  type AnyPropertyValueList,
  type ContainerLink,
  type LinkFlags,
  type LinkedContainer,
  type PropertyValue
} from './value'
import type { PropertyOwner } from './properties'
import type { PropertySchema } from './properties-types'

// =============================================================================
// TYPES
// =============================================================================

interface BindOptions {
  /** Carry value changes across the link. Defaults to true. */
  syncValue?: boolean
  /** Carry attribute (constraint) changes across the link. Defaults to true. */
  syncAttributes?: boolean
}

// =============================================================================
// PAIR RECORDS
// =============================================================================

abstract class Link<K extends AnyContainer> implements ContainerLink {
  syncValue: boolean
  syncAttributes: boolean

  /** Held while this link writes to one of its sides, blocking re-entry. */
  protected propagating = false

  private readonly idA: string
  private readonly idB: string
  private readonly refA: WeakRef<K>
  private readonly refB: WeakRef<K>

  constructor(a: K, b: K, flags: LinkFlags) {
    this.idA = a.id
    this.idB = b.id
    this.refA = new WeakRef(a)
    this.refB = new WeakRef(b)
    this.syncValue = flags.syncValue
    this.syncAttributes = flags.syncAttributes
  }

  abstract pushValue(from: LinkedContainer): QueuedCall[] | undefined

  /** Installs the link on both sides. */
  attach(): void {
    this.refA.deref()?.attachLink(this.idB, this)
    this.refB.deref()?.attachLink(this.idA, this)
  }

  configure(flags: LinkFlags): void {
    this.syncValue = flags.syncValue
    this.syncAttributes = flags.syncAttributes
  }

  dispose(): void {
    this.refA.deref()?.detachLink(this.idB)
    this.refB.deref()?.detachLink(this.idA)
  }

  peerOf(container: LinkedContainer): K | undefined {
    const peerId = container.id === this.idA ? this.idB : this.idA
    const peer = container.id === this.idA ? this.refB.deref() : this.refA.deref()
    if (peer === undefined) {
      log.debug(`Dropping binding from ${container.name} to a collected container`)
      container.detachLink(peerId)
    }
    return peer
  }

  /** The typed side that `container` is. */
  protected sideOf(container: LinkedContainer): K | undefined {
    if (container.id === this.idA) return this.refA.deref()
    if (container.id === this.idB) return this.refB.deref()
    return undefined
  }

  protected guarded(work: () => QueuedCall[] | undefined): QueuedCall[] | undefined {
    if (this.propagating) return undefined
    this.propagating = true
    try {
      return work()
    } finally {
      this.propagating = false
    }
  }

  pushAttribute(from: LinkedContainer, attribute: string, value: unknown): QueuedCall[] | undefined {
    const target = this.peerOf(from)
    if (target === undefined) return undefined
    return this.guarded(() => {
      if (!target.assignAttribute(attribute, value)) return []
      const calls = target.collectAttributeNotifications(attribute, value)
      if (target.refreshValidity()) calls.push(...target.collectNotifications())
      return calls
    })
  }

  synchronise(from: LinkedContainer): void {
    const source = this.sideOf(from)
    const target = this.peerOf(from)
    if (source === undefined || target === undefined) return

    const calls: QueuedCall[] = []
    let validityChanged = false

    if (this.syncAttributes) {
      for (const [name, value] of Object.entries(source.getAttributes())) {
        if (!target.assignAttribute(name, value)) continue
        calls.push(...target.collectAttributeNotifications(name, value))
        calls.push(
          ...propagate(target, 'attribute', (link, next) => link.pushAttribute(next, name, value), [source.id])
        )
      }
      validityChanged = target.refreshValidity()
    }

    const owed = this.syncValue ? this.pushValue(from) ?? [] : []
    calls.push(...owed)
    if (validityChanged && owed.length === 0) calls.push(...target.collectNotifications())
    calls.push(...propagate(target, 'value', (link, next) => link.pushValue(next), [source.id]))

    source.queue.callAll(calls)
  }
}

/** Pair record for two scalar containers. */
class ValueLink extends Link<AnyPropertyValue> {
  pushValue(from: LinkedContainer): QueuedCall[] | undefined {
    const source = this.sideOf(from)
    const target = this.peerOf(from)
    if (source === undefined || target === undefined) return undefined

    return this.guarded(() => {
      try {
        return target.adopt(source.get()) ? target.collectNotifications() : []
      } catch (error) {
        log.warn(`Could not carry ${String(source.get())} from ${source.describe()} to ${target.describe()}`, error)
        return undefined
      }
    })
  }
}

/**
 * Searches the item links reachable from `item` for one of `candidates`.
 * Lists bound in a cycle create their new items through whichever links the
 * walk reached first, so two of them can already be bound through a third
 * list without being correlated on the link between them.
 */
function findBoundItem(
  item: LinkedContainer,
  candidates: ReadonlyMap<string, AnyPropertyValue>
): AnyPropertyValue | undefined {
  const visited = new Set<string>([item.id])
  const pending: LinkedContainer[] = [item]
  for (let from = pending.shift(); from !== undefined; from = pending.shift()) {
    for (const link of [...from.links.values()]) {
      const peer = link.peerOf(from)
      if (peer === undefined || visited.has(peer.id)) continue
      const candidate = candidates.get(peer.id)
      if (candidate !== undefined) return candidate
      visited.add(peer.id)
      pending.push(peer)
    }
  }
  return undefined
}

/**
 * Pair record for two list containers. Besides the list-level link it owns
 * one `ValueLink` per correlated item pair, and a bidirectional map from
 * each item id to the id of its counterpart.
 */
class ListLink extends Link<AnyPropertyValueList> {
  private readonly correlated = new Map<string, string>()
  private readonly itemLinks = new Map<string, ValueLink>()

  /** Pairs up the first `min(len a, len b)` items positionally. */
  correlateByPosition(a: AnyPropertyValueList, b: AnyPropertyValueList): void {
    const itemsA = a.getPropertyValueList()
    const itemsB = b.getPropertyValueList()
    for (let i = 0; i < Math.min(itemsA.length, itemsB.length); i++) {
      if (this.correlated.has(itemsA[i].id)) continue
      this.linkItems(itemsA[i], itemsB[i])
    }
  }

  /** The id of the item correlated with `itemId`, on the other list. */
  counterpartOf(itemId: string): string | undefined {
    return this.correlated.get(itemId)
  }

  configure(flags: LinkFlags): void {
    super.configure(flags)
    this.itemLinks.forEach(link => link.configure(flags))
  }

  dispose(): void {
    super.dispose()
    new Set(this.itemLinks.values()).forEach(link => link.dispose())
    this.itemLinks.clear()
    this.correlated.clear()
  }

  pushValue(from: LinkedContainer): QueuedCall[] | undefined {
    const source = this.sideOf(from)
    const target = this.peerOf(from)
    if (source === undefined || target === undefined) return undefined

    return this.guarded(() => {
      const targetItems = target.getPropertyValueList()
      const byId = new Map(targetItems.map(item => [item.id, item]))
      const uncorrelated = new Map(
        targetItems.filter(item => !this.correlated.has(item.id)).map(item => [item.id, item])
      )
      const created: AnyPropertyValue[] = []
      const changed: AnyPropertyValue[] = []

      let next: AnyPropertyValue[]
      try {
        next = source.getPropertyValueList().map(sourceItem => {
          const counterpartId = this.correlated.get(sourceItem.id)
          const counterpart = counterpartId === undefined ? undefined : byId.get(counterpartId)
          if (counterpart !== undefined) {
            if (counterpart.adopt(sourceItem.get())) changed.push(counterpart)
            return counterpart
          }
          const bound = findBoundItem(sourceItem, uncorrelated)
          if (bound !== undefined) {
            uncorrelated.delete(bound.id)
            this.linkItems(sourceItem, bound)
            if (bound.adopt(sourceItem.get())) changed.push(bound)
            return bound
          }
          const item = target.createItem(sourceItem.get())
          created.push(item)
          this.linkItems(sourceItem, item)
          return item
        })
      } catch (error) {
        created.forEach(item => this.unlinkItem(item.id))
        log.warn(`Could not replay ${source.describe()} onto ${target.describe()}`, error)
        return undefined
      }

      const kept = new Set(next)
      targetItems.filter(item => !kept.has(item)).forEach(item => this.unlinkItem(item.id))

      const structural = target.adoptItems(next)
      const calls: QueuedCall[] = []
      if (structural || changed.length > 0) {
        log.debug(`Replayed ${source.describe()} onto ${target.describe()}`)
        calls.push(...target.collectNotifications())
      }
      changed.forEach(item => calls.push(...item.collectNotifications(false)))
      return calls
    })
  }

  private linkItems(a: AnyPropertyValue, b: AnyPropertyValue): void {
    const link = new ValueLink(a, b, { syncValue: this.syncValue, syncAttributes: this.syncAttributes })
    link.attach()
    this.correlated.set(a.id, b.id)
    this.correlated.set(b.id, a.id)
    this.itemLinks.set(a.id, link)
    this.itemLinks.set(b.id, link)
  }

  private unlinkItem(itemId: string): void {
    const counterpartId = this.correlated.get(itemId)
    this.itemLinks.get(itemId)?.dispose()
    this.itemLinks.delete(itemId)
    this.correlated.delete(itemId)
    if (counterpartId === undefined) return
    this.itemLinks.delete(counterpartId)
    this.correlated.delete(counterpartId)
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

function flagsOf(options: BindOptions): LinkFlags {
  return {
    syncValue: options.syncValue ?? true,
    syncAttributes: options.syncAttributes ?? true
  }
}

function connect(a: AnyContainer, b: AnyContainer, options: BindOptions): void {
  if (a === b) throw new PropertyError(`Cannot bind ${a.describe()} to itself`, 'SELF_BINDING')

  const flags = flagsOf(options)
  const existing = a.getLink(b.id)
  if (existing !== undefined) {
    log.debug(`Rebinding ${a.describe()} and ${b.describe()}`)
    existing.configure(flags)
    existing.synchronise(a)
    return
  }

  log.debug(`Binding ${a.describe()} to ${b.describe()}`)
  if (a.kind === 'list' && b.kind === 'list') {
    const link = new ListLink(a, b, flags)
    link.attach()
    link.correlateByPosition(a, b)
    link.synchronise(a)
  } else if (a.kind === 'value' && b.kind === 'value') {
    const link = new ValueLink(a, b, flags)
    link.attach()
    link.synchronise(a)
  } else {
    throw new PropertyError(`Cannot bind a list to a scalar (${a.describe()}, ${b.describe()})`, 'BINDING_MISMATCH')
  }
}

/**
 * Binds `a` and `b`. `a` pushes its attributes and value to `b` straight
 * away; from then on a change on either side is carried to the other.
 * Binding an already bound pair updates the flags and pushes again.
 *
 * @example
 * ```ts
 * bind(left.getPropVal('zoom'), right.getPropVal('zoom'))
 * left.set('zoom', 2) // right.get('zoom') === 2
 * ```
 */
function bind<T, C>(a: PropertyValue<T, C>, b: PropertyValue<T, C>, options?: BindOptions): void
function bind<T, C>(a: PropertyValueList<T, C>, b: PropertyValueList<T, C>, options?: BindOptions): void
function bind(a: AnyContainer, b: AnyContainer, options: BindOptions = {}): void {
  connect(a, b, options)
}

/** Removes the binding between `a` and `b`. Does nothing if they are not bound. */
function unbind(a: LinkedContainer, b: LinkedContainer): void {
  const link = a.links.get(b.id)
  if (link === undefined) return
  log.debug(`Unbinding ${a.name} from ${b.name}`)
  link.dispose()
}

function isBound(a: LinkedContainer, b: LinkedContainer): boolean {
  return a.links.has(b.id)
}

/** The containers currently bound to `container`. */
function getBoundPeers(container: LinkedContainer): LinkedContainer[] {
  const peers: LinkedContainer[] = []
  for (const link of [...container.links.values()]) {
    const peer = link.peerOf(container)
    if (peer !== undefined) peers.push(peer)
  }
  return peers
}

// =============================================================================
// OWNER-LEVEL CONVENIENCE
// =============================================================================

/**
 * Binds property `name` of `owner` to property `otherName` (defaulting to
 * `name`) of `other`. `owner` pushes its state first.
 *
 * @throws UnknownPropertyError
 */
function bindProps<S extends PropertySchema, O extends PropertySchema>(
  owner: PropertyOwner<S>,
  name: keyof S & string,
  other: PropertyOwner<O>,
  otherName?: keyof O & string,
  options: BindOptions = {}
): void {
  connect(owner.requireContainer(name), other.requireContainer(otherName ?? name), options)
}

function unbindProps<S extends PropertySchema, O extends PropertySchema>(
  owner: PropertyOwner<S>,
  name: keyof S & string,
  other: PropertyOwner<O>,
  otherName?: keyof O & string
): void {
  unbind(owner.requireContainer(name), other.requireContainer(otherName ?? name))
}

function isBoundProps<S extends PropertySchema, O extends PropertySchema>(
  owner: PropertyOwner<S>,
  name: keyof S & string,
  other: PropertyOwner<O>,
  otherName?: keyof O & string
): boolean {
  return isBound(owner.requireContainer(name), other.requireContainer(otherName ?? name))
}

export {
  bind,
  unbind,
  isBound,
  getBoundPeers,
  bindProps,
  unbindProps,
  isBoundProps,
  connect,
  ValueLink,
  ListLink,
  type BindOptions
}

/**
 * Sync Hierarchy
 * ==============
 *
 * A `SyncablePropertyOwner` may have a parent of the same schema. Each of its
 * properties can be synced to the parent's property of the same name, which
 * binds the two containers; unsyncing unbinds them again.
 *
 * Every property has a sync flag, an ordinary boolean `PropertyValue` named
 * `sync_<name>`. Its listener does the binding and unbinding, so anything
 * that can observe a value (a checkbox widget, another binding) can observe
 * and drive the sync state. The flag refuses, with a `ValidationError`, a
 * state that `nobind` or `nounbind` rules out.
 *
 * Parents and children refer to each other weakly: a child never keeps its
 * parent alive, nor a parent its children.
 */

import { connect, unbind } from './bindable'
import { log } from './config'
import { IllegalSyncError } from './errors'
import { PropertyOwner, type OwnerOptions } from './properties'
import type { PropertyContext, PropertyName, PropertySchema } from './properties-types'
import { PropertyValue, type Listener } from './value'

// =============================================================================
// TYPES
// =============================================================================

interface SyncOptions<S extends PropertySchema> extends OwnerOptions {
  parent?: SyncablePropertyOwner<S>
  /** Properties that start unsynced and cannot be synced. */
  nobind?: readonly PropertyName<S>[]
  /** Properties that cannot be unsynced once synced. */
  nounbind?: readonly PropertyName<S>[]
}

type SyncListener = Listener<boolean, PropertyContext>

// =============================================================================
// IMPLEMENTATION
// =============================================================================

class SyncablePropertyOwner<S extends PropertySchema> extends PropertyOwner<S> {
  private parentRef: WeakRef<SyncablePropertyOwner<S>> | undefined
  private readonly childRefs = new Set<WeakRef<SyncablePropertyOwner<S>>>()
  private readonly syncFlags = new Map<string, PropertyValue<boolean, PropertyContext>>()
  private readonly nobind: ReadonlySet<string>
  private readonly nounbind: ReadonlySet<string>

  constructor(schema: S, options: SyncOptions<S> = {}) {
    super(schema, options)
    const parent = options.parent
    if (parent !== undefined && parent.schema !== schema) {
      throw new IllegalSyncError(`${this.label} and its parent ${parent.label} must share one schema`, {
        owner: this.label,
        parent: parent.label
      })
    }

    this.nobind = new Set(options.nobind)
    this.nounbind = new Set(options.nounbind)
    this.parentRef = parent === undefined ? undefined : new WeakRef(parent)
    parent?.childRefs.add(new WeakRef(this))

    for (const name of this.getPropertyNames()) {
      const synced = parent !== undefined && !this.nobind.has(name)
      const flag = new PropertyValue<boolean, PropertyContext>({
        context: this,
        name: `sync_${name}`,
        value: synced,
        validate: (_owner, _attributes, value) => this.checkSyncFlag(name, value),
        allowInvalid: false,
        queue: this.queue
      })
      flag.addListener(`sync_${name}_${this.label}`, value => this.applySync(name, value))
      this.syncFlags.set(name, flag)
      if (parent !== undefined && synced) connect(parent.requireContainer(name), this.requireContainer(name), {})
    }
  }

  /** Refuses a sync state that `nobind`, `nounbind` or a missing parent rules out. */
  private checkSyncFlag(name: PropertyName<S>, synced: boolean): void {
    if (synced && !this.canBeSyncedToParent(name)) {
      throw new IllegalSyncError(`${this.label}.${name} cannot be synced to a parent`)
    }
    if (!synced && this.getParent() !== undefined && this.nounbind.has(name)) {
      throw new IllegalSyncError(`${this.label}.${name} cannot be unsynced from its parent`)
    }
  }

  private applySync(name: PropertyName<S>, synced: boolean): void {
    const parent = this.getParent()
    if (parent === undefined) return
    const parentContainer = parent.requireContainer(name)
    const container = this.requireContainer(name)
    if (synced) {
      log.debug(`Syncing ${container.describe()} to ${parentContainer.describe()}`)
      connect(parentContainer, container, {})
    } else {
      log.debug(`Unsyncing ${container.describe()} from ${parentContainer.describe()}`)
      unbind(parentContainer, container)
    }
  }

  private flagOf(name: PropertyName<S>): PropertyValue<boolean, PropertyContext> {
    const flag = this.syncFlags.get(name)
    if (flag === undefined) {
      throw new IllegalSyncError(`${this.label} has no property "${name}"`, { owner: this.label, property: name })
    }
    return flag
  }

  // ---------------------------------------------------------------------------
  // Sync state
  // ---------------------------------------------------------------------------

  getParent(): SyncablePropertyOwner<S> | undefined {
    return this.parentRef?.deref()
  }

  /** Children that are still alive. */
  getChildren(): SyncablePropertyOwner<S>[] {
    const children: SyncablePropertyOwner<S>[] = []
    for (const ref of this.childRefs) {
      const child = ref.deref()
      if (child === undefined) this.childRefs.delete(ref)
      else children.push(child)
    }
    return children
  }

  /** The boolean container holding the sync state of `name`. */
  getSyncFlag(name: PropertyName<S>): PropertyValue<boolean, PropertyContext> {
    return this.flagOf(name)
  }

  isSyncedToParent(name: PropertyName<S>): boolean {
    return this.flagOf(name).get()
  }

  canBeSyncedToParent(name: PropertyName<S>): boolean {
    return this.getParent() !== undefined && !this.nobind.has(name)
  }

  canBeUnsyncedFromParent(name: PropertyName<S>): boolean {
    return this.getParent() !== undefined && !this.nounbind.has(name)
  }

  /**
   * Binds `name` to the parent's property; the parent's value wins.
   *
   * @throws IllegalSyncError without a parent, or when `name` is in `nobind`.
   */
  syncToParent(name: PropertyName<S>): void {
    if (!this.canBeSyncedToParent(name)) {
      throw new IllegalSyncError(`${this.label}.${name} cannot be synced to a parent`, {
        owner: this.label,
        property: name
      })
    }
    this.flagOf(name).set(true)
  }

  /**
   * @throws IllegalSyncError without a parent, or when `name` is in `nounbind`.
   */
  unsyncFromParent(name: PropertyName<S>): void {
    if (!this.canBeUnsyncedFromParent(name)) {
      throw new IllegalSyncError(`${this.label}.${name} cannot be unsynced from its parent`, {
        owner: this.label,
        property: name
      })
    }
    this.flagOf(name).set(false)
  }

  addSyncChangeListener(name: PropertyName<S>, listenerName: string, callback: SyncListener, overwrite = false): void {
    this.flagOf(name).addListener(listenerName, callback, overwrite)
  }

  removeSyncChangeListener(name: PropertyName<S>, listenerName: string): void {
    this.flagOf(name).removeListener(listenerName)
  }

  /**
   * Unbinds every property from the parent and forgets it. Sync flags are
   * cleared, and their listeners notified, once the parent is gone.
   */
  detachFromParent(): void {
    const parent = this.getParent()
    if (parent === undefined) return
    for (const name of this.getPropertyNames()) {
      unbind(parent.requireContainer(name), this.requireContainer(name))
    }
    parent.removeChild(this)
    this.parentRef = undefined
    this.syncFlags.forEach(flag => flag.set(false))
  }

  private removeChild(child: SyncablePropertyOwner<S>): void {
    for (const ref of this.childRefs) {
      const alive = ref.deref()
      if (alive === undefined || alive === child) this.childRefs.delete(ref)
    }
  }
}

function createSyncableOwner<S extends PropertySchema>(schema: S, options: SyncOptions<S> = {}): SyncablePropertyOwner<S> {
  return new SyncablePropertyOwner(schema, options)
}

export { SyncablePropertyOwner, createSyncableOwner, type SyncOptions, type SyncListener }

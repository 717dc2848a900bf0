/**
 * Lit-HTML Widgets
 * ================
 *
 * Form controls derived from property declarations, and a view helper that
 * keeps a rendered template in step with an owner.
 *
 * - `makeWidget(owner, name)` returns a template for one property: a
 *   checkbox, a number, text or colour input, a select for choices, or a
 *   group of inputs for list, bounds and point properties. Editing the
 *   control calls `set()`; an invalid value adds the `invalid` class.
 * - `bindView(owner, container, template)` renders `template` into
 *   `container` and renders it again whenever any property, or any of its
 *   constraints, changes.
 *
 * ```ts
 * const view = bindView(owner, document.body, (owner, { widget }) => html`
 *   <label>Zoom ${widget('zoom')}</label>
 *   <label>Mode ${widget('mode')}</label>
 * `)
 * // later
 * view.destroy()
 * ```
 */

import { html, render, type TemplateResult } from 'lit-html'
import { classMap } from 'lit-html/directives/class-map.js'
import { ifDefined } from 'lit-html/directives/if-defined.js'
import { live } from 'lit-html/directives/live.js'

import { log } from './config'
import { errorMessage } from './errors'
import { getChoices, getLabels, isChoiceEnabled, type PropertyOwner } from './properties'
import { formatColour, parseColour, type PropertyDecl, type PropertyName, type PropertySchema, type ValueType } from './properties-types'
import type { SyncablePropertyOwner } from './syncable'
import type { AnyPropertyValue, ContainerView } from './value'

// =============================================================================
// TYPES
// =============================================================================

interface WidgetOptions {
  /** Element id; defaults to `<owner label>-<property name>`. */
  id?: string
  /** Extra class names. */
  className?: string
}

interface WidgetContext<S extends PropertySchema> {
  readonly owner: PropertyOwner<S>
  widget(name: PropertyName<S>, options?: WidgetOptions): TemplateResult
  onUnmount(callback: () => void): void
}

type WidgetTemplate<S extends PropertySchema> = (owner: PropertyOwner<S>, context: WidgetContext<S>) => TemplateResult

interface PropertyView<S extends PropertySchema> {
  readonly owner: PropertyOwner<S>
  readonly container: HTMLElement
  readonly mounted: boolean
  render(): void
  destroy(): void
  onUnmount(callback: () => void): void
}

let viewCount = 0

// =============================================================================
// WIDGETS
// =============================================================================

/** Sets a value from a control, logging rather than throwing on bad input. */
function assign(target: { set(value: unknown): void; describe(): string }, value: unknown): void {
  try {
    target.set(value)
  } catch (error) {
    log.warn(`Rejected input for ${target.describe()}: ${errorMessage(error)}`)
  }
}

function inputValue(event: Event): string | undefined {
  const target = event.target
  if (target instanceof HTMLInputElement || target instanceof HTMLSelectElement) return target.value
  return undefined
}

function classes(container: ContainerView, options: WidgetOptions): ReturnType<typeof classMap> {
  return classMap({
    'prop-widget': true,
    invalid: !container.isValid(),
    ...(options.className === undefined ? {} : { [options.className]: true })
  })
}

function numberAttribute(container: ContainerView, name: string): number | undefined {
  const value = container.getAttribute(name)
  return typeof value === 'number' ? value : undefined
}

/** A single input for a scalar container of the given type. */
function scalarInput(type: ValueType, container: AnyPropertyValue, id: string | undefined, options: WidgetOptions): TemplateResult {
  const value = container.get()
  const title = ifDefined(container.getValidationMessage())

  switch (type) {
    case 'boolean':
      return html`<input
        type="checkbox"
        id=${ifDefined(id)}
        class=${classes(container, options)}
        title=${title}
        .checked=${live(value === true)}
        @change=${(event: Event) => {
          if (event.target instanceof HTMLInputElement) assign(container, event.target.checked)
        }}
      />`
    case 'int':
    case 'real':
      return html`<input
        type="number"
        id=${ifDefined(id)}
        class=${classes(container, options)}
        title=${title}
        min=${ifDefined(numberAttribute(container, 'minval'))}
        max=${ifDefined(numberAttribute(container, 'maxval'))}
        step=${type === 'int' ? '1' : 'any'}
        .value=${live(String(value))}
        @change=${(event: Event) => {
          const text = inputValue(event)
          if (text !== undefined) assign(container, text)
        }}
      />`
    case 'colour':
      return html`<input
        type="color"
        id=${ifDefined(id)}
        class=${classes(container, options)}
        .value=${live(Array.isArray(value) ? formatColour([Number(value[0]), Number(value[1]), Number(value[2])]) : '#ffffff')}
        @input=${(event: Event) => {
          const text = inputValue(event)
          if (text !== undefined) assign(container, parseColour(text))
        }}
      />`
    case 'string':
    case 'choice':
      return html`<input
        type="text"
        id=${ifDefined(id)}
        class=${classes(container, options)}
        title=${title}
        .value=${live(String(value))}
        @change=${(event: Event) => {
          const text = inputValue(event)
          if (text !== undefined) assign(container, text)
        }}
      />`
  }
}

/**
 * The control for property `name` of `owner`.
 *
 * @throws UnknownPropertyError
 */
function makeWidget<S extends PropertySchema>(
  owner: PropertyOwner<S>,
  name: PropertyName<S>,
  options: WidgetOptions = {}
): TemplateResult {
  const decl: PropertyDecl = owner.getProp(name)
  const container = owner.requireContainer(name)
  const id = options.id ?? `${owner.label}-${name}`

  if (container.kind === 'list') {
    const itemType = decl.kind === 'list' ? decl.item.type : 'string'
    return html`<span id=${id} class=${classes(container, options)} title=${ifDefined(container.getValidationMessage())}>
      ${container.getPropertyValueList().map((item, i) => scalarInput(itemType, item, `${id}-${i}`, {}))}
    </span>`
  }

  if (decl.kind === 'value' && decl.type === 'choice') {
    const current = container.get()
    const labels = getLabels(owner, name)
    return html`<select
      id=${id}
      class=${classes(container, options)}
      title=${ifDefined(container.getValidationMessage())}
      @change=${(event: Event) => {
        const text = inputValue(event)
        if (text !== undefined) assign(container, text)
      }}
    >
      ${getChoices(owner, name).map(
        (choice, i) => html`<option
          value=${choice}
          ?selected=${choice === current}
          ?disabled=${!isChoiceEnabled(owner, name, choice)}
        >${labels[i] ?? choice}</option>`
      )}
    </select>`
  }

  return scalarInput(decl.kind === 'value' ? decl.type : 'string', container, id, options)
}

/** A checkbox showing and driving whether `name` is synced to the owner's parent. */
function makeSyncWidget<S extends PropertySchema>(
  owner: SyncablePropertyOwner<S>,
  name: PropertyName<S>,
  options: WidgetOptions = {}
): TemplateResult {
  const flag = owner.getSyncFlag(name)
  const synced = flag.get()
  const locked = synced ? !owner.canBeUnsyncedFromParent(name) : !owner.canBeSyncedToParent(name)
  return html`<input
    type="checkbox"
    id=${options.id ?? `${owner.label}-sync-${name}`}
    class=${classes(flag, options)}
    ?disabled=${locked}
    .checked=${live(synced)}
    @change=${(event: Event) => {
      if (event.target instanceof HTMLInputElement) assign(flag, event.target.checked)
    }}
  />`
}

// =============================================================================
// VIEWS
// =============================================================================

/**
 * Renders `template` into `container` now and after every change to a
 * property of `owner`. Returns a handle whose `destroy()` removes the
 * listeners and clears the container.
 */
function bindView<S extends PropertySchema>(
  owner: PropertyOwner<S>,
  container: HTMLElement,
  template: WidgetTemplate<S>
): PropertyView<S> {
  viewCount += 1
  const listenerName = `view_${viewCount}`
  let isMounted = false
  let isDestroyed = false
  const cleanupCallbacks = new Set<() => void>()

  const context: WidgetContext<S> = {
    owner,
    widget: (name, options) => makeWidget(owner, name, options),
    onUnmount: callback => {
      cleanupCallbacks.add(callback)
    }
  }

  const renderView = (): void => {
    if (isDestroyed) return
    try {
      render(template(owner, context), container)
      isMounted = true
    } catch (error) {
      log.error(`Error rendering view of ${owner.label}`, error)
      render(html`<div class="render-error">Render Error: ${errorMessage(error)}</div>`, container)
    }
  }

  for (const name of owner.getPropertyNames()) {
    owner.addListener(name, listenerName, renderView)
    owner.addConstraintListener(name, listenerName, renderView)
    cleanupCallbacks.add(() => {
      owner.removeListener(name, listenerName)
      owner.removeConstraintListener(name, listenerName)
    })
  }

  const view: PropertyView<S> = {
    owner,
    container,

    get mounted() {
      return isMounted
    },

    render: renderView,

    onUnmount: callback => {
      cleanupCallbacks.add(callback)
    },

    destroy: () => {
      if (isDestroyed) return
      isDestroyed = true
      isMounted = false
      cleanupCallbacks.forEach(cleanup => cleanup())
      cleanupCallbacks.clear()
      render(html``, container)
    }
  }

  renderView()
  return view
}

export {
  makeWidget,
  makeSyncWidget,
  bindView,
  type WidgetOptions,
  type WidgetContext,
  type WidgetTemplate,
  type PropertyView
}

/**
 * Component registry.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ONE TABLE, BUILT ONCE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The registry maps component names to their definitions and holds the
 * named pipeline templates. It is populated by an explicit startup step
 * (never by import side effects) and then sealed:
 *
 *   const registry = ComponentRegistry.create(definitions, templates);
 *
 * After sealing, every access is a pure read. Entries are never removed or
 * replaced, and registering a name twice is a configuration-time error.
 *
 * For a process-wide registry use initRegistry() once at startup and
 * getRegistry() everywhere else.
 */

import type { ComponentDefinition, ComponentDescriptor } from "./schema.js";
import {
  DuplicateComponentError,
  DuplicateTemplateError,
  RegistryInitError,
  RegistrySealedError,
  UnknownComponentError,
} from "./errors.js";
import { closestNames } from "./suggest.js";

/**
 * Named, ordered lists of component names.
 */
export type PipelineTemplates = Readonly<Record<string, readonly string[]>>;

/** Template that must list every registered component exactly once. */
export const ALL_COMPONENTS_TEMPLATE = "all_components";

export class ComponentRegistry {
  private readonly _definitions = new Map<string, ComponentDefinition>();
  private readonly _templates = new Map<string, readonly string[]>();
  private _sealed = false;

  /**
   * Register every definition and template, then seal.
   *
   * @throws DuplicateComponentError if two definitions share a name
   * @throws DuplicateTemplateError if two templates share a name
   */
  static create(
    definitions: Iterable<ComponentDefinition>,
    templates: PipelineTemplates = {}
  ): ComponentRegistry {
    const registry = new ComponentRegistry();
    for (const definition of definitions) {
      registry.register(definition);
    }
    for (const [name, componentNames] of Object.entries(templates)) {
      registry.registerTemplate(name, componentNames);
    }
    return registry.seal();
  }

  // ============================================================
  // Registration
  // ============================================================

  register(definition: ComponentDefinition): this {
    const name = definition.descriptor.name;
    if (this._sealed) {
      throw new RegistrySealedError(name);
    }
    if (this._definitions.has(name)) {
      throw new DuplicateComponentError(name);
    }
    this._definitions.set(name, definition);
    return this;
  }

  /**
   * Add a pipeline template. Component names are not checked here;
   * validateRegistry() reports templates that reference unknown names.
   */
  registerTemplate(name: string, componentNames: readonly string[]): this {
    if (this._sealed) {
      throw new RegistrySealedError(name);
    }
    if (this._templates.has(name)) {
      throw new DuplicateTemplateError(name);
    }
    this._templates.set(name, Object.freeze([...componentNames]));
    return this;
  }

  seal(): this {
    this._sealed = true;
    return this;
  }

  get sealed(): boolean {
    return this._sealed;
  }

  // ============================================================
  // Lookup
  // ============================================================

  /**
   * Every registered descriptor, in registration order.
   */
  all(): ReadonlyArray<Readonly<ComponentDescriptor>> {
    return Object.freeze([...this._definitions.values()].map((d) => d.descriptor));
  }

  /**
   * @returns The definition, or undefined if no component has that name
   */
  lookup(name: string): ComponentDefinition | undefined {
    return this._definitions.get(name);
  }

  /**
   * @throws UnknownComponentError with closest-name suggestions
   */
  require(name: string): ComponentDefinition {
    const definition = this._definitions.get(name);
    if (definition === undefined) {
      throw new UnknownComponentError(name, this.suggest(name));
    }
    return definition;
  }

  has(name: string): boolean {
    return this._definitions.has(name);
  }

  names(): ReadonlyArray<string> {
    return Object.freeze([...this._definitions.keys()]);
  }

  get size(): number {
    return this._definitions.size;
  }

  suggest(name: string, limit = 3): string[] {
    return closestNames(name, this._definitions.keys(), limit);
  }

  // ============================================================
  // Templates
  // ============================================================

  templates(): ReadonlyMap<string, readonly string[]> {
    return new Map(this._templates);
  }

  getTemplate(name: string): readonly string[] | undefined {
    return this._templates.get(name);
  }

  /**
   * Names in a template that do not resolve. Empty means the template is
   * valid. Unknown templates report nothing; check getTemplate() first.
   */
  unknownTemplateComponents(templateName: string): string[] {
    const componentNames = this._templates.get(templateName) ?? [];
    return componentNames.filter((name) => !this._definitions.has(name));
  }
}

// ============================================================
// Process-wide registry
// ============================================================

let processRegistry: ComponentRegistry | null = null;

/**
 * Build the process-wide registry. Call exactly once at startup.
 *
 * @throws RegistryInitError if the registry was already initialized
 */
export function initRegistry(
  definitions: Iterable<ComponentDefinition>,
  templates: PipelineTemplates = {}
): ComponentRegistry {
  if (processRegistry !== null) {
    throw new RegistryInitError("The component registry has already been initialized");
  }
  processRegistry = ComponentRegistry.create(definitions, templates);
  return processRegistry;
}

/**
 * @throws RegistryInitError if initRegistry() has not been called
 */
export function getRegistry(): ComponentRegistry {
  if (processRegistry === null) {
    throw new RegistryInitError(
      "The component registry has not been initialized; call initRegistry() at startup"
    );
  }
  return processRegistry;
}

export function isRegistryInitialized(): boolean {
  return processRegistry !== null;
}

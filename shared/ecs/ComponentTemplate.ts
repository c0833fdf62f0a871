// ============================================
// Component Templates
// Named component bundles for building entities
// ============================================

import { cloneData } from './clone';
import type { ComponentBundle, ComponentOverrides, ComponentRecords } from './components';
import type { Entity } from './Entity';
import { EcsError } from './errors';
import { templateTag } from './types';

export interface ComponentTemplate {
  readonly name: string;
  readonly components: ComponentRecords;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shallow field merge of an override onto a component (deep-copied result).
 */
function mergeFields(base: object, override: object | undefined): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...cloneData(base) };
  if (override) {
    for (const [field, value] of Object.entries(override)) {
      merged[field] = cloneData(value);
    }
  }
  return merged;
}

/**
 * TemplateRegistry - the templates one World knows about.
 *
 * Templates are stored and handed out as deep copies, so editing a
 * template's source object (or an entity built from it) never leaks back.
 */
export class TemplateRegistry {
  private templates = new Map<string, ComponentTemplate>();

  /**
   * Register a template. Throws EcsError(TEMPLATE_EXISTS) on a name collision.
   */
  register(name: string, components: ComponentBundle): ComponentTemplate {
    return this.store(name, components);
  }

  /**
   * Register a template from untyped component records (snapshot restore).
   */
  restore(name: string, components: ComponentRecords): ComponentTemplate {
    return this.store(name, components);
  }

  get(name: string): ComponentTemplate | null {
    return this.templates.get(name) ?? null;
  }

  exists(name: string): boolean {
    return this.templates.has(name);
  }

  getTemplateNames(): string[] {
    return Array.from(this.templates.keys());
  }

  /**
   * Deep copy of a template's components. Throws EcsError(TEMPLATE_NOT_FOUND).
   */
  getComponents(name: string): ComponentRecords {
    return this.copyBundle(this.require(name).components);
  }

  remove(name: string): boolean {
    return this.templates.delete(name);
  }

  clear(): void {
    this.templates.clear();
  }

  /**
   * Derive a new template from an existing one.
   *
   * - overrides merge field-by-field into components the base already has;
   *   overrides for kinds the base lacks are ignored
   * - additional components are added when the base lacks the kind, or when
   *   the caller also overrides that kind (then the additional data wins)
   */
  extend(
    baseName: string,
    newName: string,
    additionalComponents?: ComponentBundle,
    overrides?: ComponentOverrides
  ): ComponentTemplate {
    const base = this.require(baseName);
    if (this.templates.has(newName)) {
      throw EcsError.templateExists(newName);
    }

    const components: Record<string, object> = {};
    for (const [kind, data] of Object.entries(base.components)) {
      if (!isRecord(data)) continue;
      const override = overrides?.[kind];
      components[kind] = mergeFields(data, override);
    }

    if (additionalComponents) {
      for (const [kind, data] of Object.entries(additionalComponents)) {
        if (!data) continue;
        if (!(kind in components) || overrides?.[kind] !== undefined) {
          components[kind] = cloneData(data);
        }
      }
    }

    return this.store(newName, components);
  }

  /**
   * Add every component of a template to an entity (overrides merged per kind)
   * and tag it `template:<name>`.
   */
  applyToEntity(entity: Entity, templateName: string, overrides?: ComponentOverrides): Entity {
    const template = this.require(templateName);

    for (const [kind, data] of Object.entries(template.components)) {
      if (!isRecord(data)) continue;
      entity.addComponent(kind, mergeFields(data, overrides?.[kind]));
    }
    entity.addTag(templateTag(templateName));

    return entity;
  }

  private require(name: string): ComponentTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw EcsError.templateNotFound(name);
    }
    return template;
  }

  private store(name: string, components: ComponentRecords): ComponentTemplate {
    if (this.templates.has(name)) {
      throw EcsError.templateExists(name);
    }

    const template: ComponentTemplate = { name, components: this.copyBundle(components) };
    this.templates.set(name, template);
    return template;
  }

  private copyBundle(components: ComponentRecords): ComponentRecords {
    const copy: Record<string, object> = {};
    for (const [kind, data] of Object.entries(components)) {
      if (data) {
        copy[kind] = cloneData(data);
      }
    }
    return copy;
  }
}

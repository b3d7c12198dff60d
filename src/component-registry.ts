/**
 * Request-scoped registry of schema components
 * 
 * Why per generation: components are collected while operations are built.
 * A fresh registry per document keeps concurrent generations apart and lets
 * repeated serializers resolve to one shared `$ref`.
 */

import { isDeepStrictEqual } from 'node:util';
import type { Logger } from './logger.js';
import type { ReferenceObject, SchemaObject } from './types/openapi.js';

export interface ResolvedComponent {
  name: string;
  schema: SchemaObject;
}

export class ComponentRegistry {
  private components = new Map<string, SchemaObject>();

  constructor(private logger?: Logger) {}

  has(name: string): boolean {
    return this.components.has(name);
  }

  get(name: string): SchemaObject | undefined {
    return this.components.get(name);
  }

  /**
   * Register a component; the first schema registered under a name wins
   */
  register(component: ResolvedComponent): ReferenceObject {
    const existing = this.components.get(component.name);
    if (existing === undefined) {
      this.components.set(component.name, component.schema);
    } else if (!isDeepStrictEqual(existing, component.schema)) {
      this.logger?.warn('Component name is used for two different schemas, keeping the first', {
        component: component.name,
      });
    }
    return ComponentRegistry.ref(component.name);
  }

  /**
   * Return the reference for `name`, building the schema only on first use
   */
  resolve(name: string, build: () => SchemaObject): ReferenceObject {
    if (this.components.has(name)) {
      return ComponentRegistry.ref(name);
    }
    return this.register({ name, schema: build() });
  }

  /**
   * Components sorted by name
   */
  build(): Record<string, SchemaObject> {
    const result: Record<string, SchemaObject> = {};
    for (const name of Array.from(this.components.keys()).sort()) {
      const schema = this.components.get(name);
      if (schema) {
        result[name] = schema;
      }
    }
    return result;
  }

  get size(): number {
    return this.components.size;
  }

  static ref(name: string): ReferenceObject {
    return { $ref: `#/components/schemas/${name}` };
  }
}

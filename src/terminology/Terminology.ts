/**
 * Terminology: reference properties indexed by name and by mapping URL.
 */

import type { Property } from '../odml/Property.js';

export class Terminology {
  private readonly byName: Map<string, Property> = new Map();
  private readonly byMapping: Map<string, Property> = new Map();

  /**
   * @param name - Terminology name from the document
   * @param source - Where the terminology was read from
   * @param properties - Reference properties; later duplicates of a name are ignored
   */
  constructor(
    readonly name: string,
    readonly source: string,
    properties: Property[]
  ) {
    for (const property of properties) {
      const key = property.getName().toLowerCase();
      if (!this.byName.has(key)) {
        this.byName.set(key, property);
      }
      const mapping = property.getMapping();
      if (mapping !== null && !this.byMapping.has(mapping.href)) {
        this.byMapping.set(mapping.href, property);
      }
    }
  }

  get size(): number {
    return this.byName.size;
  }

  getProperties(): Property[] {
    return Array.from(this.byName.values());
  }

  /**
   * Reference property by name, ignoring case.
   */
  getProperty(name: string): Property | null {
    return this.byName.get(name.toLowerCase()) ?? null;
  }

  getByMapping(mapping: URL | string): Property | null {
    const href = mapping instanceof URL ? mapping.href : mapping;
    return this.byMapping.get(href) ?? null;
  }

  /**
   * Reference for a document property: by its mapping first, then by name.
   */
  findReference(property: Property): Property | null {
    const mapping = property.getMapping();
    if (mapping !== null) {
      const mapped = this.getByMapping(mapping);
      if (mapped !== null) return mapped;
    }
    return this.getProperty(property.getName());
  }
}

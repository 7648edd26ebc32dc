// packages/core/src/config/VariantRegistry.ts
import type { VariantDescriptor } from '../types/index.js';
import { VariantError } from '../errors/index.js';

export class VariantRegistry {
  private static readonly byId = new Map<string, VariantDescriptor>();

  static register(v: VariantDescriptor): void {
    if (this.byId.has(v.id)) throw new VariantError(`Variant ${v.id} already registered`);
    if (!/^[0-9]{4}$/.test(v.versionTag)) {
      throw new VariantError(`Variant ${v.id}: version tag must be four ASCII digits, got "${v.versionTag}"`);
    }
    this.byId.set(v.id, v);
  }
  static get(id: string): VariantDescriptor {
    const v = this.byId.get(id);
    if (!v) throw new VariantError(`Unknown format variant: ${id}`);
    return v;
  }
  static ids(): string[] { return [...this.byId.keys()]; }
  // default variant for plain script documents
  static get current(): VariantDescriptor { return this.get('standard'); }
}

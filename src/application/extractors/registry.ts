/**
 * Extractor registry — maps ExtractorKind to extractor instances.
 */

import { EXTRACTOR_ORDER, type ExtractorKind } from "../../domain/types.ts";
import type { Extractor } from "./base.ts";
import { OperationExtractor } from "./kinds/operation.ts";
import { ExampleExtractor } from "./kinds/example.ts";
import { SchemaExtractor } from "./kinds/schema.ts";

export class ExtractorRegistry {
  private extractors = new Map<ExtractorKind, Extractor>();

  register(extractor: Extractor): void {
    this.extractors.set(extractor.kind, extractor);
  }

  get(kind: ExtractorKind): Extractor | undefined {
    return this.extractors.get(kind);
  }

  /**
   * Extractors for the enabled kinds, in canonical run order. Kinds that are
   * not registered are ignored.
   */
  select(enabled: Iterable<ExtractorKind>): Extractor[] {
    const wanted = new Set(enabled);
    const selected: Extractor[] = [];
    for (const kind of EXTRACTOR_ORDER) {
      const extractor = this.get(kind);
      if (extractor && wanted.has(kind)) selected.push(extractor);
    }
    return selected;
  }
}

export function createDefaultRegistry(): ExtractorRegistry {
  const registry = new ExtractorRegistry();
  registry.register(new OperationExtractor());
  registry.register(new ExampleExtractor());
  registry.register(new SchemaExtractor());
  return registry;
}

/**
 * @module patterns/pattern-detector
 * PatternDetector - ordered registry of causal-pattern predicates.
 * Every rule is evaluated; a bundle may match several patterns or none.
 */

import type { DiagnosticBundle, PatternId } from '../types.js';
import { UNKNOWN_PATTERN, createDiagnosticBundle } from '../types.js';
import { ValidationError } from '../errors.js';

export interface PatternDefinition {
  id: PatternId;
  /** Graph category the pattern is an instance of. */
  category: string;
  description: string;
  match(bundle: DiagnosticBundle): boolean;
}

export const UNKNOWN_CATEGORY = 'uncategorized';

export class PatternDetector {
  private readonly patterns = new Map<PatternId, PatternDefinition>();

  constructor(definitions: readonly PatternDefinition[] = []) {
    for (const def of definitions) this.register(def);
  }

  /** Add a pattern after the existing ones. */
  register(definition: PatternDefinition): void {
    if (!definition.id || definition.id === UNKNOWN_PATTERN) {
      throw new ValidationError(`Invalid pattern id: "${definition.id}"`);
    }
    if (this.patterns.has(definition.id)) {
      throw new ValidationError(`Pattern already registered: ${definition.id}`);
    }
    this.patterns.set(definition.id, Object.freeze({ ...definition }));
  }

  /** Matching pattern ids in registration order; empty when nothing matches. */
  detect(bundle: DiagnosticBundle): Set<PatternId> {
    const matched = new Set<PatternId>();
    for (const def of this.patterns.values()) {
      if (def.match(bundle)) matched.add(def.id);
    }
    return matched;
  }

  /** Classify a single line of text, e.g. a finding description. */
  detectText(text: string, entityId = 'text'): Set<PatternId> {
    return this.detect(createDiagnosticBundle(entityId, [text]));
  }

  /** First matching pattern for a text, or `unknown`. */
  primaryPattern(text: string): PatternId {
    for (const id of this.detectText(text)) return id;
    return UNKNOWN_PATTERN;
  }

  categoryOf(patternId: PatternId): string {
    return this.patterns.get(patternId)?.category ?? UNKNOWN_CATEGORY;
  }

  get(patternId: PatternId): PatternDefinition | undefined {
    return this.patterns.get(patternId);
  }

  list(): PatternDefinition[] {
    return [...this.patterns.values()];
  }
}

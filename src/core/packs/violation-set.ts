/**
 * Set of violation identifiers with structural equality.
 */
import type { ViolationIdentifier } from './types.js';

export function violationKey(violation: ViolationIdentifier): string {
  return [
    violation.violationType,
    violation.file,
    violation.constantName,
    violation.referencingPackName,
    violation.definingPackName,
  ].join('\u0000');
}

export class ViolationSet implements Iterable<ViolationIdentifier> {
  private readonly entries = new Map<string, ViolationIdentifier>();

  constructor(violations: Iterable<ViolationIdentifier> = []) {
    for (const violation of violations) {
      this.add(violation);
    }
  }

  add(violation: ViolationIdentifier): void {
    this.entries.set(violationKey(violation), violation);
  }

  has(violation: ViolationIdentifier): boolean {
    return this.entries.has(violationKey(violation));
  }

  get size(): number {
    return this.entries.size;
  }

  values(): ViolationIdentifier[] {
    return [...this.entries.values()];
  }

  [Symbol.iterator](): Iterator<ViolationIdentifier> {
    return this.entries.values();
  }
}

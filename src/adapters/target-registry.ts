/**
 * Registry of target systems the orchestrator can update.
 */

import { TargetDefinition } from './interfaces';

export class TargetRegistry {
  private targets = new Map<string, TargetDefinition>();

  /** Register (or replace) a target definition. */
  register(target: TargetDefinition): void {
    this.targets.set(target.id, target);
  }

  get(targetId: string): TargetDefinition | undefined {
    return this.targets.get(targetId);
  }

  has(targetId: string): boolean {
    return this.targets.has(targetId);
  }

  ids(): string[] {
    return [...this.targets.keys()].sort();
  }
}

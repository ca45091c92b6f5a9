/**
 * Default remediation rules.
 *
 * Each rule pairs one known build failure signature with the revision patch
 * that corrects it. A rule only matches when the failure carries the value
 * its patch needs; it never guesses one.
 */

import { RevisionPatch } from '../domain/revision';
import { BuildFailure } from './builder-adapter';

export interface RemediationRule {
  id: string;
  /** Failure signature this rule answers. */
  failureClass: string;
  description: string;
  predicate(failure: BuildFailure): boolean;
  transform(failure: BuildFailure): RevisionPatch;
}

export const addMissingDependency: RemediationRule = {
  id: 'add-missing-dependency',
  failureClass: 'missing-dependency',
  description: 'Add the dependency the build reported as missing',
  predicate: (failure) => failure.failureClass === 'missing-dependency' && Boolean(failure.hints.dependency),
  transform: (failure) => ({ op: 'add-dependency', name: failure.hints.dependency }),
};

export const renameDeprecatedOption: RemediationRule = {
  id: 'rename-deprecated-option',
  failureClass: 'renamed-option',
  description: 'Move a renamed option to its new path',
  predicate: (failure) =>
    failure.failureClass === 'renamed-option' && Boolean(failure.hints.option) && Boolean(failure.hints.replacement),
  transform: (failure) => ({ op: 'rename-option', from: failure.hints.option, to: failure.hints.replacement }),
};

export const refreshSourceHash: RemediationRule = {
  id: 'refresh-source-hash',
  failureClass: 'hash-mismatch',
  description: 'Refresh the pinned hash of a source whose content changed',
  predicate: (failure) => failure.failureClass === 'hash-mismatch' && Boolean(failure.hints.source),
  transform: (failure) => ({ op: 'refresh-hash', source: failure.hints.source }),
};

export const forceConflictingPriority: RemediationRule = {
  id: 'force-conflicting-priority',
  failureClass: 'conflicting-definition',
  description: 'Give the revision\'s own definition of a conflicting option priority',
  predicate: (failure) => failure.failureClass === 'conflicting-definition' && Boolean(failure.hints.option),
  transform: (failure) => ({ op: 'force-priority', option: failure.hints.option }),
};

/** Checked in this order; the first match wins. */
export const DEFAULT_REMEDIATION_RULES: readonly RemediationRule[] = [
  addMissingDependency,
  renameDeprecatedOption,
  refreshSourceHash,
  forceConflictingPriority,
];

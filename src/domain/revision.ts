/**
 * Revision domain model.
 *
 * A revision is an identified desired-state configuration input, before it
 * is built. Revisions are immutable: remediation derives a new revision with
 * one more patch instead of editing the one it was given.
 */

import { createHash } from 'crypto';

/** Corrective rewrite applied to a revision by a remediation rule. */
export type RevisionPatch =
  | { op: 'add-dependency'; name: string }
  | { op: 'rename-option'; from: string; to: string }
  | { op: 'refresh-hash'; source: string }
  | { op: 'force-priority'; option: string };

export type RevisionPatchOp = RevisionPatch['op'];

export interface Revision {
  /** Content hash or monotonic tag. */
  id: string;
  /** Component names touched by this revision; the issue registry is queried by these. */
  components: string[];
  /** Opaque reference to the raw configuration payload. */
  payloadRef: string;
  /** Revision this one was derived from by remediation. */
  parentId?: string;
  /** Patches applied on top of the fetched payload, oldest first. */
  patches: RevisionPatch[];
  fetchedAt: string;
}

/** Describe a patch in one line, for logs and reports. */
export function describePatch(patch: RevisionPatch): string {
  switch (patch.op) {
    case 'add-dependency':
      return `add dependency ${patch.name}`;
    case 'rename-option':
      return `rename option ${patch.from} to ${patch.to}`;
    case 'refresh-hash':
      return `refresh hash of ${patch.source}`;
    case 'force-priority':
      return `force priority of ${patch.option}`;
  }
}

/** Structural equality for patches; used to avoid applying the same fix twice. */
export function samePatch(a: RevisionPatch, b: RevisionPatch): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Derive a new revision by appending a patch. The id is
 * `<parentId>+<12 hex chars>` where the hash covers the parent id and the
 * full patch list.
 */
export function deriveRevision(parent: Revision, patch: RevisionPatch): Revision {
  const patches = [...parent.patches, patch];
  const digest = createHash('sha256')
    .update(JSON.stringify({ parentId: parent.id, patches }))
    .digest('hex')
    .slice(0, 12);
  return {
    id: `${parent.id}+${digest}`,
    components: [...parent.components],
    payloadRef: parent.payloadRef,
    parentId: parent.id,
    patches,
    fetchedAt: parent.fetchedAt,
  };
}

/**
 * Check the shape of a revision handed over by a configuration source.
 * Returns the list of problems; empty means valid.
 */
export function validateRevision(value: unknown): string[] {
  if (!isRecord(value)) {
    return ['revision must be an object'];
  }
  const problems: string[] = [];
  const candidate = value;
  if (typeof candidate.id !== 'string' || candidate.id.trim() === '') {
    problems.push('id must be a non-empty string');
  }
  if (!Array.isArray(candidate.components) || !candidate.components.every((c) => typeof c === 'string')) {
    problems.push('components must be an array of strings');
  }
  if (typeof candidate.payloadRef !== 'string') {
    problems.push('payloadRef must be a string');
  }
  if (candidate.patches !== undefined && !Array.isArray(candidate.patches)) {
    problems.push('patches must be an array when present');
  }
  return problems;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Id of the fetched revision a (possibly remediated) revision descends from.
 * Each patch appended one `+<12 hex>` suffix.
 */
export function originRevisionId(revision: Revision): string {
  let id = revision.id;
  for (let i = 0; i < revision.patches.length; i++) {
    id = id.replace(/\+[0-9a-f]{12}$/, '');
  }
  return id;
}

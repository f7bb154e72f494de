import type { Chunk, Label, PartitionResult } from "./types";

/**
 * Classification result for one chunk. `null` marks a chunk whose
 * classification failed outright.
 */
export type Assignment = Label | null;

const normalizeLabel = (label: string): string => label.trim().toLowerCase();

/**
 * Resolves a raw classification to one of the proposed labels.
 * Exact matches win; otherwise a match ignoring surrounding whitespace and case
 * is accepted. Returns `null` when nothing matches.
 */
export function resolveLabel(raw: Assignment, labels: readonly Label[]): Label | null {
  if (raw === null) {
    return null;
  }
  if (labels.includes(raw)) {
    return raw;
  }
  const wanted = normalizeLabel(raw);
  if (!wanted) {
    return null;
  }
  return labels.find((label) => normalizeLabel(label) === wanted) ?? null;
}

/**
 * Groups chunks by their assigned label.
 *
 * Every proposed label becomes a key, even when nothing lands in it, and every
 * chunk ends up in exactly one group. Chunks keep their input order inside
 * their group.
 */
export function assignToGroups(
  chunks: readonly Chunk[],
  labels: readonly Label[],
  assignments: readonly Assignment[],
): PartitionResult {
  if (assignments.length !== chunks.length) {
    throw new Error(
      `Expected ${chunks.length} assignments but received ${assignments.length}`,
    );
  }

  const groups = new Map<Label, Chunk[]>();
  for (const label of labels) {
    if (!groups.has(label)) {
      groups.set(label, []);
    }
  }
  const unclassified: Chunk[] = [];

  chunks.forEach((chunk, index) => {
    const label = resolveLabel(assignments[index] ?? null, labels);
    const group = label === null ? undefined : groups.get(label);
    if (group) {
      group.push(chunk);
    } else {
      unclassified.push(chunk);
    }
  });

  return { groups, unclassified };
}

/**
 * Classifies every chunk in parallel and groups the results.
 * Results are joined by position, so completion order never affects grouping.
 */
export async function partition(
  chunks: readonly Chunk[],
  labels: readonly Label[],
  classify: (chunk: Chunk, index: number) => Promise<Assignment>,
): Promise<PartitionResult> {
  const assignments = await Promise.all(chunks.map((chunk, i) => classify(chunk, i)));
  return assignToGroups(chunks, labels, assignments);
}

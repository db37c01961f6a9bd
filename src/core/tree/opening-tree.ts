/**
 * Opening Tree Builder
 *
 * Turns a set of lines into a decision tree: the moves every line shares,
 * then, position by position, which continuations exist and how many lines
 * follow each. Reading it top-down gives "if they play X, answer Y".
 */

import type { NamedLine } from '../models';
import { longestCommonPrefix } from '../moves';

/** Token used for lines that have no move at the branching position */
export const END_TOKEN = '<END>';

/** Maximum number of example names carried by a branch */
export const MAX_EXAMPLE_NAMES = 5;

/**
 * One continuation at a divergence point.
 */
export interface BranchNode {
  /** The move at this position, or END_TOKEN */
  token: string;
  /** Number of lines that continue with this move */
  count: number;
  /** Up to five line names, sorted ascending */
  exampleNames: string[];
}

/**
 * A branch with its sub-branches at the next position.
 */
export interface BranchTreeNode extends BranchNode {
  children: BranchTreeNode[];
}

export interface OpeningTree {
  /** Moves shared by every line */
  commonPrefix: string[];
  /** Branches at the first position after the common prefix */
  branches: BranchTreeNode[];
}

function tokenAt(line: NamedLine, position: number): string {
  return position < line.tokens.length ? line.tokens[position] : END_TOKEN;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Groups lines by their move at `position`, keeping the groups' members so
 * the tree builder can recurse into them.
 */
function groupByToken<T extends NamedLine>(
  lines: readonly T[],
  position: number
): { node: BranchNode; members: T[] }[] {
  const buckets = new Map<string, T[]>();
  for (const line of lines) {
    const token = tokenAt(line, position);
    const bucket = buckets.get(token);
    if (bucket) {
      bucket.push(line);
    } else {
      buckets.set(token, [line]);
    }
  }

  const groups = Array.from(buckets, ([token, members]) => ({
    node: {
      token,
      count: members.length,
      exampleNames: members
        .map((line) => line.name)
        .sort(compareText)
        .slice(0, MAX_EXAMPLE_NAMES),
    },
    members,
  }));

  // Most common continuation first; ties broken by token for stable output
  groups.sort((a, b) => b.node.count - a.node.count || compareText(a.node.token, b.node.token));
  return groups;
}

/**
 * The continuations at `position`, most common first.
 *
 * @example
 * branch(lines, 2);
 * // [{ token: 'Nf3', count: 2, exampleNames: [...] }, { token: 'Bc4', count: 1, ... }]
 */
export function branch(lines: readonly NamedLine[], position: number): BranchNode[] {
  return groupByToken(lines, position).map((group) => group.node);
}

/**
 * Builds the branch tree below the lines' common prefix, `maxDepth` levels
 * deep.
 *
 * A branch is expanded further only when it is a real move shared by more
 * than one line; an END_TOKEN or single-line branch has nothing left to
 * disambiguate. Recursion depth is bounded by `maxDepth` alone.
 */
export function buildTree(lines: readonly NamedLine[], maxDepth: number): OpeningTree {
  const commonPrefix = longestCommonPrefix(lines.map((line) => line.tokens));

  const expand = (subset: readonly NamedLine[], position: number, depth: number): BranchTreeNode[] => {
    if (depth <= 0 || subset.length === 0) {
      return [];
    }

    return groupByToken(subset, position).map(({ node, members }) => ({
      ...node,
      children:
        node.token !== END_TOKEN && node.count > 1
          ? expand(members, position + 1, depth - 1)
          : [],
    }));
  };

  return {
    commonPrefix,
    branches: expand(lines, commonPrefix.length, maxDepth),
  };
}

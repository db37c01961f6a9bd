/**
 * tree: the branching structure of a set of lines, read as a decision
 * tree ("if they play X, respond with Y").
 */

import { Command } from 'commander';
import { buildTree, type BranchTreeNode, type OpeningTree } from '@/core/tree';
import { OpeningRepository } from '@/storage/repositories';
import type { CliContext } from '../context';
import { intOption } from '../utils/options';
import { bold, cyan, dim, yellow } from '../utils/terminal';

interface TreeOptions {
  prefix: string;
  limit: number;
  levels: number;
}

function formatBranches(nodes: readonly BranchTreeNode[], depth: number, out: string[]): void {
  const indent = `${'  '.repeat(depth)}- `;
  for (const node of nodes) {
    out.push(`${indent}${cyan(node.token)}  ${dim(`(${node.count})`)}  ${node.exampleNames.join(', ')}`);
    formatBranches(node.children, depth + 1, out);
  }
}

/**
 * Renders a tree as printable lines: the common start, then the branches
 * indented by level.
 */
export function formatTree(tree: OpeningTree): string[] {
  const out = [
    `${bold('Common start')} (${tree.commonPrefix.length} tokens)`,
    tree.commonPrefix.length > 0 ? tree.commonPrefix.join(' ') : dim('(none)'),
    '',
    bold('Next branches'),
  ];
  formatBranches(tree.branches, 0, out);
  return out;
}

export function createTreeCommand(ctx: CliContext): Command {
  return new Command('tree')
    .description('Show the branching structure: common prefix, then the usual next moves')
    .option('--prefix <prefix>', 'Filter by opening name prefix', ctx.settings.studyPrefix)
    .option('--limit <n>', 'Maximum lines to include', intOption(1, 1000), 200)
    .option('--levels <n>', 'How many branching levels to show', intOption(1, 6), 3)
    .action(async (options: TreeOptions) => {
      const lines = await new OpeningRepository(ctx.db()).findByPrefix(options.prefix, options.limit);
      if (lines.length === 0) {
        ctx.io.print(`${yellow('No openings found')} for prefix '${options.prefix}'.`);
        return;
      }

      for (const line of formatTree(buildTree(lines, options.levels))) {
        ctx.io.print(line);
      }
    });
}

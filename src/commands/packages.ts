import { Command } from 'commander';

import type { CommandResult, GlobalOptions } from '../types/index.js';
import { loadProject } from '../core/project/project-loader.js';
import { getPackageNames } from '../core/selection/index.js';
import { resolveOutput, type OutputPort } from '../core/ports/index.js';
import { withErrorHandling } from '../utils/errors.js';

/**
 * Print the packages that contribute at least one node to the graph.
 */
export async function runPackagesCommand(
  projectDir: string,
  ctx?: { output?: OutputPort }
): Promise<CommandResult<string[]>> {
  const output = resolveOutput(ctx);
  const { graph, catalog } = await loadProject(projectDir);
  const names = Array.from(getPackageNames(graph, catalog)).sort();

  if (names.length === 0) {
    output.warn('The project declares no resources.');
    return { success: true, data: [] };
  }

  for (const name of names) {
    output.message(name);
  }
  return { success: true, data: names };
}

export function setupPackagesCommand(program: Command): void {
  program
    .command('packages')
    .description('List the packages present in the dependency graph')
    .action(withErrorHandling(async (_options: Record<string, never>, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await runPackagesCommand(globals.projectDir ?? process.cwd());
    }));
}

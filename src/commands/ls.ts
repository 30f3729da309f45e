import { Command, Option } from 'commander';

import type { CommandResult, GlobalOptions, LsOptions, NodeMetadata } from '../types/index.js';
import { DEFAULT_SELECTION, LS_OUTPUT_FORMATS, RESOURCE_KINDS } from '../constants/index.js';
import { loadProject } from '../core/project/project-loader.js';
import { NodeSelector } from '../core/selection/index.js';
import { resolveOutput, type OutputPort } from '../core/ports/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatNodeLine } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';

/**
 * Flatten spec tokens: each flag value may hold several
 * whitespace-separated specs (`-s "tag:nightly orders+"`).
 */
export function splitSpecs(values: readonly string[] | undefined): string[] {
  return (values ?? []).flatMap(value => value.split(/\s+/)).filter(Boolean);
}

function byUniqueId(a: NodeMetadata, b: NodeMetadata): number {
  return a.uniqueId < b.uniqueId ? -1 : a.uniqueId > b.uniqueId ? 1 : 0;
}

/**
 * Resolve the selection for `ls` and render it, sorted by identifier.
 */
export async function runLsCommand(
  projectDir: string,
  options: LsOptions,
  ctx?: { output?: OutputPort }
): Promise<CommandResult<NodeMetadata[]>> {
  const output = resolveOutput(ctx);
  const include = splitSpecs(options.select);
  const exclude = splitSpecs(options.exclude);
  const resourceType = options.resourceType ?? 'all';
  const format = options.output ?? 'id';

  const { graph, catalog } = await loadProject(projectDir);
  const selector = new NodeSelector(catalog);
  const selectedIds = selector.selectNodes(
    graph,
    include.length > 0 ? include : DEFAULT_SELECTION,
    exclude
  );

  const nodes = Array.from(selectedIds)
    .map(id => catalog.lookup(id))
    .filter(node => resourceType === 'all' || node.kind === resourceType)
    .sort(byUniqueId);

  logger.debug(`ls selected ${nodes.length} of ${graph.size} node(s)`);

  if (nodes.length === 0) {
    const warning = 'No nodes selected. Check the --select and --exclude specs.';
    output.warn(warning);
    return { success: true, data: [], warnings: [warning] };
  }

  for (const node of nodes) {
    output.message(formatNodeLine(node, format));
  }
  return { success: true, data: nodes };
}

export function setupLsCommand(program: Command): void {
  program
    .command('ls')
    .alias('list')
    .description('List the resources selected by --select and --exclude')
    .option('-s, --select <specs...>', 'specs of the resources to include (default: *)')
    .option('--exclude <specs...>', 'specs of the resources to leave out')
    .addOption(
      new Option('--resource-type <type>', 'only list resources of this kind')
        .choices([...RESOURCE_KINDS, 'all'])
        .default('all')
    )
    .addOption(
      new Option('-o, --output <format>', 'output format')
        .choices([...LS_OUTPUT_FORMATS])
        .default('id')
    )
    .action(withErrorHandling(async (options: LsOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const projectDir = globals.projectDir ?? process.cwd();
      logger.debug(`Listing resources in ${projectDir}`);
      await runLsCommand(projectDir, options);
    }));
}

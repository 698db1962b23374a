/**
 * Standard tool set.
 *
 * Builds the sandbox, the risk classifier and a registry holding every
 * workspace tool, all bound to one workspace root passed in by the
 * caller.
 */

import { ToolRegistry } from './registry.js';
import { createFileTools } from './file.js';
import { createSearchTools } from './search.js';
import { createBashTool } from './bash.js';
import { CommandRiskClassifier } from './command-risk.js';
import { PathSandbox } from '../integrations/path-sandbox.js';

export { ToolRegistry, defineTool } from './registry.js';

export interface StandardToolsOptions {
  workspaceRoot: string;
  /** Default bash timeout in seconds */
  bashTimeoutSec?: number;
}

export interface StandardTools {
  registry: ToolRegistry;
  sandbox: PathSandbox;
  classifier: CommandRiskClassifier;
}

export function createStandardRegistry(options: StandardToolsOptions): StandardTools {
  const sandbox = new PathSandbox(options.workspaceRoot);
  const classifier = new CommandRiskClassifier({ workspaceRoot: sandbox.root });
  const registry = new ToolRegistry();

  const tools = [
    ...createFileTools(sandbox),
    ...createSearchTools(sandbox),
    createBashTool({ sandbox, classifier, defaultTimeoutSec: options.bashTimeoutSec }),
  ];
  for (const tool of tools) {
    registry.register(tool);
  }

  return { registry, sandbox, classifier };
}

import type { Definition, NodeDefinition } from './definitions/types';
import { DefinitionError, ExecutionError, ValidationError, describeError } from './errors';
import type { NodeRegistry } from './nodes/registry';
import type { NodeResult } from './nodes/types';
import type { Logger } from './observability/logger';
import type { EngineMetrics } from './observability/metrics';
import type { RunContext } from './runtime/types';

export type ExecutedNode = {
  nodeId: string;
  type: string;
  result: NodeResult;
};

export type OrchestratorOptions = {
  registry: NodeRegistry;
  context: RunContext;
  logger: Logger;
  metrics?: EngineMetrics;
};

function lookupNode(definition: Definition, nodeId: string): NodeDefinition | undefined {
  return Object.hasOwn(definition.nodes, nodeId) ? definition.nodes[nodeId] : undefined;
}

/**
 * Walks the graph depth-first from each entry point in order, executing every reachable node
 * once. Node references are resolved lazily, so nodes executed before a missing reference or a
 * cycle is found keep their side effects.
 */
export async function executeDefinition(
  definition: Definition,
  options: OrchestratorOptions
): Promise<ExecutedNode[]> {
  const { registry, context, logger, metrics } = options;
  const completed = new Set<string>();
  const inProgress: string[] = [];
  const executed: ExecutedNode[] = [];

  const runNode = async (node: NodeDefinition, nodeId: string): Promise<void> => {
    const executor = registry.get(node.type);
    if (!executor) {
      throw new DefinitionError(`unsupported node type: ${node.type}`);
    }

    try {
      executor.validateConfig(node.config);
    } catch (err) {
      metrics?.nodeExecutions.inc({ type: node.type, outcome: 'invalid' });
      if (err instanceof ValidationError) {
        throw new ValidationError(`node ${nodeId} has invalid config: ${err.message}`, err.details);
      }
      throw err;
    }

    logger.info('Executing node', { executionId: context.executionId, nodeId, type: node.type });

    let result: NodeResult;
    try {
      result = await executor.execute(
        { executionId: context.executionId, nodeId, activities: context.activities, logger },
        node.config
      );
    } catch (err) {
      metrics?.nodeExecutions.inc({ type: node.type, outcome: 'error' });
      throw new ExecutionError(`node ${nodeId} failed: ${describeError(err)}`, {
        kind: 'infrastructure',
        nodeId,
        cause: err
      });
    }

    executed.push({ nodeId, type: node.type, result });
    if (!result.success) {
      metrics?.nodeExecutions.inc({ type: node.type, outcome: 'failed' });
      throw new ExecutionError(`node ${nodeId} failed: ${result.error ?? 'unknown error'}`, {
        kind: 'logical',
        nodeId
      });
    }
    metrics?.nodeExecutions.inc({ type: node.type, outcome: 'succeeded' });
  };

  const visit = async (nodeId: string, node: NodeDefinition): Promise<void> => {
    if (completed.has(nodeId)) {
      return;
    }
    if (inProgress.includes(nodeId)) {
      throw new DefinitionError(`cycle detected: ${[...inProgress, nodeId].join(' -> ')}`);
    }

    inProgress.push(nodeId);
    await runNode(node, nodeId);

    for (const nextId of node.next) {
      const nextNode = lookupNode(definition, nextId);
      if (!nextNode) {
        throw new DefinitionError(`next node not found: ${nextId}`);
      }
      await visit(nextId, nextNode);
    }

    inProgress.pop();
    completed.add(nodeId);
  };

  for (const entryId of definition.entryPoints) {
    const entryNode = lookupNode(definition, entryId);
    if (!entryNode) {
      throw new DefinitionError(`entry point node not found: ${entryId}`);
    }
    await visit(entryId, entryNode);
  }

  return executed;
}

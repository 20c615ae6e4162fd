import { HttpNodeExecutor, type HttpNodeExecutorOptions } from './http';
import type { NodeExecutor } from './types';

export class NodeRegistry {
  private readonly executors = new Map<string, NodeExecutor>();

  /** Re-registering a type replaces the previous executor. */
  register(type: string, executor: NodeExecutor): this {
    this.executors.set(type, executor);
    return this;
  }

  get(type: string): NodeExecutor | undefined {
    return this.executors.get(type);
  }

  has(type: string): boolean {
    return this.executors.has(type);
  }

  types(): string[] {
    return Array.from(this.executors.keys()).sort();
  }
}

export type NodeRegistryOptions = {
  http?: HttpNodeExecutorOptions;
};

export function createNodeRegistry(options: NodeRegistryOptions = {}): NodeRegistry {
  const registry = new NodeRegistry();
  const http = new HttpNodeExecutor(options.http);
  registry.register(http.type, http);
  return registry;
}

export type NodeDefinition = {
  id: string;
  type: string;
  /** Opaque to everything except the executor registered for `type`. */
  config: unknown;
  next: string[];
};

export type Definition = {
  name: string;
  version: string;
  nodes: Record<string, NodeDefinition>;
  entryPoints: string[];
};

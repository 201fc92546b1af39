import { NodeId } from './Node.js';

export class GraphError extends Error {
  constructor(
    message: string,
    public nodeId?: NodeId
  ) {
    const nodeInfo = nodeId !== undefined ? ` (node ${nodeId})` : '';
    super(`Graph error: ${message}${nodeInfo}`);
    this.name = 'GraphError';
  }
}

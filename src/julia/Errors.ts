import { NodeId } from '../graph/Node.js';

export class UnsupportedNodeKindError extends Error {
  constructor(
    public kind: string,
    public nodeId: NodeId
  ) {
    super(`Conversion to Julia not implemented for a node of kind '${kind}' (node ${nodeId})`);
    this.name = 'UnsupportedNodeKindError';
  }
}

export class UnsupportedInputError extends Error {
  constructor(
    public reason: string,
    public nodeId?: NodeId
  ) {
    const nodeInfo = nodeId !== undefined ? ` (node ${nodeId})` : '';
    super(`Unsupported input: ${reason}${nodeInfo}`);
    this.name = 'UnsupportedInputError';
  }
}

/**
 * Insertion-ordered queue of lowered instructions
 *
 * Lowering pushes in post-order, which is a topological order. Emission
 * shifts each entry exactly once and may rewrite entries still pending.
 */

import { NodeId } from '../graph/Node.js';
import { Instruction } from './Instruction.js';

export interface QueueEntry {
  id: NodeId;
  instruction: Instruction;
}

export class InstructionQueue {
  private order: NodeId[] = [];
  private head = 0;
  private entries: Map<NodeId, Instruction> = new Map();

  get length(): number {
    return this.order.length - this.head;
  }

  has(id: NodeId): boolean {
    return this.entries.has(id);
  }

  get(id: NodeId): Instruction | undefined {
    return this.entries.get(id);
  }

  push(id: NodeId, instruction: Instruction): void {
    if (this.entries.has(id)) {
      throw new Error(`Instruction for node ${id} is already queued`);
    }
    this.order.push(id);
    this.entries.set(id, instruction);
  }

  /**
   * Remove and return the oldest entry
   */
  shift(): QueueEntry | undefined {
    if (this.head >= this.order.length) {
      return undefined;
    }
    const id = this.order[this.head++];
    const instruction = this.entries.get(id);
    this.entries.delete(id);
    return instruction === undefined ? undefined : { id, instruction };
  }

  /**
   * Entries not yet shifted, oldest first
   */
  *pending(): IterableIterator<QueueEntry> {
    for (let i = this.head; i < this.order.length; i++) {
      const id = this.order[i];
      const instruction = this.entries.get(id);
      if (instruction !== undefined) {
        yield { id, instruction };
      }
    }
  }

  replace(id: NodeId, instruction: Instruction): void {
    if (!this.entries.has(id)) {
      throw new Error(`No pending instruction for node ${id}`);
    }
    this.entries.set(id, instruction);
  }
}

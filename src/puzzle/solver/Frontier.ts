// Priority frontier over puzzle states

import FastPriorityQueue from 'fastpriorityqueue';
import type { PuzzleState } from './PuzzleState';

export interface FrontierEntry {
  priority: number;
  state: PuzzleState;
  seq: number;  // insertion order, last tie-break
}

// Min-heap order: priority, then the state ordering, then insertion order
export function entryLess(a: FrontierEntry, b: FrontierEntry): boolean {
  if (a.priority !== b.priority) return a.priority < b.priority;
  const order = a.state.compareTo(b.state);
  if (order !== 0) return order < 0;
  return a.seq < b.seq;
}

export class Frontier {
  private queue = new FastPriorityQueue<FrontierEntry>(entryLess);
  private nextSeq = 0;

  push(priority: number, state: PuzzleState): void {
    this.queue.add({ priority, state, seq: this.nextSeq++ });
  }

  pop(): FrontierEntry | undefined {
    return this.queue.poll();
  }

  isEmpty(): boolean {
    return this.queue.isEmpty();
  }

  get size(): number {
    return this.queue.size;
  }
}

import { compareWorkItems } from "../domain/work-item";
import type { WorkItem } from "../domain/models";
import { MinHeap } from "./min-heap";

export interface ItemAccumulator {
  readonly capacity: number;
  readonly size: number;
  readonly full: boolean;
  /** Returns true when the item is kept. */
  offer(item: WorkItem): boolean;
  /** Returns the kept items best-first and empties the accumulator. */
  drain(): WorkItem[];
}

/** Keeps the `capacity` highest-ranked items seen, using a bounded min-heap. */
export class TopKAccumulator implements ItemAccumulator {
  private readonly heap = new MinHeap<WorkItem>(compareWorkItems);

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.heap.size;
  }

  get full(): boolean {
    return this.heap.size >= this.capacity;
  }

  offer(item: WorkItem): boolean {
    if (this.capacity <= 0) {
      return false;
    }
    if (this.heap.size < this.capacity) {
      this.heap.push(item);
      return true;
    }

    const worst = this.heap.peek();
    if (worst && compareWorkItems(item, worst) > 0) {
      this.heap.replaceTop(item);
      return true;
    }
    return false;
  }

  drain(): WorkItem[] {
    const items = this.heap.toArray().sort((a, b) => compareWorkItems(b, a));
    this.heap.clear();
    return items;
  }
}

/** For sources that already deliver best-first: keep the first `capacity` items. */
export class TruncatingAccumulator implements ItemAccumulator {
  private items: WorkItem[] = [];

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.items.length;
  }

  get full(): boolean {
    return this.items.length >= this.capacity;
  }

  offer(item: WorkItem): boolean {
    if (this.full) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  drain(): WorkItem[] {
    const items = this.items;
    this.items = [];
    return items;
  }
}

export function createAccumulator(capacity: number, options: { presorted?: boolean } = {}): ItemAccumulator {
  return options.presorted ? new TruncatingAccumulator(capacity) : new TopKAccumulator(capacity);
}

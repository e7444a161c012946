/**
 * Hands out transaction ids 1, 2, 3, ... in creation order. One allocator
 * per ledger; nothing else may mint ids.
 */
export class SequentialIdAllocator {
  private last: number;

  constructor(start = 1) {
    this.last = start - 1;
  }

  next(): number {
    this.last += 1;
    return this.last;
  }

  /** Last id handed out, or start - 1 before the first call */
  peek(): number {
    return this.last;
  }

  reset(start = 1): void {
    this.last = start - 1;
  }
}

/**
 * Anything that can sit in a {@link PriorityQueue}: lower `priority` values
 * leave the queue first.
 */
export interface Prioritized {
  readonly priority: number;
}

interface Slot<T> {
  value: T;
  priority: number;
  seq: number;
}

/**
 * Unbounded binary min-heap ordered by `(priority, arrival)`.
 * Items of equal priority come out in the order they were pushed.
 */
export class PriorityQueue<T extends Prioritized> {
  private a: Slot<T>[] = [];
  private seq = 0;

  push(v: T) {
    this.a.push({ value: v, priority: v.priority, seq: this.seq++ });
    this.up(this.a.length - 1);
  }

  shift(): T | undefined {
    const top = this.a[0];
    if (!top) return undefined;
    const last = this.a.pop();
    if (last && this.a.length > 0) {
      this.a[0] = last;
      this.down(0);
    }
    return top.value;
  }

  peek(): T | undefined { return this.a[0]?.value; }
  get length() { return this.a.length; }
  kill() { this.a = []; }

  private less(i: number, j: number): boolean {
    const x = this.a[i];
    const y = this.a[j];
    if (x.priority !== y.priority) return x.priority < y.priority;
    return x.seq < y.seq;
  }

  private swap(i: number, j: number) {
    const t = this.a[i];
    this.a[i] = this.a[j];
    this.a[j] = t;
  }

  private up(i: number) {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private down(i: number) {
    const n = this.a.length;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let m = i;
      if (l < n && this.less(l, m)) m = l;
      if (r < n && this.less(r, m)) m = r;
      if (m === i) return;
      this.swap(i, m);
      i = m;
    }
  }
}

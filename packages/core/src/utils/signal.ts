/**
 * One-shot async wake-up shared by every waiter registered since the last
 * `notify()`. Each `notify()` releases the current waiters and re-arms.
 */
export class Signal {
  private release: () => void = () => { };
  private waiting = this.arm();

  wait(): Promise<void> {
    return this.waiting;
  }

  notify(): void {
    const release = this.release;
    this.waiting = this.arm();
    release();
  }

  private arm(): Promise<void> {
    return new Promise((resolve) => (this.release = resolve));
  }
}

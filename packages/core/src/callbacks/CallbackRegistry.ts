import type { Header, Packet } from '../types/wire.js';
import type { Message } from '../types/message.js';
import type { CallbackFn, CallbackOptions, CallbackOutcome } from './types.js';

import { dlog } from '../utils/debug.js';

interface CallbackEntry<P extends Packet> {
  invoke: (outcome: CallbackOutcome<P>) => void;
  daemon: boolean;
  deadline?: number;
}

/**
 * Maps the header of an expected reply to the callback waiting for it.
 *
 * Expiry is lazy: overdue entries are only swept when the next inbound
 * message (of any header) goes through {@link onMessageArrival}. An entry
 * whose deadline passes while the link is silent stays pending until
 * something arrives.
 *
 * @template P - The packet type carried by delivered messages.
 */
export class CallbackRegistry<P extends Packet = Packet> {
  private readonly entries = new Map<Header, CallbackEntry<P>>();

  /**
   * Stores the callback for `header`, replacing any existing entry.
   *
   * @param args - Extra arguments passed to `handler` after the outcome.
   *
   * @example
   * registry.register(cmd.rxHeader, (outcome, attempt) => {
   *   if (outcome.expired) retry(cmd, attempt + 1);
   * }, { deadline: Date.now() + 3_000 }, 1);
   */
  public register<A extends unknown[]>(
    header: Header,
    handler: CallbackFn<A, P>,
    options: CallbackOptions = {},
    ...args: A
  ): void {
    if (this.entries.has(header)) dlog('ramses:callbacks', `replacing callback for ${header}`);
    this.entries.set(header, {
      invoke: (outcome) => handler(outcome, ...args),
      daemon: options.daemon ?? false,
      deadline: options.deadline,
    });
  }

  public has(header: Header): boolean {
    return this.entries.has(header);
  }

  public remove(header: Header): boolean {
    return this.entries.delete(header);
  }

  public clear(): void {
    this.entries.clear();
  }

  public get size(): number {
    return this.entries.size;
  }

  /**
   * Runs the expiry sweep, then fires the entry matching `msg.header`.
   *
   * @param now - Epoch milliseconds used for the sweep.
   */
  public onMessageArrival(msg: Message<P>, now: number = Date.now()): void {
    for (const [header, entry] of [...this.entries]) {
      if (entry.daemon || entry.deadline === undefined || entry.deadline > now) continue;
      this.entries.delete(header);
      dlog('ramses:callbacks', `expired: ${header}`);
      this.fire(header, entry, { expired: true, header });
    }

    const entry = this.entries.get(msg.header);
    if (!entry) return;
    if (!entry.daemon) this.entries.delete(msg.header);
    this.fire(msg.header, entry, { expired: false, header: msg.header, msg });
  }

  private fire(header: Header, entry: CallbackEntry<P>, outcome: CallbackOutcome<P>) {
    try {
      entry.invoke(outcome);
    } catch (err) {
      console.warn(`[CallbackRegistry] callback for ${header} failed:`, err);
    }
  }
}

/**
 * The write side of a transport/protocol pair.
 *
 * @template W - The unit accepted by `write`.
 * @template Extra - Optional information exposed through `getExtraInfo`.
 */
export interface Transport<W, Extra extends object = {}> {
  /** Buffers `data` for asynchronous sending; never blocks. */
  write(data: W): void | Promise<void>;

  /** Flushes buffered data asynchronously, then notifies `connectionLost`. */
  close(): void;

  /** Drops buffered data and closes now. */
  abort(): void;

  isClosing(): boolean;

  getExtraInfo<K extends keyof Extra>(name: K): Extra[K] | undefined;
}

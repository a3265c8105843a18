// Per-key async mutex. Work for one key runs strictly in arrival order;
// different keys never wait on each other.

interface Gate {
  promise: Promise<void>;
  release: () => void;
}

function createGate(): Gate {
  let release!: () => void;
  const promise = new Promise<void>((r) => {
    release = r;
  });
  return { promise, release };
}

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /** Runs `fn` once every earlier holder of `key` has finished. */
  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const gate = createGate();
    const tail = previous.then(() => gate.promise);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      gate.release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Keys with work queued or running. */
  get activeKeys(): number {
    return this.tails.size;
  }
}

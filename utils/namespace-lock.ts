/**
 * Per-namespace serialization. Work for one namespace runs strictly one after another
 * (a rejected task does not block the next one); different namespaces run in parallel.
 */

export class NamespaceLock {
  private readonly chains = new Map<string, Promise<void>>();

  runExclusive<T>(namespace: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(namespace) ?? Promise.resolve();
    const run = previous.then(fn, fn);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.chains.set(namespace, settled);
    void settled.then(() => {
      if (this.chains.get(namespace) === settled) this.chains.delete(namespace);
    });
    return run;
  }

  /** Namespaces with queued or running work. */
  get activeNamespaces(): number {
    return this.chains.size;
  }
}

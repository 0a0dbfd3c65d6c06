/**
 * Lazily creates one client per distinct configuration and hands the same
 * instance to every later caller.
 *
 * The pending creation is stored before it settles, so concurrent first use
 * of a configuration shares a single `create` call. A creation that rejects
 * is evicted and the next `get` tries again.
 */
export class ClientRegistry<TConfig, TClient> {
  private readonly clients = new Map<string, Promise<TClient>>();

  constructor(
    private readonly keyOf: (config: TConfig) => string,
    private readonly create: (config: TConfig) => TClient | Promise<TClient>
  ) {}

  get(config: TConfig): Promise<TClient> {
    const key = this.keyOf(config);
    const existing = this.clients.get(key);
    if (existing) return existing;

    const pending = Promise.resolve()
      .then(() => this.create(config))
      .catch((e: unknown) => {
        this.clients.delete(key);
        throw e;
      });
    this.clients.set(key, pending);
    return pending;
  }

  get size(): number {
    return this.clients.size;
  }

  clear(): void {
    this.clients.clear();
  }
}

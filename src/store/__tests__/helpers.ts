import type { RedisStoreClient } from "../redis-store.ts";

/** In-memory stand-in for the ioredis commands the store uses. */
export class FakeRedis implements RedisStoreClient {
  readonly counters = new Map<string, number>();
  readonly lists = new Map<string, string[]>();
  failWith: Error | null = null;
  quitError: Error | null = null;
  disconnected = false;
  quitCalls = 0;

  async incrby(key: string, increment: number): Promise<number> {
    this.check();
    const next = (this.counters.get(key) ?? 0) + increment;
    this.counters.set(key, next);
    return next;
  }

  async rpush(key: string, ...values: string[]): Promise<number> {
    this.check();
    const list = this.lists.get(key) ?? [];
    list.push(...values);
    this.lists.set(key, list);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    this.check();
    const list = this.lists.get(key) ?? [];
    return list.slice(start, stop === -1 ? undefined : stop + 1);
  }

  async quit(): Promise<string> {
    this.quitCalls++;
    if (this.quitError) throw this.quitError;
    return "OK";
  }

  disconnect(): void {
    this.disconnected = true;
  }

  private check(): void {
    if (this.failWith) throw this.failWith;
  }
}

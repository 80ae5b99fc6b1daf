/**
 * @parley/daemon — Key/Value Store
 *
 * Process-wide state (the remote catalog cache) lives behind this
 * interface. It is constructed once in main.ts and passed by reference
 * to whoever needs it; no module keeps its own mutable singleton.
 */

export interface KeyValueStore<V> {
    get(key: string): V | undefined;
    put(key: string, value: V): void;
    delete(key: string): boolean;
    keys(): string[];
}

export class InMemoryStore<V> implements KeyValueStore<V> {
    private readonly entries = new Map<string, V>();

    get(key: string): V | undefined {
        return this.entries.get(key);
    }

    put(key: string, value: V): void {
        this.entries.set(key, value);
    }

    delete(key: string): boolean {
        return this.entries.delete(key);
    }

    keys(): string[] {
        return Array.from(this.entries.keys());
    }
}

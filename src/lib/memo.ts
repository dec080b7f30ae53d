/**
 * Value cached against a version key. Reading with a key that differs from the
 * one the value was computed under recomputes; there is no other way in.
 */
export class Memo<T> {
    private cached: { key: string; value: T } | null = null;

    constructor(private readonly compute: () => T) {}

    get(key: string): T {
        if (this.cached && this.cached.key === key) return this.cached.value;
        const value = this.compute();
        this.cached = { key, value };
        return value;
    }
}

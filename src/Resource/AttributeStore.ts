import type { AttributeValue, WireObject, WireValue } from '../Types/Attribute.js';

/**
 * Per-instance attribute state.
 *
 * - decoded: wire-format values, the authoritative snapshot of what the server knows
 * - encoded: resolved domain values; a cache that may be dropped at any time
 * - changes: wire-format values written since the last save
 *
 * Whenever a decoded value changes its encoded entry is dropped.
 */
export class AttributeStore {
    private _decoded: WireObject;
    private _encoded: Map<string, AttributeValue> = new Map();
    private _changes: WireObject = {};

    constructor(attributes: Readonly<WireObject> = {}) {
        this._decoded = { ...attributes };
    }

    /** True when the key exists in decoded, whatever its value. */
    public has(name: string): boolean {
        return Object.prototype.hasOwnProperty.call(this._decoded, name);
    }

    /** Decoded value; `null` and missing both read as undefined. */
    public read(name: string): WireValue | undefined {
        if (!this.has(name)) {
            return undefined;
        }
        const value = this._decoded[name];
        return value === null ? undefined : value;
    }

    /** Sets a decoded value without recording a change (server-side truth, mirrors). */
    public seed(name: string, value: WireValue): void {
        this._decoded[name] = value;
        this._encoded.delete(name);
    }

    /**
     * Records a user write.
     * @param changeName string - Name under which the change is sent (after codec renames)
     * @param storedName string - Name under which decoded keeps the value
     */
    public write(changeName: string, storedName: string, value: WireValue): void {
        this._changes[changeName] = value;
        this._decoded[storedName] = value;
        this._encoded.delete(storedName);
    }

    public cached(name: string): AttributeValue | undefined {
        const value = this._encoded.get(name);
        return value === null ? undefined : value;
    }

    public cache(name: string, value: AttributeValue): void {
        this._encoded.set(name, value);
    }

    public invalidate(name: string): void {
        this._encoded.delete(name);
    }

    /** Replaces the whole snapshot (create response, refresh) and drops the cache. */
    public replace(attributes: Readonly<WireObject>): void {
        this._decoded = { ...attributes };
        this._encoded.clear();
    }

    /** Shallow copy of the decoded snapshot. */
    public raw(): WireObject {
        return { ...this._decoded };
    }

    public keys(): string[] {
        return Object.keys(this._decoded);
    }

    /** Shallow copy of the pending changes. */
    public changes(): WireObject {
        return { ...this._changes };
    }

    public clearChanges(): void {
        this._changes = {};
    }
}

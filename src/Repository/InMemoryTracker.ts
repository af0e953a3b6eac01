import { join } from 'path';
import { FormatDateTime } from '../Common/DateFormat.js';
import { NotFoundError } from '../Common/Errors.js';
import { isWireObject } from '../Common/Wire.js';
import type { Connection, HttpMethod, TransportResponse } from '../Domain/Manager.js';
import { lookup, MULTIPLE_ATTR_ID_MAP, SINGLE_ATTR_ID_MAP } from '../Resource/Mappings.js';
import type { ResourceType } from '../Resource/ResourceType.js';
import type { AttributeErrorPolicy, ConnectionSettings } from '../Types/Config.js';
import type { Identity, QueryParams, WireObject, WireValue } from '../Types/Attribute.js';

/** One request as the tracker saw it. */
export interface TrackerRequest {
    method: HttpMethod;
    path: string;
    data?: WireObject;
}

/** Query keys that steer paging or scoping rather than matching fields. */
const CONTROL_KEYS: ReadonlySet<string> = new Set([`include`, `limit`, `offset`, `sort`, `resource`]);

function sameIdentity(a: WireValue | undefined, b: Identity | WireValue): boolean {
    return a !== undefined && a !== null && String(a) === String(b);
}

function clone(record: WireObject): WireObject {
    return structuredClone(record);
}

/**
 * In-process tracker: a connection whose "server" is a set of record lists held in memory.
 * Used for development and as the test backend; every request is recorded in `requests`.
 * In production, a connection backed by the real HTTP API takes its place.
 */
export class InMemoryTracker implements Connection {
    public readonly url: string;
    public readonly dateFormat: string;
    public readonly datetimeFormat: string;
    public readonly version?: string;
    public readonly raiseAttrException: AttributeErrorPolicy;

    private _records: Map<string, WireObject[]> = new Map();
    private _requests: TrackerRequest[] = [];
    private _nextId = 1;

    constructor(settings: Partial<ConnectionSettings> = {}) {
        this.url = settings.url ?? `https://tracker.test`;
        this.dateFormat = settings.dateFormat ?? `%Y-%m-%d`;
        this.datetimeFormat = settings.datetimeFormat ?? `%Y-%m-%dT%H:%M:%SZ`;
        this.version = settings.version;
        this.raiseAttrException = settings.raiseAttrException ?? true;
    }

    /** Requests received so far, oldest first. */
    public get requests(): readonly TrackerRequest[] {
        return this._requests;
    }

    /** Stores records as if they had been created earlier. */
    public seed(resourceName: string, records: readonly WireObject[]): void {
        const stored = this._collection(resourceName);
        for (const record of records) {
            stored.push(clone(record));
            if (typeof record.id === `number` && record.id >= this._nextId) {
                this._nextId = record.id + 1;
            }
        }
    }

    /** Copies of the stored records of one type. */
    public records(resourceName: string): WireObject[] {
        return this._collection(resourceName).map(clone);
    }

    /** Drops all records and the request log. */
    public clear(): void {
        this._records.clear();
        this._requests = [];
        this._nextId = 1;
    }

    public log(method: HttpMethod, path: string, data?: WireObject): void {
        this._requests.push(data === undefined ? { method, path } : { method, path, data: clone(data) });
    }

    public async request(method: HttpMethod, url: string, data?: WireObject): Promise<TransportResponse> {
        this.log(method, url, data);
        return true;
    }

    public async download(url: string, savePath: string = `.`, filename?: string): Promise<string> {
        this.log(`get`, url);
        const name = filename ?? url.split(`/`).pop() ?? `download`;
        return join(savePath, name);
    }

    /**
     * Finds one record; include-only attributes are left out unless listed in `include`.
     */
    public find(type: ResourceType, identity: Identity, include: readonly string[] = []): WireObject | null {
        const record = this._collection(type.name).find(candidate => {
            return sameIdentity(candidate[type.identityKey], identity);
        });
        return record ? this._present(type, record, include) : null;
    }

    /**
     * Records matching every field of the query. `<name>_id` also matches a nested `{ id }` stub.
     */
    public query(type: ResourceType, query: Readonly<QueryParams>): WireObject[] {
        const include = typeof query.include === `string` ? query.include.split(`,`) : [];
        return this._collection(type.name)
            .filter(record => {
                return Object.entries(query).every(([key, value]) => {
                    if (CONTROL_KEYS.has(key)) {
                        return true;
                    }
                    if (sameIdentity(record[key], value)) {
                        return true;
                    }
                    const nested = key.endsWith(`_id`) ? record[key.slice(0, -3)] : undefined;
                    return isWireObject(nested) && sameIdentity(nested.id, value);
                });
            })
            .map(record => {
                return this._present(type, record, include);
            });
    }

    /** Stores a new record and returns it as the server would: with id and timestamps. */
    public insert(type: ResourceType, attributes: Readonly<WireObject>): WireObject {
        const now = FormatDateTime(new Date(), this.datetimeFormat);
        const record: WireObject = { ...this._expandIds(attributes), created_on: now, updated_on: now };
        if (type.identityKey === `id`) {
            record.id = this._nextId++;
        }
        this._collection(type.name).push(record);
        return clone(record);
    }

    /** @throws NotFoundError when no record has the identity */
    public modify(type: ResourceType, identity: Identity, attributes: Readonly<WireObject>): void {
        const record = this._require(type, identity);
        Object.assign(record, this._expandIds(attributes), {
            updated_on: FormatDateTime(new Date(), this.datetimeFormat),
        });
    }

    /** @throws NotFoundError when no record has the identity */
    public remove(type: ResourceType, identity: Identity): void {
        const stored = this._collection(type.name);
        stored.splice(stored.indexOf(this._require(type, identity)), 1);
    }

    private _require(type: ResourceType, identity: Identity): WireObject {
        const record = this._collection(type.name).find(candidate => {
            return sameIdentity(candidate[type.identityKey], identity);
        });
        if (!record) {
            throw new NotFoundError(`${type.name} ${identity} not found`, { resourceName: type.name, identity });
        }
        return record;
    }

    private _collection(resourceName: string): WireObject[] {
        let stored = this._records.get(resourceName);
        if (!stored) {
            stored = [];
            this._records.set(resourceName, stored);
        }
        return stored;
    }

    private _present(type: ResourceType, record: WireObject, include: readonly string[]): WireObject {
        const copy = clone(record);
        for (const name of type.includes) {
            if (!include.includes(name)) {
                delete copy[name];
            }
        }
        return copy;
    }

    /** `project_id: 1` is stored the way the server returns it: `project: { id: 1 }`. */
    private _expandIds(attributes: Readonly<WireObject>): WireObject {
        const expanded: WireObject = {};
        for (const [key, value] of Object.entries(attributes)) {
            const single = lookup(SINGLE_ATTR_ID_MAP, key);
            const multiple = lookup(MULTIPLE_ATTR_ID_MAP, key);
            if (single !== undefined) {
                expanded[single] = { id: value };
            } else if (multiple !== undefined && Array.isArray(value)) {
                expanded[multiple] = value.map(id => {
                    return { id };
                });
            } else {
                expanded[key] = value;
            }
        }
        return expanded;
    }
}

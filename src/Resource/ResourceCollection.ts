import type { ResourceManager } from '../Domain/Manager.js';
import type { WireObject } from '../Types/Attribute.js';
import type { Resource } from './Resource.js';

/** Where a collection gets its payloads: already embedded, or a deferred request. */
export type CollectionSource = readonly WireObject[] | (() => Promise<WireObject[]>);

/**
 * Lazy set of resources of one type. Embedded payloads are wrapped on first access;
 * deferred sources are requested once, on first iteration, and then reused.
 */
export class ResourceCollection implements AsyncIterable<Resource> {
    private readonly _manager: ResourceManager;
    private readonly _source: CollectionSource;
    private _resources: Resource[] | null = null;
    private _pending: Promise<Resource[]> | null = null;

    constructor(manager: ResourceManager, source: CollectionSource) {
        this._manager = manager;
        this._source = source;
    }

    /** Type name of the contained resources. */
    public get resourceName(): string {
        return this._manager.resourceName;
    }

    public get isLoaded(): boolean {
        return this._resources !== null;
    }

    /** Materializes the collection. */
    public async all(): Promise<Resource[]> {
        if (this._resources) {
            return this._resources;
        }
        if (!this._pending) {
            this._pending = this._load();
        }
        try {
            this._resources = await this._pending;
            return this._resources;
        } finally {
            this._pending = null;
        }
    }

    public async first(): Promise<Resource | null> {
        const resources = await this.all();
        return resources[0] ?? null;
    }

    public async count(): Promise<number> {
        return (await this.all()).length;
    }

    public async *[Symbol.asyncIterator](): AsyncIterator<Resource> {
        for (const resource of await this.all()) {
            yield resource;
        }
    }

    private async _load(): Promise<Resource[]> {
        const payloads = typeof this._source === `function` ? await this._source() : this._source;
        return payloads.map(payload => {
            return this._manager.toResource(payload);
        });
    }
}

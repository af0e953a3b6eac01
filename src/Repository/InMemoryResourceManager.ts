import { NotFoundError, ValidationError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { FormatTemplate, type TemplateValue } from '../Common/Template.js';
import { AssertServerVersion } from '../Common/Version.js';
import type { ResourceManager, TransportResponse } from '../Domain/Manager.js';
import { GetResourceType } from '../Resource/Registry.js';
import { Resource } from '../Resource/Resource.js';
import { ResourceCollection } from '../Resource/ResourceCollection.js';
import type { QueryName, ResourceType } from '../Resource/ResourceType.js';
import type { Identity, QueryParams, WireObject } from '../Types/Attribute.js';
import type { InMemoryTracker } from './InMemoryTracker.js';

/**
 * Resource manager over an InMemoryTracker. Resolves the type's endpoint templates for every
 * operation exactly as an HTTP manager would, so a type without a template for an operation
 * cannot perform it.
 */
export class InMemoryResourceManager implements ResourceManager {
    public readonly resourceName: string;
    public readonly params: Readonly<QueryParams>;
    public readonly connection: InMemoryTracker;
    private readonly _type: ResourceType;

    /**
     * @throws NotFoundError for an unknown resource type
     * @throws ServerVersionMismatchError when the tracker is older than the type requires
     */
    constructor(tracker: InMemoryTracker, resourceName: string, params: QueryParams = {}) {
        this._type = GetResourceType(resourceName);
        AssertServerVersion(tracker.version, this._type.minimumVersion, `${resourceName} resources`);
        this.resourceName = resourceName;
        this.params = Object.freeze({ ...params });
        this.connection = tracker;
    }

    public async get(identity: Identity, params: QueryParams = {}): Promise<Resource> {
        const path = this._path(`one`, [identity], params);
        this.connection.log(`get`, path);
        log.debug(`GET ${path}`, `InMemoryResourceManager`, this.resourceName);

        const include = typeof params.include === `string` ? params.include.split(`,`) : [];
        const record = this.connection.find(this._type, identity, include);
        if (!record) {
            throw new NotFoundError(`${this.resourceName} ${identity} not found`, {
                resourceName: this.resourceName,
                identity,
            });
        }
        return this.toResource(record);
    }

    /** The returned resources are owned by a manager scoped to the filter. */
    public filter(query: QueryParams): ResourceCollection {
        const path = this._path(`filter`, [], query);
        const scoped = this.newManager(this.resourceName, { ...this.params, ...query });
        return new ResourceCollection(scoped, async () => {
            this.connection.log(`get`, path);
            log.debug(`GET ${path}`, `InMemoryResourceManager`, this.resourceName);
            return this.connection.query(this._type, scoped.params);
        });
    }

    public async create(attributes: WireObject): Promise<Resource> {
        const path = this._path(`create`, [], attributes);
        this.connection.log(`post`, path, attributes);
        log.debug(`POST ${path}`, `InMemoryResourceManager`, this.resourceName);
        return this.toResource(this.connection.insert(this._type, attributes));
    }

    public async update(identity: Identity, attributes: WireObject): Promise<TransportResponse> {
        const path = this._path(`update`, [identity], attributes);
        this.connection.log(`put`, path, attributes);
        log.debug(`PUT ${path}`, `InMemoryResourceManager`, this.resourceName);
        this.connection.modify(this._type, identity, attributes);
        return true;
    }

    public async delete(identity: Identity, params: QueryParams = {}): Promise<TransportResponse> {
        const path = this._path(`delete`, [identity], params);
        this.connection.log(`delete`, path);
        log.debug(`DELETE ${path}`, `InMemoryResourceManager`, this.resourceName);
        this.connection.remove(this._type, identity);
        return true;
    }

    public newManager(resourceName: string, params: QueryParams = {}): InMemoryResourceManager {
        return new InMemoryResourceManager(this.connection, resourceName, params);
    }

    public toResource(raw: WireObject): Resource {
        return new Resource(this, this._type, raw);
    }

    public toResourceCollection(raw: readonly WireObject[]): ResourceCollection {
        return new ResourceCollection(this, raw);
    }

    private _path(query: QueryName, positional: TemplateValue[], named: Readonly<Record<string, unknown>>): string {
        const template = this._type.queries[query];
        if (template === undefined) {
            throw new ValidationError(`${this.resourceName} does not support '${query}'`, {
                resourceName: this.resourceName,
                operation: query,
            });
        }
        return FormatTemplate(template, positional, { ...this.params, ...named });
    }
}

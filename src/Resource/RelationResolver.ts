import { NotFoundError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import type { AttributeValue } from '../Types/Attribute.js';
import { lookup, RELATIONS_MAP } from './Mappings.js';
import type { Resource } from './Resource.js';
import type { ResourceCollection } from './ResourceCollection.js';

/**
 * Resolves attributes that are not carried by the resource payload itself.
 */
export class RelationResolver {
    private readonly _owner: Resource;
    private readonly _pending: Map<string, Promise<AttributeValue | null>> = new Map();

    constructor(owner: Resource) {
        this._owner = owner;
    }

    /**
     * Related items referencing the owner, e.g. an issue's time entries via `issue_id`.
     * The returned collection is lazy; nothing is fetched until it is iterated.
     */
    public filter(name: string): ResourceCollection {
        const target = lookup(RELATIONS_MAP, name);
        if (target === undefined) {
            throw new NotFoundError(`No related resource type for relation '${name}'`, { relation: name });
        }
        const type = this._owner.type;
        const ownerKey = lookup(type.relationKeys, name) ?? type.relationsName;
        const identity = this._owner.internalId;
        log.debug(`Filtering ${target} by ${ownerKey}_id=${identity}`, `RelationResolver`, type.name);
        return this._owner.manager.newManager(target).filter({ [`${ownerKey}_id`]: identity });
    }

    /**
     * Fetches a fresh copy scoped to one include and returns that attribute from it.
     * The owner's own snapshot is left untouched. Overlapping calls for one name share a request.
     */
    public async include(name: string): Promise<AttributeValue | null> {
        const pending = this._pending.get(name);
        if (pending) {
            return pending;
        }
        const request = this._include(name);
        this._pending.set(name, request);
        try {
            return await request;
        } finally {
            this._pending.delete(name);
        }
    }

    private async _include(name: string): Promise<AttributeValue | null> {
        log.debug(`Refreshing to include '${name}'`, `RelationResolver`, this._owner.type.name);
        const fresh = await this._owner.refresh(false, { include: name });
        // read only what the response carries; asking fresh.get() again could recurse into another refresh
        if (fresh.attributes.read(name) === undefined) {
            return null;
        }
        return fresh.get(name);
    }
}

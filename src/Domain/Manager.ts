/**
 * Boundary contracts of the collaborators the resource engine drives.
 * The engine never performs network I/O itself; everything goes through these interfaces.
 */

import type { ConnectionSettings } from '../Types/Config.js';
import type { Identity, QueryParams, WireObject } from '../Types/Attribute.js';
import type { Resource } from '../Resource/Resource.js';
import type { ResourceCollection } from '../Resource/ResourceCollection.js';

export type HttpMethod = `get` | `post` | `put` | `delete`;

/** Body of a transport response: a parsed JSON object, or `true` for an empty acknowledgment. */
export type TransportResponse = WireObject | boolean;

/**
 * Connection to one tracker: settings plus the raw transport used by out-of-band helpers.
 */
export interface Connection extends Readonly<ConnectionSettings> {
    request(method: HttpMethod, url: string, data?: WireObject): Promise<TransportResponse>;
    /** Downloads a file and resolves to the path it was written to. */
    download(url: string, savePath?: string, filename?: string): Promise<string>;
}

/**
 * Manager bound to one resource type (and optional scope params such as `project_id`).
 */
export interface ResourceManager {
    readonly resourceName: string;
    readonly params: Readonly<QueryParams>;
    readonly connection: Connection;

    get(identity: Identity, params?: QueryParams): Promise<Resource>;
    /** Lazy: no request is issued until the collection is iterated. */
    filter(query: QueryParams): ResourceCollection;
    create(attributes: WireObject): Promise<Resource>;
    update(identity: Identity, attributes: WireObject): Promise<TransportResponse>;
    delete(identity: Identity, params?: QueryParams): Promise<TransportResponse>;

    newManager(resourceName: string, params?: QueryParams): ResourceManager;
    toResource(raw: WireObject): Resource;
    toResourceCollection(raw: readonly WireObject[]): ResourceCollection;
}

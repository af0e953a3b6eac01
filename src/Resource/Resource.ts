/**
 * Generic resource engine shared by every resource type.
 *
 * Reads resolve lazily in a fixed order: encoded cache, decoded payload, relation filter,
 * include refresh, new-resource default, then the connection's attribute error policy.
 * Writes pass the readonly guard, go through the type's decode path and land in both the
 * decoded snapshot and the change set; save() sends the change set to the manager.
 */

import { CalendarDate } from '../Common/CalendarDate.js';
import { FormatDateTime } from '../Common/DateFormat.js';
import { CustomFieldValueError, ResourceAttributeError, ValidationError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { FormatTemplate } from '../Common/Template.js';
import { isWireObject } from '../Common/Wire.js';
import type { ResourceManager, TransportResponse } from '../Domain/Manager.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import { MAIN_EVENT_BUS } from '../Events/MainEventBus.js';
import type {
    AttributeInput,
    AttributeValue,
    Identity,
    QueryParams,
    WireObject,
    WireValue,
} from '../Types/Attribute.js';
import { AttributeStore } from './AttributeStore.js';
import { lookup, MULTIPLE_ATTR_ID_MAP, SINGLE_ATTR_ID_MAP } from './Mappings.js';
import { ReadonlyGuard } from './ReadonlyGuard.js';
import { RelationResolver } from './RelationResolver.js';
import { DisplayString, InspectString } from './Representation.js';
import { ResourceCollection } from './ResourceCollection.js';
import { NUMERIC_DEFAULTS, type HookName, type ResourceType } from './ResourceType.js';
import { TypeCodec } from './TypeCodec.js';

/** Framework-owned names that are never attributes. */
const MEMBERS: ReadonlySet<string> = new Set([`manager`]);

export class Resource implements Iterable<[string, WireValue]> {
    public readonly manager: ResourceManager;
    public readonly type: ResourceType;
    public readonly attributes: AttributeStore;
    private readonly _codec: TypeCodec;
    private readonly _guard: ReadonlyGuard;
    private readonly _relations: RelationResolver;

    /**
     * @param manager ResourceManager - Manager of this resource's type
     * @param type ResourceType - Static type configuration and overrides
     * @param attributes WireObject - Payload as received; empty for a resource yet to be created
     */
    constructor(manager: ResourceManager, type: ResourceType, attributes: Readonly<WireObject> = {}) {
        this.manager = manager;
        this.type = type;
        this.attributes = new AttributeStore(attributes);
        this._codec = new TypeCodec({ manager, type });
        this._guard = new ReadonlyGuard(type);
        this._relations = new RelationResolver(this);
    }

    /** A resource is new until the server gave it an id or a creation timestamp. */
    public isNew(): boolean {
        return !this.attributes.has(`id`) && !this.attributes.has(`created_on`);
    }

    /** Identity used in endpoint templates and relation filters. */
    public get internalId(): Identity {
        const key = this.type.identityKey;
        const value = this.attributes.read(key);
        if (typeof value === `string` || typeof value === `number`) {
            return value;
        }
        if (this.isNew()) {
            return NUMERIC_DEFAULTS.has(key) ? 0 : ``;
        }
        throw new ResourceAttributeError(this.type.name, key);
    }

    /** Human-facing URL of the resource, when the type has one. */
    public get url(): string | null {
        const override = this.type.overrides.url;
        if (override) {
            return override(this);
        }
        const template = this.type.queries.one;
        if (template === undefined) {
            return null;
        }
        const path = FormatTemplate(template, [this.internalId], this.manager.params);
        return this.manager.connection.url + path.replace(`.json`, ``);
    }

    /**
     * Resolves an attribute.
     * @returns the domain value, or null when absent and the error policy does not raise
     * @throws ResourceAttributeError when absent and the policy raises for this type
     */
    public async get(name: string): Promise<AttributeValue | null> {
        this._assertAttributeName(name);
        const override = this.type.overrides.get;
        const next = (nextName: string): Promise<AttributeValue | null> => {
            return this._resolve(nextName);
        };
        return override ? override(this, name, next) : next(name);
    }

    /** Resolves an attribute that must be an embedded or related single resource. */
    public async getResource(name: string): Promise<Resource> {
        const value = await this.get(name);
        if (value instanceof Resource) {
            return value;
        }
        throw new ValidationError(`Attribute '${name}' of ${this.type.name} is not a resource`, { attribute: name });
    }

    /** Resolves an attribute that must be a collection of resources. */
    public async getCollection(name: string): Promise<ResourceCollection> {
        const value = await this.get(name);
        if (value instanceof ResourceCollection) {
            return value;
        }
        throw new ValidationError(`Attribute '${name}' of ${this.type.name} is not a collection`, {
            attribute: name,
        });
    }

    /**
     * Writes an attribute into the change set.
     * @throws ReadonlyAttributeError, CustomFieldValueError, ValidationError
     */
    public set(name: string, value: AttributeInput): void {
        this._assertAttributeName(name);
        const override = this.type.overrides.set;
        const next = (nextName: string, nextValue: AttributeInput): void => {
            this._write(nextName, nextValue);
        };
        if (override) {
            override(this, name, value, next);
        } else {
            next(name, value);
        }
    }

    /** Pending changes since the last save (copy). */
    public get changes(): WireObject {
        return this.attributes.changes();
    }

    /** Payload as received from the server, plus local writes (copy). */
    public raw(): WireObject {
        return this.attributes.raw();
    }

    public keys(): string[] {
        return this.attributes.keys();
    }

    public [Symbol.iterator](): Iterator<[string, WireValue]> {
        return Object.entries(this.attributes.raw())[Symbol.iterator]();
    }

    /** Numeric form of the resource (its id, unless the type says otherwise). */
    public toNumber(): number {
        const override = this.type.overrides.toNumber;
        return override ? override(this) : Number(this.internalId);
    }

    /**
     * Re-fetches the resource by identity.
     * @param itself boolean - true: replace this snapshot and return this; false: return a new instance
     * @param params QueryParams - e.g. `{ include: 'journals' }`
     */
    public async refresh(itself: boolean = true, params: QueryParams = {}): Promise<Resource> {
        const fresh = await this.manager.get(this.internalId, { ...params, ...this._scope() });
        if (!itself) {
            return fresh;
        }
        this.attributes.replace(fresh.raw());
        return this;
    }

    /**
     * Creates or updates the resource from the change set. The change set is cleared only on success.
     */
    public async save(): Promise<boolean> {
        if (!this.isNew()) {
            await this._runHook(`preUpdate`);
            const identity = this.internalId;
            log.debug(`Updating ${identity}`, `Resource`, this.type.name);
            await this.manager.update(identity, this.attributes.changes());
            this.attributes.seed(`updated_on`, FormatDateTime(new Date(), this.manager.connection.datetimeFormat));
            await this._runHook(`postUpdate`);
            MAIN_EVENT_BUS.Emit(EVENT_NAMES.resourceUpdated, this);
        } else {
            await this._runHook(`preCreate`);
            log.debug(`Creating`, `Resource`, this.type.name);
            const created = await this.manager.create(this.attributes.changes());
            this.attributes.replace(created.raw());
            await this._runHook(`postCreate`);
            MAIN_EVENT_BUS.Emit(EVENT_NAMES.resourceCreated, this);
        }
        this.attributes.clearChanges();
        return true;
    }

    /**
     * Deletes the resource on the server. The instance must not be reused afterwards.
     * @returns the manager's response as is
     */
    public async delete(params: QueryParams = {}): Promise<TransportResponse> {
        await this._runHook(`preDelete`);
        const identity = this.internalId;
        log.debug(`Deleting ${identity}`, `Resource`, this.type.name);
        const response = await this.manager.delete(identity, { ...params, ...this._scope() });
        await this._runHook(`postDelete`);
        MAIN_EVENT_BUS.Emit(EVENT_NAMES.resourceDeleted, this);
        return response;
    }

    /** Short human string, e.g. `Fix login form`. */
    public display(): Promise<string> {
        return DisplayString(this);
    }

    /** Structured identifier, e.g. `<Issue #12 "Fix login form">`. */
    public inspect(): Promise<string> {
        return InspectString(this);
    }

    private async _resolve(name: string): Promise<AttributeValue | null> {
        const cached = this.attributes.cached(name);
        if (cached !== undefined) {
            return cached;
        }

        let key = name;
        let encoded: AttributeValue | null = null;
        const decoded = this.attributes.read(name);

        if (decoded !== undefined) {
            [key, encoded] = this._codec.encode(name, decoded);
        } else if (this.type.relations.includes(name)) {
            encoded = this._relations.filter(name);
        } else if (this.type.includes.includes(name)) {
            encoded = await this._relations.include(name);
        }

        if (encoded !== null) {
            this.attributes.cache(key, encoded);
            return encoded;
        }

        if (this.isNew()) {
            return NUMERIC_DEFAULTS.has(name) ? 0 : ``;
        }

        const policy = this.manager.connection.raiseAttrException;
        const raise = typeof policy === `boolean` ? policy : policy.includes(this.type.name);
        if (raise) {
            throw new ResourceAttributeError(this.type.name, name);
        }
        return null;
    }

    private _write(name: string, value: AttributeInput): void {
        this._guard.assertWritable(name, this.isNew());

        if (name === `custom_fields`) {
            this._mergeCustomFields(value);
        } else {
            const [changeName, wire] = this._codec.decode(name, value);
            const single = lookup(SINGLE_ATTR_ID_MAP, name);
            const multiple = lookup(MULTIPLE_ATTR_ID_MAP, name);
            if (multiple !== undefined && !Array.isArray(wire)) {
                throw new ValidationError(`Attribute '${name}' expects a list of ids`, { attribute: name });
            }
            this.attributes.write(changeName, name, wire);

            if (single !== undefined) {
                this.attributes.seed(single, { id: wire });
            } else if (multiple !== undefined && Array.isArray(wire)) {
                this.attributes.seed(
                    multiple,
                    wire.map(id => {
                        return { id };
                    }),
                );
            }
        }
        this.attributes.invalidate(name);
    }

    /**
     * Merges incoming custom fields into the stored list: matching ids are replaced in place,
     * the rest are appended in input order.
     */
    private _mergeCustomFields(value: AttributeInput): void {
        if (!Array.isArray(value)) {
            throw new CustomFieldValueError();
        }
        const incoming = new Map<WireValue, WireObject>();
        for (const field of value) {
            if (
                typeof field !== `object` ||
                field === null ||
                Array.isArray(field) ||
                field instanceof Date ||
                field instanceof CalendarDate ||
                !(`id` in field)
            ) {
                throw new CustomFieldValueError();
            }
            const decoded = this._codec.bulkDecode(field);
            incoming.set(decoded.id, decoded);
        }

        const existing = this.attributes.read(`custom_fields`);
        const merged: WireValue[] = [];
        for (const field of Array.isArray(existing) ? existing : []) {
            const replacement = isWireObject(field) ? incoming.get(field.id) : undefined;
            if (replacement && isWireObject(field)) {
                incoming.delete(field.id);
                merged.push(replacement);
            } else {
                merged.push(field);
            }
        }
        merged.push(...incoming.values());
        this.attributes.write(`custom_fields`, `custom_fields`, merged);
    }

    private _assertAttributeName(name: string): void {
        if (name.startsWith(`_`) || MEMBERS.has(name)) {
            throw new ValidationError(`'${name}' is not a resource attribute`, { attribute: name });
        }
    }

    private _scope(): QueryParams {
        return this.type.overrides.scope?.(this) ?? {};
    }

    private async _runHook(name: HookName): Promise<void> {
        const hook = this.type.overrides.hooks?.[name];
        if (hook) {
            await hook(this);
        }
    }
}

/**
 * Static per-type configuration and the override-capability object each concrete type may supply.
 * Types are plain frozen objects; the generic engine in Resource.ts composes them instead of
 * subclassing.
 */

import type { ResourceManager } from '../Domain/Manager.js';
import type {
    AttributeInput,
    AttributeValue,
    Decoded,
    Encoded,
    QueryParams,
    WireValue,
} from '../Types/Attribute.js';
import type { Resource } from './Resource.js';

/** Endpoint templates; `{0}` is the identity, named placeholders come from manager params or attributes. */
export interface ResourceQueries {
    all?: string;
    one?: string;
    filter?: string;
    create?: string;
    update?: string;
    delete?: string;
}

export type QueryName = keyof ResourceQueries;

/** Everything a codec function may consult. */
export interface CodecContext {
    readonly manager: ResourceManager;
    readonly type: ResourceType;
}

export type EncodeStep = (name: string, value: WireValue) => Encoded;
export type DecodeStep = (name: string, value: AttributeInput) => Decoded;
export type GetStep = (name: string) => Promise<AttributeValue | null>;
export type SetStep = (name: string, value: AttributeInput) => void;

/** Extension points around save and delete. */
export interface LifecycleHooks {
    preCreate?(resource: Resource): void | Promise<void>;
    postCreate?(resource: Resource): void | Promise<void>;
    preUpdate?(resource: Resource): void | Promise<void>;
    postUpdate?(resource: Resource): void | Promise<void>;
    preDelete?(resource: Resource): void | Promise<void>;
    postDelete?(resource: Resource): void | Promise<void>;
}

export type HookName = keyof LifecycleHooks;

/**
 * Per-type specializations. Every member is optional; `next` is the generic behavior.
 */
export interface ResourceOverrides {
    encode?(name: string, value: WireValue, context: CodecContext, next: EncodeStep): Encoded;
    decode?(name: string, value: AttributeInput, context: CodecContext, next: DecodeStep): Decoded;
    get?(resource: Resource, name: string, next: GetStep): Promise<AttributeValue | null>;
    set?(resource: Resource, name: string, value: AttributeInput, next: SetStep): void;
    /** Human-facing URL; null when the type has none. */
    url?(resource: Resource): string | null;
    toNumber?(resource: Resource): number;
    /** Extra params merged into refresh and delete requests. */
    scope?(resource: Resource): QueryParams;
    hooks?: LifecycleHooks;
}

/** Input accepted by DefineResourceType; omitted members take the generic defaults. */
export interface ResourceDefinition {
    name: string;
    /** Oldest server version exposing this resource. */
    minimumVersion: string;
    containerMany?: string;
    containerOne?: string;
    queries?: ResourceQueries;
    identityKey?: string;
    representation?: ReadonlyArray<readonly string[]>;
    includes?: readonly string[];
    relations?: readonly string[];
    relationsName?: string;
    relationKeys?: Readonly<Record<string, string>>;
    unconvertible?: readonly string[];
    createReadonly?: readonly string[];
    updateReadonly?: readonly string[];
    overrides?: ResourceOverrides;
}

export interface ResourceType {
    readonly name: string;
    readonly minimumVersion: string;
    readonly containerMany?: string;
    readonly containerOne?: string;
    readonly queries: Readonly<ResourceQueries>;
    readonly identityKey: string;
    readonly representation: ReadonlyArray<readonly string[]>;
    readonly includes: readonly string[];
    readonly relations: readonly string[];
    /** Owner key used in relation filters: `<relationsName>_id`. */
    readonly relationsName: string;
    /** Per-relation owner key overriding relationsName. */
    readonly relationKeys: Readonly<Record<string, string>>;
    readonly unconvertible: ReadonlySet<string>;
    readonly createReadonly: readonly string[];
    readonly updateReadonly: readonly string[];
    readonly overrides: Readonly<ResourceOverrides>;
}

export const BASE_UNCONVERTIBLE: readonly string[] = [`name`, `description`];

export const BASE_READONLY: readonly string[] = [
    `id`,
    `created_on`,
    `updated_on`,
    `author`,
    `user`,
    `project`,
    `issue`,
];

/** Attributes answered with 0 instead of '' on an unsaved resource. */
export const NUMERIC_DEFAULTS: ReadonlySet<string> = new Set([`id`, `version`]);

/**
 * Fills in defaults and freezes a type definition.
 * @example
 * export const Role = DefineResourceType({ name: 'Role', minimumVersion: '1.4', queries: { all: '/roles.json' } });
 */
export function DefineResourceType(definition: ResourceDefinition): ResourceType {
    const createReadonly = definition.createReadonly ?? BASE_READONLY;
    return Object.freeze({
        name: definition.name,
        minimumVersion: definition.minimumVersion,
        containerMany: definition.containerMany,
        containerOne: definition.containerOne,
        queries: Object.freeze({ ...definition.queries }),
        identityKey: definition.identityKey ?? `id`,
        representation: definition.representation ?? [[`id`, `name`]],
        includes: definition.includes ?? [],
        relations: definition.relations ?? [],
        relationsName: definition.relationsName ?? definition.name.toLowerCase(),
        relationKeys: Object.freeze({ ...definition.relationKeys }),
        unconvertible: new Set(definition.unconvertible ?? BASE_UNCONVERTIBLE),
        createReadonly,
        updateReadonly: definition.updateReadonly ?? createReadonly,
        overrides: Object.freeze({ ...definition.overrides }),
    });
}

import type { CalendarDate } from '../Common/CalendarDate.js';
import type { Resource } from '../Resource/Resource.js';
import type { ResourceCollection } from '../Resource/ResourceCollection.js';

/** Scalar as it appears in a JSON payload. */
export type WireScalar = string | number | boolean | null;

/** Any JSON payload value. */
export type WireValue = WireScalar | WireObject | WireValue[];

/** JSON object payload, e.g. one resource as returned by the tracker. */
export interface WireObject {
    [key: string]: WireValue;
}

/** Identity of a resource: numeric id for most types, a title for wiki pages. */
export type Identity = string | number;

/** Query / scope parameters passed to manager operations. */
export type QueryParams = Record<string, WireScalar>;

/**
 * Value accepted by attribute writes: wire values plus the domain date types,
 * nested inside arrays and objects where needed (custom field values).
 */
export type AttributeInput = WireScalar | Date | CalendarDate | AttributeInput[] | { [key: string]: AttributeInput };

/**
 * Resolved (encoded) attribute value: a plain wire value, a parsed date,
 * an embedded resource reference or an embedded / related collection.
 */
export type AttributeValue = WireValue | Date | CalendarDate | Resource | ResourceCollection;

/** Attribute name/value pair produced by codec functions (the name may be renamed). */
export type Encoded = [string, AttributeValue];
export type Decoded = [string, WireValue];

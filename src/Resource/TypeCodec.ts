/**
 * Converts single attribute values between the wire representation and the domain representation.
 *
 * decode: domain -> wire (dates are formatted with the connection's formats)
 * encode: wire -> domain (embedded fragments become resources / collections, date strings become dates)
 */

import { CalendarDate } from '../Common/CalendarDate.js';
import { FormatCalendarDate, FormatDateTime, ParseCalendarDate, ParseDateTime } from '../Common/DateFormat.js';
import { isWireObject, isWireObjectArray } from '../Common/Wire.js';
import type { ConnectionSettings } from '../Types/Config.js';
import type {
    AttributeInput,
    AttributeValue,
    Decoded,
    Encoded,
    WireObject,
    WireValue,
} from '../Types/Attribute.js';
import { lookup, RESOURCE_MAP, RESOURCE_SET_MAP } from './Mappings.js';
import type { CodecContext } from './ResourceType.js';

type DateFormats = Pick<ConnectionSettings, `dateFormat` | `datetimeFormat`>;

/** Recursively replaces domain dates with their formatted wire strings. */
export function ToWire(value: AttributeInput, formats: DateFormats): WireValue {
    if (value instanceof CalendarDate) {
        return FormatCalendarDate(value, formats.dateFormat);
    }
    if (value instanceof Date) {
        return FormatDateTime(value, formats.datetimeFormat);
    }
    if (Array.isArray(value)) {
        return value.map(item => {
            return ToWire(item, formats);
        });
    }
    if (typeof value === `object` && value !== null) {
        const wire: WireObject = {};
        for (const [key, item] of Object.entries(value)) {
            wire[key] = ToWire(item, formats);
        }
        return wire;
    }
    return value;
}

/** Generic decode shared by every type. */
export function DecodeValue(name: string, value: AttributeInput, context: CodecContext): Decoded {
    return [name, ToWire(value, context.manager.connection)];
}

/**
 * Generic encode shared by every type. Never throws on malformed date strings: whatever
 * does not parse is returned unchanged.
 */
export function EncodeValue(name: string, value: WireValue, context: CodecContext): Encoded {
    const { manager, type } = context;

    if (type.unconvertible.has(name)) {
        return [name, value];
    }

    const single = lookup(RESOURCE_MAP, name);
    if (single !== undefined && isWireObject(value)) {
        return [name, manager.newManager(single).toResource(value)];
    }

    const many = lookup(RESOURCE_SET_MAP, name);
    if (many !== undefined && isWireObjectArray(value)) {
        return [name, manager.newManager(many).toResourceCollection(value)];
    }

    // parent links point at the owner's own type (issue trees, wiki trees)
    if (name === `parent` && isWireObject(value)) {
        return [name, manager.newManager(type.name).toResource(value)];
    }

    const timestamp = ParseDateTime(value, manager.connection.datetimeFormat);
    if (timestamp) {
        return [name, timestamp];
    }
    const day = ParseCalendarDate(value, manager.connection.dateFormat);
    if (day) {
        return [name, day];
    }
    return [name, value];
}

/**
 * Codec bound to one resource type and manager; applies the type's encode/decode overrides
 * around the generic functions.
 */
export class TypeCodec {
    private readonly _context: CodecContext;

    constructor(context: CodecContext) {
        this._context = context;
    }

    public decode(name: string, value: AttributeInput): Decoded {
        const override = this._context.type.overrides.decode;
        const next = (nextName: string, nextValue: AttributeInput): Decoded => {
            return DecodeValue(nextName, nextValue, this._context);
        };
        return override ? override(name, value, this._context, next) : next(name, value);
    }

    public encode(name: string, value: WireValue): Encoded {
        const override = this._context.type.overrides.encode;
        const next = (nextName: string, nextValue: WireValue): Encoded => {
            return EncodeValue(nextName, nextValue, this._context);
        };
        return override ? override(name, value, this._context, next) : next(name, value);
    }

    /** Decodes every key of a mapping (renames included). */
    public bulkDecode(attributes: Readonly<Record<string, AttributeInput>>): WireObject {
        const decoded: WireObject = {};
        for (const [name, value] of Object.entries(attributes)) {
            const [key, wire] = this.decode(name, value);
            decoded[key] = wire;
        }
        return decoded;
    }

    /** Encodes every key of a payload. */
    public bulkEncode(attributes: Readonly<WireObject>): Record<string, AttributeValue> {
        const encoded: Record<string, AttributeValue> = {};
        for (const [name, value] of Object.entries(attributes)) {
            const [key, domain] = this.encode(name, value);
            encoded[key] = domain;
        }
        return encoded;
    }
}

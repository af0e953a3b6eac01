import { CalendarDate } from '../Common/CalendarDate.js';
import { ResourceAttributeError } from '../Common/Errors.js';
import type { AttributeValue } from '../Types/Attribute.js';
import { Resource } from './Resource.js';
import { ResourceCollection } from './ResourceCollection.js';

interface RepresentationValues {
    /** Values shown to humans; the numeric id is left out. */
    short: AttributeValue[];
    /** All values of the accepted tuple, id first. */
    full: AttributeValue[];
}

async function resolve(resource: Resource, name: string): Promise<AttributeValue | null> {
    try {
        return await resource.get(name);
    } catch(error) {
        if (error instanceof ResourceAttributeError) {
            return null;
        }
        throw error;
    }
}

/**
 * Walks the type's preference list and returns the values of the first tuple whose
 * attributes all resolve. Attributes are resolved last to first.
 */
export async function CollectRepresentation(resource: Resource): Promise<RepresentationValues> {
    let short: AttributeValue[] = [];
    let full: AttributeValue[] = [];

    for (const tuple of resource.type.representation) {
        const tupleShort: AttributeValue[] = [];
        const tupleFull: AttributeValue[] = [];
        let complete = true;

        for (const name of [...tuple].reverse()) {
            const value = await resolve(resource, name);
            if (value === null) {
                complete = false;
                break;
            }
            tupleFull.unshift(value);
            if (name !== `id`) {
                tupleShort.unshift(value);
            }
        }

        if (complete && tupleFull.length > 0) {
            short = tupleShort;
            full = tupleFull;
            break;
        }
    }

    // unsaved resources drop the trailing value of long tuples
    if (resource.isNew() && full.length > 2) {
        short = short.slice(0, -1);
        full = full.slice(0, -1);
    }
    return { short, full };
}

async function stringify(value: AttributeValue): Promise<string> {
    if (value instanceof Resource) {
        return value.display();
    }
    if (value instanceof ResourceCollection) {
        return `${value.resourceName}[]`;
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (value instanceof CalendarDate) {
        return value.toString();
    }
    if (typeof value === `object` && value !== null) {
        return JSON.stringify(value);
    }
    return String(value);
}

async function join(values: readonly AttributeValue[]): Promise<string> {
    const parts = await Promise.all(values.map(stringify));
    return parts.join(` `);
}

/**
 * Short human string, e.g. `Fix login form` for an issue or `Jane Doe` for a user.
 * Falls back to the id when the accepted tuple holds nothing else, and to the type name when no tuple resolves.
 */
export async function DisplayString(resource: Resource): Promise<string> {
    const { short, full } = await CollectRepresentation(resource);
    if (short.length > 0) {
        return join(short);
    }
    return full.length > 0 ? stringify(full[0]) : resource.type.name;
}

/**
 * Structured identifier, e.g. `<Issue #12 "Fix login form">`.
 */
export async function InspectString(resource: Resource): Promise<string> {
    const { full } = await CollectRepresentation(resource);
    const values = [...full];
    let view = `<${resource.type.name}`;

    const leading = values[0];
    if (typeof leading === `number`) {
        view += ` #${leading}`;
        values.shift();
    }
    if (values.length > 0) {
        view += ` "${await join(values)}"`;
    }
    return `${view}>`;
}

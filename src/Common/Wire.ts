import { CalendarDate } from './CalendarDate.js';
import type { WireObject, WireValue } from '../Types/Attribute.js';

/** Narrows a payload value to a plain JSON object (not an array, null or date). */
export function isWireObject(value: unknown): value is WireObject {
    return (
        typeof value === `object` &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Date) &&
        !(value instanceof CalendarDate)
    );
}

/** Narrows a payload value to an array of JSON objects. */
export function isWireObjectArray(value: WireValue): value is WireObject[] {
    return Array.isArray(value) && value.every(isWireObject);
}

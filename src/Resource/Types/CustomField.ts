import { isWireObject } from '../../Common/Wire.js';
import { DefineResourceType } from '../ResourceType.js';

export const CustomField = DefineResourceType({
    name: `CustomField`,
    minimumVersion: `2.4`,
    containerMany: `custom_fields`,
    queries: {
        all: `/custom_fields.json`,
    },
    overrides: {
        async get(resource, name, next) {
            // fields added after a resource was created come back without a value
            if (name === `value` && !resource.attributes.has(`value`)) {
                return ``;
            }
            return next(name);
        },
        encode(name, value, context, next) {
            // servers before 2.5.2 send a single `{ tracker: {...} }` object instead of a list
            if (name === `trackers` && isWireObject(value) && `tracker` in value) {
                return next(name, [value.tracker]);
            }
            return next(name, value);
        },
        url(resource) {
            return `${resource.manager.connection.url}/custom_fields/${resource.internalId}/edit`;
        },
    },
});

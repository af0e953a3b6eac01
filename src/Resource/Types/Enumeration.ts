import { DefineResourceType } from '../ResourceType.js';

export const Enumeration = DefineResourceType({
    name: `Enumeration`,
    minimumVersion: `2.2`,
    containerMany: `{resource}`,
    queries: {
        filter: `/enumerations/{resource}.json`,
    },
    overrides: {
        url(resource) {
            return `${resource.manager.connection.url}/enumerations/${resource.internalId}/edit`;
        },
    },
});

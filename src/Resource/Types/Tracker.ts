import { DefineResourceType } from '../ResourceType.js';

export const Tracker = DefineResourceType({
    name: `Tracker`,
    minimumVersion: `1.3`,
    containerMany: `trackers`,
    queries: {
        all: `/trackers.json`,
    },
    relations: [`issues`],
    overrides: {
        url(resource) {
            return `${resource.manager.connection.url}/trackers/${resource.internalId}/edit`;
        },
    },
});

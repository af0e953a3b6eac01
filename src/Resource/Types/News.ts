import { DefineResourceType } from '../ResourceType.js';

export const News = DefineResourceType({
    name: `News`,
    minimumVersion: `1.1`,
    containerMany: `news`,
    queries: {
        all: `/news.json`,
        filter: `/news.json`,
    },
    representation: [[`id`, `title`]],
    overrides: {
        url(resource) {
            return `${resource.manager.connection.url}/news/${resource.internalId}`;
        },
    },
});

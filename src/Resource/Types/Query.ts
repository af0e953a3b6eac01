import { DefineResourceType } from '../ResourceType.js';

/** Saved issue queries; they can only be listed and opened in the web UI. */
export const Query = DefineResourceType({
    name: `Query`,
    minimumVersion: `1.3`,
    containerMany: `queries`,
    queries: {
        all: `/queries.json`,
    },
    overrides: {
        url(resource) {
            const projectId = resource.attributes.read(`project_id`) ?? 0;
            return `${resource.manager.connection.url}/projects/${String(projectId)}/issues?query_id=${resource.internalId}`;
        },
    },
});

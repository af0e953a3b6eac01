import { FormatTemplate } from '../../Common/Template.js';
import { isWireObject } from '../../Common/Wire.js';
import { BASE_READONLY, BASE_UNCONVERTIBLE, DefineResourceType } from '../ResourceType.js';

export const Project = DefineResourceType({
    name: `Project`,
    minimumVersion: `1.0`,
    containerMany: `projects`,
    containerOne: `project`,
    queries: {
        all: `/projects.json`,
        one: `/projects/{0}.json`,
        create: `/projects.json`,
        update: `/projects/{0}.json`,
        delete: `/projects/{0}.json`,
    },
    includes: [`trackers`, `issue_categories`, `enabled_modules`],
    relations: [`wiki_pages`, `memberships`, `issue_categories`, `time_entries`, `versions`, `news`, `issues`],
    unconvertible: [...BASE_UNCONVERTIBLE, `identifier`, `status`],
    updateReadonly: [...BASE_READONLY, `identifier`],
    overrides: {
        // projects are addressed by their identifier slug in the web UI
        url(resource) {
            const identifier = resource.attributes.read(`identifier`);
            const key = typeof identifier === `string` ? identifier : resource.internalId;
            return resource.manager.connection.url + FormatTemplate(`/projects/{0}`, [key]);
        },
        encode(name, value, context, next) {
            if (name === `enabled_modules` && Array.isArray(value)) {
                return [
                    name,
                    value.map(module => {
                        return isWireObject(module) ? module.name : module;
                    }),
                ];
            }
            return next(name, value);
        },
    },
});

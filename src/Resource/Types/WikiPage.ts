import { FormatTemplate } from '../../Common/Template.js';
import { isWireObject } from '../../Common/Wire.js';
import type { ResourceManager } from '../../Domain/Manager.js';
import type { WireScalar } from '../../Types/Attribute.js';
import { BASE_READONLY, BASE_UNCONVERTIBLE, DefineResourceType } from '../ResourceType.js';

/** Wiki pages live inside a project; their manager carries the project scope. */
function projectOf(manager: ResourceManager): WireScalar {
    return manager.params.project_id ?? 0;
}

export const WikiPage = DefineResourceType({
    name: `WikiPage`,
    minimumVersion: `2.2`,
    containerMany: `wiki_pages`,
    containerOne: `wiki_page`,
    queries: {
        filter: `/projects/{project_id}/wiki/index.json`,
        one: `/projects/{project_id}/wiki/{0}.json`,
        create: `/projects/{project_id}/wiki/{title}.json`,
        update: `/projects/{project_id}/wiki/{0}.json`,
        delete: `/projects/{project_id}/wiki/{0}.json`,
    },
    identityKey: `title`,
    representation: [[`title`]],
    includes: [`attachments`],
    unconvertible: [...BASE_UNCONVERTIBLE, `title`, `text`],
    createReadonly: [...BASE_READONLY, `version`],
    overrides: {
        encode(name, value, context, next) {
            if (name === `parent` && isWireObject(value)) {
                const manager = context.manager.newManager(WikiPage.name, { project_id: projectOf(context.manager) });
                return [name, manager.toResource(value)];
            }
            return next(name, value);
        },
        async get(resource, name, next) {
            // index listings omit the page text; fetch the page once when it is first asked for
            if (name === `text` && !resource.attributes.has(`text`) && !resource.isNew()) {
                const fresh = await resource.refresh(false);
                resource.attributes.seed(`text`, fresh.attributes.read(`text`) ?? null);
            }
            return next(name);
        },
        scope(resource) {
            return { project_id: projectOf(resource.manager) };
        },
        url(resource) {
            const template = WikiPage.queries.one ?? ``;
            const path = FormatTemplate(template, [resource.internalId], { project_id: projectOf(resource.manager) });
            return resource.manager.connection.url + path.replace(`.json`, ``);
        },
        toNumber(resource) {
            const version = resource.attributes.read(`version`);
            return typeof version === `number` ? version : 0;
        },
        hooks: {
            // update responses are empty; the server bumps the page version on every save
            postUpdate(resource) {
                const current = resource.attributes.read(`version`);
                const version = (typeof current === `number` ? current : 0) + 1;
                resource.attributes.seed(`version`, version);
                resource.attributes.cache(`version`, version);
            },
        },
    },
});

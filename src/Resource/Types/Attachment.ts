import { ValidationError } from '../../Common/Errors.js';
import type { Resource } from '../Resource.js';
import { DefineResourceType } from '../ResourceType.js';

export const Attachment = DefineResourceType({
    name: `Attachment`,
    minimumVersion: `1.3`,
    containerOne: `attachment`,
    queries: {
        one: `/attachments/{0}.json`,
    },
    representation: [[`id`, `filename`], [`id`]],
});

/**
 * Downloads the attachment's content through the connection.
 * @returns Promise<string> - Path of the written file
 */
export async function DownloadAttachment(attachment: Resource, savePath?: string, filename?: string): Promise<string> {
    if (attachment.type !== Attachment) {
        throw new ValidationError(`Only attachments can be downloaded, got ${attachment.type.name}`);
    }
    const contentUrl = await attachment.get(`content_url`);
    if (typeof contentUrl !== `string` || contentUrl.length === 0) {
        throw new ValidationError(`Attachment ${attachment.internalId} has no content_url`);
    }
    return attachment.manager.connection.download(contentUrl, savePath, filename);
}

import { ValidationError } from './Errors.js';

/** Values that can be substituted into an endpoint template. */
export type TemplateValue = string | number | boolean;

/**
 * Substitutes `{0}`-style positional and `{name}` named placeholders.
 * @param template string - e.g. '/projects/{project_id}/wiki/{0}.json'
 * @param positional TemplateValue[] - Values for numeric placeholders
 * @param named Record<string, unknown> - Values for named placeholders; non-scalar values are rejected
 * @throws ValidationError when a placeholder has no usable value
 * @example
 * FormatTemplate('/issues/{0}.json', [12]); // '/issues/12.json'
 */
export function FormatTemplate(
    template: string,
    positional: readonly TemplateValue[] = [],
    named: Readonly<Record<string, unknown>> = {},
): string {
    return template.replace(/\{([A-Za-z0-9_]+)\}/g, (_match, key: string) => {
        const value = /^\d+$/.test(key) ? positional[Number(key)] : named[key];
        if (typeof value === `string` || typeof value === `number` || typeof value === `boolean`) {
            return String(value);
        }
        throw new ValidationError(`No value for placeholder '{${key}}' in '${template}'`, { template, key });
    });
}

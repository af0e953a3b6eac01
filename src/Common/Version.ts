import { ServerVersionMismatchError } from './Errors.js';

function segments(version: string): Array<number | string> {
    return version
        .split(/[.\-_]/)
        .filter(part => {
            return part.length > 0;
        })
        .map(part => {
            return /^\d+$/.test(part) ? Number(part) : part;
        });
}

/**
 * Loose version comparison: dotted segments, numeric where possible, missing segments sort first.
 * @returns number - negative when a < b, zero when equal, positive when a > b
 * @example
 * CompareVersions('2.2.4', '2.3'); // < 0
 */
export function CompareVersions(a: string, b: string): number {
    const left = segments(a);
    const right = segments(b);
    const length = Math.max(left.length, right.length);

    for (let i = 0; i < length; i++) {
        const l = left[i];
        const r = right[i];
        if (l === r) {
            continue;
        }
        if (l === undefined) {
            return -1;
        }
        if (r === undefined) {
            return 1;
        }
        if (typeof l === `number` && typeof r === `number`) {
            return l - r;
        }
        // numbers sort before words, words compare lexically
        if (typeof l === `number`) {
            return -1;
        }
        if (typeof r === `number`) {
            return 1;
        }
        return l < r ? -1 : 1;
    }
    return 0;
}

/**
 * Fails fast when a known server version is older than required. An unknown version passes.
 * @throws ServerVersionMismatchError
 */
export function AssertServerVersion(serverVersion: string | undefined, requiredVersion: string, feature: string): void {
    if (serverVersion !== undefined && CompareVersions(serverVersion, requiredVersion) < 0) {
        throw new ServerVersionMismatchError(feature, requiredVersion, serverVersion);
    }
}

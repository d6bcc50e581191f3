import { matchSaveName, type DecodedSaveName } from './grammar';
import { SaveNameParseError } from './errors';
import type { SaveName } from './saveName';
import { log } from './log';

export type SaveNameParseResult =
    | { success: true; data: SaveName }
    | { success: false; error: SaveNameParseError };

function toSaveName(decoded: DecodedSaveName): SaveName {
    return Object.freeze({
        tag: decoded.tag,
        ...(decoded.version !== undefined ? { version: decoded.version } : {}),
        ...(decoded.backupId !== undefined ? { backupId: decoded.backupId } : {}),
        ...(decoded.internalTag !== undefined ? { internalTag: decoded.internalTag } : {}),
    });
}

/**
 * Decodes a whole file name. Never yields a partial record: any mismatch
 * anywhere in the name is reported as a failure.
 */
export function safeParseSaveName(name: string): SaveNameParseResult {
    const match = matchSaveName(name);
    if (!match.ok) {
        const error = new SaveNameParseError(name, match.rest, match.expected);
        log.debug(`[save-name] ${error.message}`);
        return { success: false, error };
    }
    return { success: true, data: toSaveName(match.value) };
}

export function parseSaveName(name: string): SaveName {
    const result = safeParseSaveName(name);
    if (!result.success) {
        throw result.error;
    }
    return result.data;
}

export function isSaveName(name: string): boolean {
    return matchSaveName(name).ok;
}

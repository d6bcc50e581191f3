/**
 * Matchers for the save name grammar:
 *
 *   [__<internal>__] user <tag> [_<version>] .dat [.bak<digits>]
 *
 * Every matcher consumes a prefix of its input and reports the unconsumed
 * remainder, so they compose left to right. Optional elements report
 * absence as a successful match of `undefined` with nothing consumed.
 */

export type Success<T> = { ok: true; value: T; rest: string };
export type Failure = { ok: false; rest: string; expected: string };
export type Match<T> = Success<T> | Failure;

export type Matcher<T> = (input: string) => Match<T>;

export const INTERNAL_MARKER = '__';
export const USER_PREFIX = 'user';
export const VERSION_PREFIX = '_';
export const SUFFIX = '.dat';
export const BACKUP_MARKER = '.bak';

export type DecodedSaveName = {
    internalTag: string | undefined;
    tag: string;
    version: string | undefined;
    backupId: string | undefined;
};

function success<T>(value: T, rest: string): Success<T> {
    return { ok: true, value, rest };
}

function failure(rest: string, expected: string): Failure {
    return { ok: false, rest, expected };
}

function leadingDigits(input: string): string {
    let end = 0;
    while (end < input.length && input[end] >= '0' && input[end] <= '9') {
        end++;
    }
    return input.slice(0, end);
}

export function matchLiteral(literal: string): Matcher<string> {
    return (input) => input.startsWith(literal)
        ? success(literal, input.slice(literal.length))
        : failure(input, literal);
}

/**
 * Turns a failure of `matcher` into confirmed absence, consuming nothing.
 */
export function optional<T>(matcher: Matcher<T>): Matcher<T | undefined> {
    return (input) => {
        const result = matcher(input);
        return result.ok ? result : success(undefined, input);
    };
}

export const matchEnd: Matcher<undefined> = (input) => input.length === 0
    ? success(undefined, input)
    : failure(input, 'end of input');

const matchInternalMarker = matchLiteral(INTERNAL_MARKER);
const matchUserPrefix = matchLiteral(USER_PREFIX);
const matchVersionPrefix = matchLiteral(VERSION_PREFIX);
const matchDat = matchLiteral(SUFFIX);
const matchBackupMarker = matchLiteral(BACKUP_MARKER);

/**
 * `__<text>__` with non-empty text ending at the first closing marker.
 * No opening marker means no internal tag; an opening marker without a
 * closing one is a failure.
 */
export const matchInternalTag: Matcher<string | undefined> = (input) => {
    const open = matchInternalMarker(input);
    if (!open.ok) {
        return success(undefined, input);
    }
    const close = open.rest.indexOf(INTERNAL_MARKER, 1);
    if (close === -1) {
        return failure(open.rest, INTERNAL_MARKER);
    }
    return success(open.rest.slice(0, close), open.rest.slice(close + INTERNAL_MARKER.length));
};

const matchVersionSegment: Matcher<string> = (input) => {
    const prefix = matchVersionPrefix(input);
    if (!prefix.ok) {
        return prefix;
    }
    let version = leadingDigits(prefix.rest);
    if (version.length === 0) {
        return failure(prefix.rest, 'version digits');
    }
    let rest = prefix.rest.slice(version.length);
    // a '.' not followed by a digit belongs to whatever comes next
    while (rest.startsWith('.')) {
        const group = leadingDigits(rest.slice(1));
        if (group.length === 0) {
            break;
        }
        version += `.${group}`;
        rest = rest.slice(1 + group.length);
    }
    return success(version, rest);
};

/** `_1.0.28891`, `_1.2.3.28891`; absent when no `_<digits>` follows. */
export const matchVersion: Matcher<string | undefined> = optional(matchVersionSegment);

const matchBackupSegment: Matcher<string> = (input) => {
    const marker = matchBackupMarker(input);
    if (!marker.ok) {
        return marker;
    }
    const id = leadingDigits(marker.rest);
    const end = matchEnd(marker.rest.slice(id.length));
    if (!end.ok) {
        return end;
    }
    return success(id, end.rest);
};

/** `.bak<digits>` at the end of input. An empty id is still a backup. */
export const matchBackup: Matcher<string | undefined> = optional(matchBackupSegment);

/** `.dat` with an optional backup marker, then end of input. Yields the backup id. */
export const matchSuffix: Matcher<string | undefined> = (input) => {
    const dat = matchDat(input);
    if (!dat.ok) {
        return dat;
    }
    const backup = matchBackup(dat.rest);
    if (!backup.ok) {
        return backup;
    }
    const end = matchEnd(backup.rest);
    if (!end.ok) {
        return end;
    }
    return success(backup.value, end.rest);
};

/**
 * True when an optional version followed by the suffix matches the whole
 * input. Consumes nothing.
 */
export function lookAheadTail(input: string): boolean {
    const version = matchVersion(input);
    return version.ok && matchSuffix(version.rest).ok;
}

/**
 * `user` followed by a tag of at least one character. The tag ends at the
 * first position, scanning left to right, where `lookAheadTail` succeeds;
 * the tail itself is left unconsumed.
 */
export const matchUserTag: Matcher<string> = (input) => {
    const prefix = matchUserPrefix(input);
    if (!prefix.ok) {
        return prefix;
    }
    const body = prefix.rest;
    for (let split = 1; split < body.length; split++) {
        if (lookAheadTail(body.slice(split))) {
            return success(body.slice(0, split), body.slice(split));
        }
    }
    return failure(body, 'version or .dat suffix');
};

export const matchSaveName: Matcher<DecodedSaveName> = (input) => {
    const internalTag = matchInternalTag(input);
    if (!internalTag.ok) {
        return internalTag;
    }
    const tag = matchUserTag(internalTag.rest);
    if (!tag.ok) {
        return tag;
    }
    const version = matchVersion(tag.rest);
    if (!version.ok) {
        return version;
    }
    const backupId = matchSuffix(version.rest);
    if (!backupId.ok) {
        return backupId;
    }
    return success({
        internalTag: internalTag.value,
        tag: tag.value,
        version: version.value,
        backupId: backupId.value,
    }, backupId.rest);
};

import * as z from 'zod';
import {
    BACKUP_MARKER,
    INTERNAL_MARKER,
    SUFFIX,
    USER_PREFIX,
    VERSION_PREFIX,
    matchInternalTag,
    matchUserTag,
} from './grammar';
import { InvalidSaveNameError } from './errors';
import { log } from './log';

export const VERSION_PATTERN = /^[0-9]+(\.[0-9]+)*$/;
export const BACKUP_ID_PATTERN = /^[0-9]*$/;

const SaveNameFieldsSchema = z.object({
    tag: z.string().min(1),
    version: z.string().regex(VERSION_PATTERN, 'must be dot-separated digit groups').optional(),
    backupId: z.string().regex(BACKUP_ID_PATTERN, 'must contain only digits').optional(),
    internalTag: z.string().min(1).optional(),
});
type SaveNameFields = z.infer<typeof SaveNameFieldsSchema>;

function renderTail(fields: Pick<SaveNameFields, 'version' | 'backupId'>): string {
    const version = fields.version === undefined ? '' : `${VERSION_PREFIX}${fields.version}`;
    const backup = fields.backupId === undefined ? '' : `${BACKUP_MARKER}${fields.backupId}`;
    return `${version}${SUFFIX}${backup}`;
}

function render(fields: SaveNameFields): string {
    const internal = fields.internalTag === undefined ? '' : `${INTERNAL_MARKER}${fields.internalTag}${INTERNAL_MARKER}`;
    return `${internal}${USER_PREFIX}${fields.tag}${renderTail(fields)}`;
}

/**
 * A decoded save name. Tags and internal tags are restricted to values that
 * read back unchanged: a tag like `1_2` without a version would format to
 * `user1_2.dat`, which reads as tag `1` with version `2`, so it is rejected.
 */
export const SaveNameSchema = SaveNameFieldsSchema.pipe(SaveNameFieldsSchema.superRefine((fields, ctx) => {
    if (fields.internalTag !== undefined) {
        const internal = matchInternalTag(`${INTERNAL_MARKER}${fields.internalTag}${INTERNAL_MARKER}${USER_PREFIX}`);
        if (!internal.ok || internal.value !== fields.internalTag) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['internalTag'],
                message: `"${fields.internalTag}" does not read back between ${INTERNAL_MARKER} markers`,
            });
        }
    }
    const userTag = matchUserTag(`${USER_PREFIX}${fields.tag}${renderTail(fields)}`);
    if (!userTag.ok || userTag.value !== fields.tag) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['tag'],
            message: userTag.ok
                ? `"${fields.tag}" would be read back as "${userTag.value}"`
                : `"${fields.tag}" does not read back as a tag`,
        });
    }
}));
export type SaveName = Readonly<z.infer<typeof SaveNameSchema>>;

export type SaveNameInput = {
    tag: string;
    version?: string;
    backupId?: string;
    internalTag?: string;
};

function toInvalidSaveNameError(error: z.ZodError): InvalidSaveNameError {
    return new InvalidSaveNameError(error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
    })));
}

function validate(fields: SaveNameInput): SaveName | InvalidSaveNameError {
    const parsed = SaveNameSchema.safeParse(fields);
    if (!parsed.success) {
        return toInvalidSaveNameError(parsed.error);
    }
    return Object.freeze(parsed.data);
}

/**
 * Builds a frozen record, throwing InvalidSaveNameError if a field is ill-formed.
 */
export function createSaveName(fields: SaveNameInput): SaveName {
    const record = validate(fields);
    if (record instanceof InvalidSaveNameError) {
        log.debug(`[save-name] rejected fields: ${record.message}`);
        throw record;
    }
    return record;
}

/**
 * `[__internalTag__]user<tag>[_version].dat[.bak<backupId>]`
 *
 * Fields are validated before anything is rendered.
 */
export function formatSaveName(record: SaveNameInput): string {
    const valid = validate(record);
    if (valid instanceof InvalidSaveNameError) {
        log.debug(`[save-name] cannot format record: ${valid.message}`);
        throw valid;
    }
    return render(valid);
}

export function isBackup(record: SaveNameInput): boolean {
    return record.backupId !== undefined;
}

export {
    SaveNameSchema,
    VERSION_PATTERN,
    BACKUP_ID_PATTERN,
    createSaveName,
    formatSaveName,
    isBackup,
} from './saveName';
export type { SaveName, SaveNameInput } from './saveName';
export { parseSaveName, safeParseSaveName, isSaveName } from './parse';
export type { SaveNameParseResult } from './parse';
export {
    matchLiteral,
    optional,
    matchEnd,
    matchInternalTag,
    matchUserTag,
    matchVersion,
    matchBackup,
    matchSuffix,
    matchSaveName,
    lookAheadTail,
} from './grammar';
export type { Match, Matcher, Success, Failure, DecodedSaveName } from './grammar';
export { SaveNameParseError, InvalidSaveNameError } from './errors';
export type { SaveNameIssue } from './errors';
export { loadConfig } from './config';
export type { Config } from './config';
export { Logger, log } from './log';
export type { LoggerOptions } from './log';

/**
 * Raised when a string does not belong to the save name scheme.
 * `remainder` is the unconsumed input at the point the grammar stopped matching.
 */
export class SaveNameParseError extends Error {
    readonly input: string;
    readonly remainder: string;
    readonly expected: string;
    readonly position: number;

    constructor(input: string, remainder: string, expected: string) {
        const position = input.length - remainder.length;
        super(`Invalid save name "${input}": expected ${expected} at position ${position}`);
        this.name = 'SaveNameParseError';
        this.input = input;
        this.remainder = remainder;
        this.expected = expected;
        this.position = position;
    }
}

export type SaveNameIssue = {
    path: string;
    message: string;
};

export class InvalidSaveNameError extends Error {
    readonly issues: SaveNameIssue[];

    constructor(issues: SaveNameIssue[]) {
        super(`Invalid save name fields: ${issues.map(issue => `${issue.path || 'record'}: ${issue.message}`).join('; ')}`);
        this.name = 'InvalidSaveNameError';
        this.issues = issues;
    }
}

export enum ConfigurationErrorCode {
    PROGRAM_FILE_NOT_FOUND = 'PROGRAM_FILE_NOT_FOUND',
    PROGRAM_FILE_UNREADABLE = 'PROGRAM_FILE_UNREADABLE',
    INVALID_COMPUTE_BUDGET = 'INVALID_COMPUTE_BUDGET',
    INVALID_SYSVAR = 'INVALID_SYSVAR',
    INVALID_FEATURE = 'INVALID_FEATURE',
}

export enum InstructionValidationErrorCode {
    ACCOUNT_MISSING = 'ACCOUNT_MISSING',
}

export enum CheckErrorCode {
    CHECKS_FAILED = 'CHECKS_FAILED',
}

export enum FixtureAdapterErrorCode {
    INVALID_ACCOUNT_INDEX = 'INVALID_ACCOUNT_INDEX',
    INVALID_RESULT = 'INVALID_RESULT',
}

class MetaError extends Error {
    code: string;
    functionName: string;
    codeMessage?: string;

    constructor(code: string, functionName: string, codeMessage?: string) {
        super(`${code}: ${codeMessage}`);
        this.code = code;
        this.functionName = functionName;
        this.codeMessage = codeMessage;
    }
}

export class ConfigurationError extends MetaError {}

export class InstructionValidationError extends MetaError {}

export class FixtureAdapterError extends MetaError {}

/**
 * One failed check: what was asserted, what was expected and what the
 * result held instead.
 */
export interface CheckMismatch {
    subject: string;
    expected: string;
    actual: string;
}

export class CheckFailureError extends MetaError {
    mismatches: CheckMismatch[];

    constructor(
        functionName: string,
        mismatches: CheckMismatch[],
        context?: string,
    ) {
        const header = `${context ? `${context}: ` : ''}${mismatches.length} ${
            mismatches.length === 1 ? 'check' : 'checks'
        } failed`;
        const lines = mismatches.map(
            mismatch =>
                `  - ${mismatch.subject}: expected ${mismatch.expected}, got ${mismatch.actual}`,
        );
        super(
            CheckErrorCode.CHECKS_FAILED,
            functionName,
            [header, ...lines].join('\n'),
        );
        this.mismatches = mismatches;
    }
}

export enum FixtureErrorCode {
    INVALID_FILE_EXTENSION = 'INVALID_FILE_EXTENSION',
    DECODE_FAILED = 'DECODE_FAILED',
    INVALID_JSON = 'INVALID_JSON',
    INVALID_ACCOUNT_INDEX = 'INVALID_ACCOUNT_INDEX',
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

export class FixtureError extends MetaError {}

export enum BenchErrorCode {
    INVALID_OPTIONS = 'INVALID_OPTIONS',
    BENCH_FAILED = 'BENCH_FAILED',
    INVALID_REPORT = 'INVALID_REPORT',
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

export class BenchError extends MetaError {}

import fs from 'fs';
import path from 'path';
import { ConfigurationError, ConfigurationErrorCode } from '../errors';

/**
 * Directories searched for `<name>.so`, in order: `tests/fixtures`, then
 * `BPF_OUT_DIR` and `SBF_OUT_DIR` when `env` sets them, then the working
 * directory.
 */
export function defaultProgramSearchPaths(
    env: Record<string, string | undefined> = {},
): string[] {
    const searchPaths = [path.join('tests', 'fixtures')];
    if (env.BPF_OUT_DIR) searchPaths.push(env.BPF_OUT_DIR);
    if (env.SBF_OUT_DIR) searchPaths.push(env.SBF_OUT_DIR);
    searchPaths.push(process.cwd());
    return searchPaths;
}

export function findProgramFile(
    programName: string,
    searchPaths: readonly string[],
): string | undefined {
    const fileName = `${programName}.so`;
    return searchPaths
        .map(dir => path.join(dir, fileName))
        .find(candidate => fs.existsSync(candidate));
}

/**
 * Reads the ELF image of `programName` from the first search path that
 * holds it.
 */
export function loadProgramElf(
    programName: string,
    searchPaths: readonly string[],
): Uint8Array {
    const filePath = findProgramFile(programName, searchPaths);
    if (!filePath) {
        throw new ConfigurationError(
            ConfigurationErrorCode.PROGRAM_FILE_NOT_FOUND,
            'loadProgramElf',
            `${programName}.so not found in ${searchPaths.join(', ')}`,
        );
    }
    try {
        return new Uint8Array(fs.readFileSync(filePath));
    } catch (error) {
        throw new ConfigurationError(
            ConfigurationErrorCode.PROGRAM_FILE_UNREADABLE,
            'loadProgramElf',
            `${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        );
    }
}

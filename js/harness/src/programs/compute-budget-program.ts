import {
    BUILTIN_DEFAULT_COMPUTE_UNITS,
    COMPUTE_BUDGET_PROGRAM_ID,
} from '../constants';
import type { InstructionContext } from '../runtime/instruction-context';
import type { BuiltinProgram } from './registry';

/**
 * Compute budget requests only matter when a transaction is assembled. In
 * the harness the budget comes from the environment, so the program just
 * charges its cost.
 */
export function processComputeBudgetInstruction(
    context: InstructionContext,
): void {
    context.consumeComputeUnits(BUILTIN_DEFAULT_COMPUTE_UNITS);
}

export const COMPUTE_BUDGET_PROGRAM: BuiltinProgram = {
    kind: 'builtin',
    programId: COMPUTE_BUDGET_PROGRAM_ID,
    name: 'compute_budget_program',
    processor: processComputeBudgetInstruction,
};

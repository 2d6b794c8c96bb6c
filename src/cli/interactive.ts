// Menu-driven calculator session over a pair of streams

import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import { Calculator, type ArithmeticOperation } from '../calculator.js';
import { CalculatorError } from '../errors.js';

export const MENU = '1. Add\n2. Subtract\n3. Multiply\n4. Divide\n5. Exit\n';

const EXIT_CHOICE = 5;

const MENU_OPERATIONS: Record<number, ArithmeticOperation> = {
    1: 'add',
    2: 'subtract',
    3: 'multiply',
    4: 'divide',
};

type SessionState =
    | { step: 'choice' }
    | { step: 'first'; operation: ArithmeticOperation }
    | { step: 'second'; operation: ArithmeticOperation; first: number };

function promptFor(state: SessionState): string {
    switch (state.step) {
        case 'choice': return 'Enter choice: ';
        case 'first': return 'Enter number 1: ';
        case 'second': return 'Enter number 2: ';
    }
}

function parseChoice(line: string): number | undefined {
    const trimmed = line.trim();
    if (!/^\d+$/.test(trimmed)) {
        return undefined;
    }
    const choice = parseInt(trimmed, 10);
    return choice >= 1 && choice <= EXIT_CHOICE ? choice : undefined;
}

function parseOperand(line: string): number | undefined {
    const trimmed = line.trim();
    if (trimmed === '') {
        return undefined;
    }
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : undefined;
}

/**
 * Run the interactive menu until the user picks Exit or input ends
 * @param calculator Calculator the session operates on
 * @param input Line source, usually process.stdin
 * @param output Prompt and result sink, usually process.stdout
 * @returns Number of operations that produced a result
 */
export async function runInteractive(calculator: Calculator, input: Readable, output: Writable): Promise<number> {
    const rl = createInterface({ input, terminal: false });
    let completed = 0;
    let state: SessionState = { step: 'choice' };

    output.write(MENU);
    output.write(promptFor(state));

    try {
        for await (const line of rl) {
            if (state.step === 'choice') {
                const choice = parseChoice(line);
                if (choice === EXIT_CHOICE) {
                    break;
                }
                if (choice !== undefined) {
                    state = { step: 'first', operation: MENU_OPERATIONS[choice] };
                }
            } else {
                const value = parseOperand(line);
                if (value === undefined) {
                    output.write('Invalid number\n');
                } else if (state.step === 'first') {
                    state = { step: 'second', operation: state.operation, first: value };
                } else {
                    try {
                        const result = calculator.apply(state.operation, state.first, value);
                        output.write(`Result: ${result}\n\n`);
                        completed++;
                    } catch (error) {
                        if (!(error instanceof CalculatorError)) {
                            throw error;
                        }
                        output.write(`Error: ${error.message}\n\n`);
                    }
                    state = { step: 'choice' };
                }
            }
            output.write(promptFor(state));
        }
    } finally {
        rl.close();
    }

    return completed;
}

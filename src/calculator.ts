// Calculator with a single memory register and last-result tracking

import { DivisionByZeroError, InvalidArgumentError, OverflowError } from './errors.js';
import { DEFAULT_EPSILON, MathUtils } from './utils.js';

export interface CalculatorOptions {
    /** Divisors with an absolute value below this count as zero (default 1e-9) */
    epsilon?: number;
}

/**
 * Operations the interactive menu and the MCP server dispatch to
 */
export type ArithmeticOperation = 'add' | 'subtract' | 'multiply' | 'divide';

export const ARITHMETIC_OPERATIONS: readonly ArithmeticOperation[] = ['add', 'subtract', 'multiply', 'divide'];

/**
 * Basic four-function calculator.
 *
 * Every successful arithmetic call records its result as the last result.
 * A failed call throws before touching any state. The memory register is
 * only changed by the memory* methods.
 */
export class Calculator {
    readonly epsilon: number;
    private memory = 0;
    private lastResult = 0;

    constructor(options: CalculatorOptions = {}) {
        const epsilon = options.epsilon ?? DEFAULT_EPSILON;
        if (!MathUtils.isFinite(epsilon) || epsilon <= 0) {
            throw new InvalidArgumentError(`Epsilon must be a positive finite number, got ${epsilon}`);
        }
        this.epsilon = epsilon;
    }

    add(a: number, b: number): number {
        return this.record(this.checkOverflow(a + b, 'Addition overflow'));
    }

    subtract(a: number, b: number): number {
        return this.record(this.checkOverflow(a - b, 'Subtraction overflow'));
    }

    multiply(a: number, b: number): number {
        return this.record(this.checkOverflow(a * b, 'Multiplication overflow'));
    }

    /**
     * Divide a by b.
     * The result is not checked for overflow, so a huge dividend over a tiny
     * divisor can return Infinity.
     * @throws DivisionByZeroError when |b| is below epsilon
     */
    divide(a: number, b: number): number {
        if (MathUtils.isZero(b, this.epsilon)) {
            throw new DivisionByZeroError('Division by zero');
        }
        return this.record(a / b);
    }

    /**
     * Run one of the four arithmetic operations by name
     */
    apply(operation: ArithmeticOperation, a: number, b: number): number {
        switch (operation) {
            case 'add': return this.add(a, b);
            case 'subtract': return this.subtract(a, b);
            case 'multiply': return this.multiply(a, b);
            case 'divide': return this.divide(a, b);
        }
    }

    memoryStore(value: number): void {
        this.memory = value;
    }

    memoryRecall(): number {
        return this.memory;
    }

    memoryClear(): void {
        this.memory = 0;
    }

    /**
     * Reset the last result. Memory is left as is.
     */
    clear(): void {
        this.lastResult = 0;
    }

    getLastResult(): number {
        return this.lastResult;
    }

    private checkOverflow(result: number, message: string): number {
        if (!MathUtils.isFinite(result)) {
            throw new OverflowError(message);
        }
        return result;
    }

    private record(result: number): number {
        this.lastResult = result;
        return result;
    }
}

export function isArithmeticOperation(value: string): value is ArithmeticOperation {
    return ARITHMETIC_OPERATIONS.some(operation => operation === value);
}

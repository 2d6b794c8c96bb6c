// Error types raised by the calculator core

/**
 * Base class for every error the calculator raises.
 * Callers that present errors to a user catch this type and rethrow anything else.
 */
export class CalculatorError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * A result exceeds the range of a finite double
 */
export class OverflowError extends CalculatorError {}

/**
 * The divisor is within epsilon of zero
 */
export class DivisionByZeroError extends CalculatorError {}

/**
 * An argument lies outside the function's domain
 */
export class InvalidArgumentError extends CalculatorError {}

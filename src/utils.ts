// Math utility functions shared by the calculator and its surfaces

import { InvalidArgumentError, OverflowError } from './errors.js';

/** Tolerance used when a caller does not pass one */
export const DEFAULT_EPSILON = 1e-9;

/** Largest n whose factorial is still a finite double (171! is not) */
export const MAX_FACTORIAL_INPUT = 170;

/**
 * Pure math helpers. None of these functions keep state.
 */
export namespace MathUtils {
    /**
     * Whether a value is close enough to zero to be treated as zero
     * @param value Value to test
     * @param epsilon Tolerance, exclusive
     */
    export function isZero(value: number, epsilon: number = DEFAULT_EPSILON): boolean {
        return Math.abs(value) < epsilon;
    }

    /**
     * Whether two values differ by less than epsilon
     */
    export function areEqual(a: number, b: number, epsilon: number = DEFAULT_EPSILON): boolean {
        return Math.abs(a - b) < epsilon;
    }

    /**
     * Factorial computed as a double
     * @param n Non-negative integer, at most 170
     * @returns n!
     * @throws InvalidArgumentError for negative or fractional n
     * @throws OverflowError when n! does not fit in a double
     */
    export function factorial(n: number): number {
        if (!Number.isInteger(n)) {
            throw new InvalidArgumentError(`Factorial requires an integer, got ${n}`);
        }
        if (n < 0) {
            throw new InvalidArgumentError('Factorial undefined for negative numbers');
        }
        if (n > MAX_FACTORIAL_INPUT) {
            throw new OverflowError('Factorial too large for double precision');
        }
        if (n <= 1) return 1;

        let result = 1;
        for (let i = 2; i <= n; i++) {
            result *= i;
        }
        return result;
    }

    /**
     * Integer power by binary exponentiation
     * @param base Base number
     * @param exponent Integer exponent, may be negative
     * @returns base^exponent
     * @throws InvalidArgumentError for a fractional exponent, or a zero base with a negative exponent
     */
    export function power(base: number, exponent: number): number {
        if (!Number.isInteger(exponent)) {
            throw new InvalidArgumentError(`Exponent must be an integer, got ${exponent}`);
        }
        if (exponent === 0) return 1;

        if (exponent < 0) {
            if (isZero(base)) {
                throw new InvalidArgumentError('Cannot raise zero to a negative power');
            }
            return 1 / power(base, -exponent);
        }

        let result = 1;
        let currentPower = base;
        let remaining = exponent;
        while (remaining > 0) {
            if (remaining % 2 === 1) {
                result *= currentPower;
            }
            currentPower *= currentPower;
            remaining = Math.floor(remaining / 2);
        }
        return result;
    }

    export function degreeToRadian(degrees: number): number {
        return degrees * Math.PI / 180;
    }

    export function radianToDegree(radians: number): number {
        return radians * 180 / Math.PI;
    }

    /**
     * True for any number that is neither infinite nor NaN
     */
    export function isFinite(value: number): boolean {
        return Number.isFinite(value);
    }

    /**
     * Whether value is in the domain of the logarithm (strictly positive, finite)
     */
    export function isValidForLog(value: number): boolean {
        return value > 0 && isFinite(value);
    }

    /**
     * Whether value is in the domain of the square root (non-negative, finite)
     */
    export function isValidForSqrt(value: number): boolean {
        return value >= 0 && isFinite(value);
    }
}

import { describe, expect, it } from 'vitest';
import { Calculator } from '../src/calculator.js';
import { DivisionByZeroError, InvalidArgumentError, OverflowError } from '../src/errors.js';

describe('Calculator', () => {
  describe('arithmetic', () => {
    it('adds and records the last result', () => {
      const calculator = new Calculator();
      expect(calculator.add(2, 3)).toBe(5);
      expect(calculator.getLastResult()).toBe(5);
    });

    it('subtracts', () => {
      const calculator = new Calculator();
      expect(calculator.subtract(2, 3)).toBe(-1);
      expect(calculator.getLastResult()).toBe(-1);
    });

    it('multiplies', () => {
      const calculator = new Calculator();
      expect(calculator.multiply(-4, 2.5)).toBe(-10);
      expect(calculator.getLastResult()).toBe(-10);
    });

    it('divides', () => {
      const calculator = new Calculator();
      expect(calculator.divide(7, 2)).toBe(3.5);
      expect(calculator.getLastResult()).toBe(3.5);
    });

    it('dispatches by operation name', () => {
      const calculator = new Calculator();
      expect(calculator.apply('multiply', 3, 4)).toBe(12);
      expect(calculator.apply('subtract', 3, 4)).toBe(-1);
      expect(calculator.getLastResult()).toBe(-1);
    });
  });

  describe('overflow', () => {
    it('rejects an infinite sum', () => {
      const calculator = new Calculator();
      expect(() => calculator.add(Number.MAX_VALUE, Number.MAX_VALUE)).toThrow(OverflowError);
      expect(() => calculator.add(Number.MAX_VALUE, Number.MAX_VALUE)).toThrow('Addition overflow');
    });

    it('rejects an infinite difference', () => {
      const calculator = new Calculator();
      expect(() => calculator.subtract(-Number.MAX_VALUE, Number.MAX_VALUE)).toThrow('Subtraction overflow');
    });

    it('rejects an infinite product', () => {
      const calculator = new Calculator();
      expect(() => calculator.multiply(1e200, 1e200)).toThrow('Multiplication overflow');
    });

    it('treats a NaN result as overflow', () => {
      const calculator = new Calculator();
      expect(() => calculator.add(NaN, 1)).toThrow(OverflowError);
    });

    it('leaves the last result unchanged on failure', () => {
      const calculator = new Calculator();
      calculator.add(1, 1);
      expect(() => calculator.multiply(1e200, 1e200)).toThrow(OverflowError);
      expect(calculator.getLastResult()).toBe(2);
    });

    it('does not check the quotient for overflow', () => {
      const calculator = new Calculator();
      expect(calculator.divide(Number.MAX_VALUE, 0.5)).toBe(Infinity);
      expect(calculator.getLastResult()).toBe(Infinity);
    });
  });

  describe('division by zero', () => {
    it.each([0, -0, 1e-10, -1e-10])('rejects divisor %s', (divisor) => {
      const calculator = new Calculator();
      expect(() => calculator.divide(42, divisor)).toThrow(DivisionByZeroError);
    });

    it('keeps the previous last result', () => {
      const calculator = new Calculator();
      calculator.add(4, 5);
      expect(() => calculator.divide(1, 0)).toThrow('Division by zero');
      expect(calculator.getLastResult()).toBe(9);
    });

    it('accepts a divisor exactly at epsilon', () => {
      const calculator = new Calculator();
      expect(calculator.divide(1, 1e-9)).toBeCloseTo(1e9);
    });

    it('uses a custom epsilon', () => {
      const calculator = new Calculator({ epsilon: 1e-3 });
      expect(calculator.epsilon).toBe(1e-3);
      expect(() => calculator.divide(1, 1e-4)).toThrow(DivisionByZeroError);
      expect(new Calculator().divide(1, 1e-4)).toBeCloseTo(10000);
    });

    it.each([0, -1, NaN, Infinity])('rejects epsilon %s', (epsilon) => {
      expect(() => new Calculator({ epsilon })).toThrow(InvalidArgumentError);
    });
  });

  describe('memory', () => {
    it('starts at zero', () => {
      const calculator = new Calculator();
      expect(calculator.memoryRecall()).toBe(0);
      expect(calculator.getLastResult()).toBe(0);
    });

    it('recalls the stored value exactly', () => {
      const calculator = new Calculator();
      calculator.memoryStore(0.1 + 0.2);
      expect(calculator.memoryRecall()).toBe(0.1 + 0.2);
    });

    it('clears to zero', () => {
      const calculator = new Calculator();
      calculator.memoryStore(12);
      calculator.memoryClear();
      expect(calculator.memoryRecall()).toBe(0);
    });

    it('is not touched by arithmetic', () => {
      const calculator = new Calculator();
      calculator.memoryStore(7);
      calculator.add(1, 2);
      calculator.divide(9, 3);
      expect(calculator.memoryRecall()).toBe(7);
    });
  });

  describe('clear', () => {
    it('resets the last result and keeps memory', () => {
      const calculator = new Calculator();
      calculator.memoryStore(42);
      calculator.multiply(6, 7);
      calculator.clear();
      expect(calculator.getLastResult()).toBe(0);
      expect(calculator.memoryRecall()).toBe(42);
    });
  });
});

export {
    Calculator,
    ARITHMETIC_OPERATIONS,
    isArithmeticOperation,
    type ArithmeticOperation,
    type CalculatorOptions,
} from './calculator.js';
export { CalculatorError, DivisionByZeroError, InvalidArgumentError, OverflowError } from './errors.js';
export { MathUtils, DEFAULT_EPSILON, MAX_FACTORIAL_INPUT } from './utils.js';
export { runInteractive, MENU } from './cli/interactive.js';
export { CalculatorServer, CALCULATOR_TOOLS, handleToolCall } from './mcp/index.js';

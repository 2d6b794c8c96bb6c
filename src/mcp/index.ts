import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import path from 'path';
import fs from 'fs-extra';
import { fileURLToPath } from 'url';
import { Calculator, isArithmeticOperation } from '../calculator.js';
import { MathUtils } from '../utils.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

type ToolArguments = Record<string, unknown> | undefined;

/**
 * Read the package version, trying the source layout and the build layout
 */
export function readPackageVersion(): string {
  const possiblePaths = [
    path.resolve(__dirname, '..', '..', 'package.json'), // src/mcp or dist/mcp
    path.resolve(__dirname, '..', 'package.json'),
  ];

  for (const packageJsonPath of possiblePaths) {
    try {
      if (fs.existsSync(packageJsonPath)) {
        const packageJson: unknown = fs.readJsonSync(packageJsonPath);
        if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson &&
            typeof packageJson.version === 'string') {
          return packageJson.version;
        }
      }
    } catch (error) {
      console.error(`Error reading package.json at ${packageJsonPath}:`, error);
    }
  }

  return '0.0.0';
}

function numberSchema(description: string) {
  return { type: 'number', description };
}

function binaryTool(name: string, description: string): Tool {
  return {
    name,
    description,
    inputSchema: {
      type: 'object',
      properties: {
        a: numberSchema('First operand'),
        b: numberSchema('Second operand'),
      },
      required: ['a', 'b'],
    },
  };
}

function unaryTool(name: string, description: string, argument: string, argumentDescription: string): Tool {
  return {
    name,
    description,
    inputSchema: {
      type: 'object',
      properties: {
        [argument]: numberSchema(argumentDescription),
      },
      required: [argument],
    },
  };
}

function noArgumentTool(name: string, description: string): Tool {
  return {
    name,
    description,
    inputSchema: { type: 'object', properties: {} },
  };
}

export const CALCULATOR_TOOLS: Tool[] = [
  binaryTool('add', 'Add b to a. The result becomes the last result.'),
  binaryTool('subtract', 'Subtract b from a. The result becomes the last result.'),
  binaryTool('multiply', 'Multiply a by b. The result becomes the last result.'),
  binaryTool('divide', 'Divide a by b. Fails when b is approximately zero.'),
  unaryTool('memory_store', 'Store a value in the memory register', 'value', 'Value to store'),
  noArgumentTool('memory_recall', 'Read the memory register'),
  noArgumentTool('memory_clear', 'Reset the memory register to 0'),
  noArgumentTool('clear', 'Reset the last result to 0. Memory is kept.'),
  noArgumentTool('last_result', 'Read the result of the most recent arithmetic operation'),
  unaryTool('factorial', 'Factorial of a non-negative integer up to 170', 'n', 'Non-negative integer'),
  {
    name: 'power',
    description: 'Raise base to an integer exponent',
    inputSchema: {
      type: 'object',
      properties: {
        base: numberSchema('Base'),
        exponent: numberSchema('Integer exponent, may be negative'),
      },
      required: ['base', 'exponent'],
    },
  },
  unaryTool('degree_to_radian', 'Convert degrees to radians', 'degrees', 'Angle in degrees'),
  unaryTool('radian_to_degree', 'Convert radians to degrees', 'radians', 'Angle in radians'),
];

function readNumber(args: ToolArguments, key: string): number {
  const value = args?.[key];
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new Error(`Argument "${key}" must be a number`);
  }
  return value;
}

function text(value: string | number): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: String(value),
      },
    ],
  };
}

function runTool(calculator: Calculator, name: string, args: ToolArguments): string | number {
  if (isArithmeticOperation(name)) {
    return calculator.apply(name, readNumber(args, 'a'), readNumber(args, 'b'));
  }

  switch (name) {
    case 'memory_store': {
      const value = readNumber(args, 'value');
      calculator.memoryStore(value);
      return `Stored ${value}`;
    }
    case 'memory_recall':
      return calculator.memoryRecall();
    case 'memory_clear':
      calculator.memoryClear();
      return 'Memory cleared';
    case 'clear':
      calculator.clear();
      return 'Cleared';
    case 'last_result':
      return calculator.getLastResult();
    case 'factorial':
      return MathUtils.factorial(readNumber(args, 'n'));
    case 'power':
      return MathUtils.power(readNumber(args, 'base'), readNumber(args, 'exponent'));
    case 'degree_to_radian':
      return MathUtils.degreeToRadian(readNumber(args, 'degrees'));
    case 'radian_to_degree':
      return MathUtils.radianToDegree(readNumber(args, 'radians'));
    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}

/**
 * Execute one tool call against a calculator.
 * Unknown tools raise McpError; any failure of a known tool comes back as an error result.
 */
export function handleToolCall(calculator: Calculator, name: string, args: ToolArguments): CallToolResult {
  try {
    console.error(`Received request for tool: ${name}`);
    console.error(`Request arguments: ${JSON.stringify(args)}`);
    return text(runTool(calculator, name, args));
  } catch (error) {
    if (error instanceof McpError) {
      throw error;
    }
    console.error(`Error executing ${name}:`, error);
    return {
      content: [
        {
          type: 'text',
          text: `Error executing ${name}: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
      isError: true,
    };
  }
}

export class CalculatorServer {
  private server: Server;
  private calculator: Calculator;

  constructor(calculator: Calculator) {
    this.calculator = calculator;
    this.server = new Server(
      {
        name: 'calculator',
        version: readPackageVersion(),
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();

    this.server.onerror = (error) => console.error('[MCP Error]', error);
  }

  private setupToolHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: CALCULATOR_TOOLS,
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      handleToolCall(this.calculator, request.params.name, request.params.arguments)
    );
  }

  /**
   * Attach the server to a transport without installing process handlers
   */
  async connect(transport: Transport) {
    await this.server.connect(transport);
  }

  async close() {
    await this.server.close();
  }

  async run() {
    process.on('SIGINT', () => {
      this.server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('Error closing MCP server:', error);
          process.exit(1);
        }
      );
    });

    const transport = new StdioServerTransport();
    await this.connect(transport);
    console.error('Calculator MCP server running on stdio');
  }
}

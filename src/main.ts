// Command selection and configuration for the calculator binary

import type { Readable, Writable } from 'stream';
import { Calculator } from './calculator.js';
import { runInteractive } from './cli/interactive.js';
import { CalculatorServer } from './mcp/index.js';

export type Command = 'interactive' | 'mcp';

export interface CliConfig {
    command: Command;
    epsilon?: number;
    help: boolean;
}

export interface SessionStreams {
    input: Readable;
    output: Writable;
}

export const USAGE = `
Calculator

Usage:
  calculator [mcp] [options]

Commands:
  (none)                  Start the interactive menu
  mcp                     Serve calculator tools over MCP on stdio

Options:
  --epsilon <value>       Tolerance under which a divisor counts as zero (default: 1e-9)
  --help, -h              Show this help message

Environment:
  CALCULATOR_EPSILON      Used when --epsilon is not given
`;

function parseEpsilon(raw: string, source: string): number | undefined {
    const epsilon = Number(raw);
    if (raw.trim() !== '' && Number.isFinite(epsilon) && epsilon > 0) {
        console.error(`Epsilon set to ${epsilon} from ${source}`);
        return epsilon;
    }
    console.error(`Invalid epsilon value from ${source}: ${raw}. Using default.`);
    return undefined;
}

/**
 * Parse command-line arguments, falling back to the environment for unset options
 */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
    const config: CliConfig = { command: 'interactive', help: false };
    let epsilonGiven = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--epsilon' && i + 1 < argv.length) {
            config.epsilon = parseEpsilon(argv[i + 1], '--epsilon');
            epsilonGiven = true;
            i++; // Skip the value
        } else if (arg === '--help' || arg === '-h') {
            config.help = true;
        } else if (arg === 'mcp') {
            config.command = 'mcp';
        } else {
            console.error(`Ignoring unknown argument: ${arg}`);
        }
    }

    const envEpsilon = env.CALCULATOR_EPSILON;
    if (!epsilonGiven && envEpsilon !== undefined) {
        config.epsilon = parseEpsilon(envEpsilon, 'CALCULATOR_EPSILON');
    }

    return config;
}

export async function main(
    argv: string[] = process.argv.slice(2),
    streams: SessionStreams = { input: process.stdin, output: process.stdout },
): Promise<void> {
    const config = parseArgs(argv);
    if (config.help) {
        console.error(USAGE);
        return;
    }

    const calculator = new Calculator({ epsilon: config.epsilon });

    if (config.command === 'mcp') {
        await new CalculatorServer(calculator).run();
        return;
    }

    await runInteractive(calculator, streams.input, streams.output);
}

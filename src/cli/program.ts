/**
 * `ask-stock` command: resolves the question, optionally prints the parsed
 * intent, runs the agent and maps the outcome to an exit code
 * (0 answered, 1 a stage failed, 2 bad usage).
 */
import readline from "node:readline";

import { Command, CommanderError, InvalidArgumentError } from "commander";

import {
  createFinanceAgent,
  defaultFinanceAgentDeps,
  type FinanceAgent,
} from "../agent/financeAgent.js";
import { RunCancelled, UnresolvedIntent } from "../agent/errors.js";
import { resolveQuestion, type ParsedIntent } from "../parsing/resolve.js";
import { parseIsoDate } from "../parsing/timeframes.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly readQuestion: () => Promise<string>;
}

export interface CliDeps {
  readonly createAgent?: () => FinanceAgent;
  readonly io?: Partial<CliIo>;
}

interface CliOptions {
  readonly today?: string;
  readonly showParsed?: boolean;
  readonly timeout: number;
}

const PROMPT = "Enter your finance question: ";

/**
 * Reads the question from `input`. A terminal gets a one-line prompt; piped
 * input is read to the end. Either way EOF without text yields "".
 */
export async function readQuestionFrom(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  interactive: boolean,
): Promise<string> {
  if (!interactive) {
    const rl = readline.createInterface({ input, crlfDelay: Infinity });
    const lines: string[] = [];
    for await (const line of rl) {
      lines.push(line);
    }
    return lines.join("\n").trim();
  }

  const rl = readline.createInterface({ input, output });
  return new Promise<string>((resolve) => {
    let answered = false;
    rl.once("close", () => {
      if (!answered) {
        resolve("");
      }
    });
    rl.question(PROMPT, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  readQuestion: () => readQuestionFrom(process.stdin, process.stderr, Boolean(process.stdin.isTTY)),
};

function parseToday(value: string): string {
  if (!parseIsoDate(value)) {
    throw new InvalidArgumentError("Expected a YYYY-MM-DD date.");
  }
  return value;
}

function parseTimeout(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Expected a positive number of seconds.");
  }
  return seconds;
}

async function execute(
  words: readonly string[],
  options: CliOptions,
  io: CliIo,
  createAgent: () => FinanceAgent,
): Promise<number> {
  const question = words.join(" ").trim() || (await io.readQuestion()).trim();
  if (!question) {
    io.stderr("Error: no question provided via argument or stdin. Use --help for usage.");
    return EXIT_USAGE;
  }

  let parsed: ParsedIntent;
  try {
    parsed = resolveQuestion(question, { today: options.today });
  } catch (error: unknown) {
    if (error instanceof UnresolvedIntent) {
      io.stderr(`resolution failed: ${error.message}`);
      return EXIT_FAILED;
    }
    throw error;
  }

  if (options.showParsed) {
    io.stdout(JSON.stringify(parsed, null, 2));
  }

  try {
    const outcome = await createAgent().run(question, parsed, {
      signal: AbortSignal.timeout(options.timeout * 1000),
    });
    if (outcome.status === "DONE") {
      io.stdout(outcome.finalAnswer);
      return EXIT_OK;
    }
    io.stderr(`${outcome.stage} failed: ${outcome.error.message}`);
    return EXIT_FAILED;
  } catch (error: unknown) {
    if (error instanceof RunCancelled) {
      io.stderr(`${error.stage} failed: timed out after ${options.timeout}s`);
      return EXIT_FAILED;
    }
    throw error;
  }
}

export function createProgram(deps: CliDeps = {}, onExitCode: (code: number) => void = () => {}) {
  const io: CliIo = { ...defaultIo, ...deps.io };
  const createAgent = deps.createAgent ?? (() => createFinanceAgent(defaultFinanceAgentDeps()));

  return new Command()
    .name("ask-stock")
    .description("Answer a question about stock price behaviour from fetched prices and indicators.")
    .argument("[question...]", "free-form question; read from stdin when omitted")
    .option("--today <date>", "anchor date for relative phrases (YYYY-MM-DD)", parseToday)
    .option("--show-parsed", "print the resolved tickers and window before running")
    .option("--timeout <seconds>", "overall run timeout in seconds", parseTimeout, 60)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    })
    .action(async (words: string[], options: CliOptions) => {
      onExitCode(await execute(words, options, io, createAgent));
    });
}

export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw error;
  }
  return exitCode;
}

import chalk from "chalk";
import { createInterface, type Interface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { initialize } from "./bootstrap";
import { loadConfig } from "./env";
import { ConfigError, InvalidInputError } from "./errors";
import type { Pipeline, StageObserver } from "./pipeline";
import { saveExplanation } from "./save";
import { REGISTERS, RegisterSchema, type PipelineStage, type Register } from "./types";

const QUIT = new Set(["quit", "exit", "q"]);

const STAGE_LABELS: Record<PipelineStage, string> = {
  fetch: "Searching Know Your Meme",
  curate: "Organizing and filtering data",
  explain: "Generating explanation",
};

export type CliArgs = {
  topic?: string;
  register: Register;
  save: boolean;
};

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { register: "gen-z", save: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--save") {
      args.save = true;
    } else if (arg === "--register") {
      const parsed = RegisterSchema.safeParse(argv[++i]);
      if (!parsed.success) {
        throw new InvalidInputError(`--register must be one of: ${REGISTERS.join(", ")}`);
      }
      args.register = parsed.data;
    } else if (arg === "--topic") {
      const words: string[] = [];
      while (argv[i + 1] && !argv[i + 1].startsWith("--")) words.push(argv[++i]);
      if (words.length > 0) args.topic = words.join(" ");
    }
  }
  return args;
}

const progress: StageObserver = (stage, index, total) => {
  console.log(chalk.cyan(`[${index + 1}/${total}] ${STAGE_LABELS[stage]} ...`));
};

async function runOnce(pipeline: Pipeline, topic: string, register: Register, save: boolean, rl?: Interface) {
  console.log(chalk.bold(`\nANALYZING: ${topic} (${register})\n`));
  const state = await pipeline.run({ topic, register }, progress);

  console.log(chalk.bold("\nFINAL EXPLANATION\n"));
  console.log(state.explanation);

  const wantsSave = save || (rl ? (await rl.question("\nSave this explanation? (y/n): ")).trim().toLowerCase() === "y" : false);
  if (wantsSave) {
    const path = await saveExplanation(state);
    console.log(chalk.green(`Saved to ${path}`));
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const { pipeline } = await initialize(loadConfig());

  if (args.topic) {
    await runOnce(pipeline, args.topic, args.register, args.save);
    return;
  }

  const rl = createInterface({ input, output });
  try {
    for (;;) {
      const topic = (await rl.question("\nWhat meme would you like to learn about? (or 'quit' to exit): ")).trim();
      if (QUIT.has(topic.toLowerCase())) break;
      if (!topic) continue;
      try {
        await runOnce(pipeline, topic, args.register, args.save, rl);
      } catch (err: unknown) {
        console.error(chalk.red(`\nError: ${err instanceof Error ? err.message : String(err)}`));
        console.error("Please try again with a different query.");
      }
    }
  } finally {
    rl.close();
  }
}

if (process.argv[1]?.endsWith("cli.ts")) {
  main().catch((e: unknown) => {
    if (e instanceof ConfigError || e instanceof InvalidInputError) {
      console.error(chalk.red(e.message));
    } else {
      console.error(chalk.red("Error:"), e instanceof Error ? e.message : e);
    }
    process.exit(1);
  });
}

import { readFileSync } from "node:fs";
import { z } from "zod";
import { childLogger } from "./logger";
import {
  REGISTERS,
  RegisterSchema,
  type ExampleCategory,
  type Register,
  type RegisterExample,
  type RegisterMatch,
} from "./types";

const log = childLogger("register-store");

export const NO_PATTERNS = "No specific language patterns found.";

export type StoredExample = {
  id: string;
  example: RegisterExample;
};

export interface RegisterBackend {
  count(register: Register): Promise<number>;
  upsert(register: Register, entries: StoredExample[]): Promise<void>;
  query(register: Register, text: string, k: number, category?: ExampleCategory): Promise<RegisterMatch[]>;
  getAll(register: Register): Promise<RegisterExample[]>;
  reset(register: Register): Promise<void>;
}

export type RegisterExampleSet = Record<Register, RegisterExample[]>;

const ExampleSchema = z.object({
  text: z.string().min(1),
  category: z.enum(["phrase", "keyword", "tone"]),
  context: z.string().optional(),
});

const ExampleSetSchema = z.object({
  boomer: z.array(ExampleSchema),
  "gen-x": z.array(ExampleSchema),
  millenial: z.array(ExampleSchema),
  "gen-z": z.array(ExampleSchema),
});

export function exampleId(register: Register, ordinal: number, category: ExampleCategory): string {
  return `${register}_${ordinal}_${category}`;
}

export function loadBuiltinExamples(
  file: URL = new URL("../data/register-examples.json", import.meta.url),
): RegisterExampleSet {
  return ExampleSetSchema.parse(JSON.parse(readFileSync(file, "utf-8")));
}

export class RegisterStore {
  private seeding: Promise<void> | null = null;

  constructor(private readonly backend: RegisterBackend) {}

  async seed(register: Register, examples: RegisterExample[]): Promise<number> {
    const entries = examples.map((example, i) => ({
      id: exampleId(register, i, example.category),
      example,
    }));
    await this.backend.upsert(register, entries);
    log.info({ event: "register.seed", register, count: entries.length }, "Seeded register examples");
    return entries.length;
  }

  // single-flight per process
  ensureSeeded(examples: RegisterExampleSet): Promise<void> {
    if (!this.seeding) {
      this.seeding = this.seedEmpty(examples).catch((err: unknown) => {
        this.seeding = null;
        throw err;
      });
    }
    return this.seeding;
  }

  private async seedEmpty(examples: RegisterExampleSet): Promise<void> {
    for (const register of REGISTERS) {
      if ((await this.backend.count(register)) === 0) {
        await this.seed(register, examples[register]);
      }
    }
  }

  async query(register: Register, text: string, k = 5, category?: ExampleCategory): Promise<RegisterMatch[]> {
    return this.backend.query(RegisterSchema.parse(register), text, k, category);
  }

  async listAll(register: Register): Promise<RegisterExample[]> {
    return this.backend.getAll(RegisterSchema.parse(register));
  }

  async clear(register: Register): Promise<void> {
    await this.backend.reset(RegisterSchema.parse(register));
    log.info({ event: "register.clear", register }, "Cleared register examples");
  }

  async formatContext(register: Register, text: string, k = 5): Promise<string> {
    return formatMatches(register, await this.query(register, text, k));
  }
}

export function formatMatches(register: Register, matches: RegisterMatch[]): string {
  if (matches.length === 0) return NO_PATTERNS;

  const grouped = new Map<ExampleCategory, RegisterMatch[]>();
  for (const match of matches) {
    const group = grouped.get(match.category) ?? [];
    group.push(match);
    grouped.set(match.category, group);
  }

  const lines = [`Language patterns for ${register}:`];
  for (const [category, group] of grouped) {
    lines.push(`\n${category.toUpperCase()}:`);
    for (const m of group) {
      lines.push(`  - ${m.text}${m.context ? ` (use when: ${m.context})` : ""}`);
    }
  }
  return lines.join("\n");
}

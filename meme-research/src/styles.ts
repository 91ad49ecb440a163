import type { Register } from "./types";

export type StylePolicy = {
  audience: string;
  vocabulary: "no-slang" | "minimal-slang" | "some-slang" | "slang-ok";
  referenceEra: string;
  tone: string;
  paragraphs: { min: number; max: number; short: boolean };
  guidelines: string[];
  goal: string;
  /** Terms the writer may only mention in quotes, with an explanation. */
  avoidTerms: string[];
};

const GEN_Z_SLANG = [
  "fr fr",
  "no cap",
  "deadass",
  "hits different",
  "it's giving",
  "slay",
  "ate and left no crumbs",
  "unhinged",
  "rent free",
  "understood the assignment",
  "lowkey",
  "highkey",
  "tbh",
  "ngl",
];

export const STYLE_POLICIES: Record<Register, StylePolicy> = {
  boomer: {
    audience: "Baby Boomers (born 1946-1964) who may not be familiar with internet culture",
    vocabulary: "no-slang",
    referenceEra: "traditional media such as television shows and newspapers",
    tone: "formal but friendly",
    paragraphs: { min: 3, max: 4, short: true },
    guidelines: [
      "Use very clear, simple language with NO slang or internet jargon",
      "Explain every internet term you use",
      "Be patient and thorough - assume minimal internet culture knowledge",
    ],
    goal: "help someone who didn't grow up with the internet understand both WHAT the meme is and WHY it's popular",
    avoidTerms: GEN_Z_SLANG,
  },
  "gen-x": {
    audience: "Generation X (born 1965-1980) who understand technology but may not follow all internet trends",
    vocabulary: "minimal-slang",
    referenceEra: "90s and 2000s pop culture",
    tone: "conversational but informative",
    paragraphs: { min: 3, max: 3, short: true },
    guidelines: ["Use clear language, minimal slang", "Explain internet-specific terms briefly"],
    goal: "help someone tech-savvy but not chronically online understand the meme's context and appeal",
    avoidTerms: GEN_Z_SLANG.slice(0, 10),
  },
  millenial: {
    audience: "Millennials (born 1981-1996) who grew up with the internet and understand online culture",
    vocabulary: "some-slang",
    referenceEra: "early internet culture such as forums and early social media",
    tone: "conversational, slightly humorous",
    paragraphs: { min: 2, max: 3, short: false },
    guidelines: ["Use casual, friendly language", "You can use some internet terms without explanation"],
    goal: "help someone familiar with internet culture understand this specific meme's nuances",
    avoidTerms: [],
  },
  "gen-z": {
    audience: "Gen Z (born 1997-2012) who are digital natives and very familiar with internet culture",
    vocabulary: "slang-ok",
    referenceEra: "current internet trends and platforms",
    tone: "conversational, witty",
    paragraphs: { min: 1, max: 2, short: true },
    guidelines: ["Use casual, informal language", "Internet slang is fine - they'll understand it", "Be brief and to-the-point"],
    goal: "provide context and background they might not know about this specific meme",
    avoidTerms: [],
  },
};

function lengthRule({ min, max, short }: StylePolicy["paragraphs"]): string {
  const count = min === max ? `${max}` : min === 1 ? `at most ${max}` : `${min}-${max}`;
  return `Keep it concise (${count}${short ? " short" : ""} paragraph${max === 1 ? "" : "s"})`;
}

export function renderStylePrompt(policy: StylePolicy): string {
  const lines = [
    `You are explaining internet memes to ${policy.audience}.`,
    "",
    "Style guidelines:",
    ...policy.guidelines.map((g) => `- ${g}`),
    `- You can reference ${policy.referenceEra}`,
    `- Use a ${policy.tone} tone`,
    `- ${lengthRule(policy.paragraphs)}`,
  ];
  if (policy.avoidTerms.length > 0) {
    lines.push(`- Never use these slang terms unless you put them in quotes and explain them: ${policy.avoidTerms.join(", ")}`);
  }
  lines.push("", `Your explanation should ${policy.goal}.`);
  return lines.join("\n");
}

import { z } from "zod";

export const REGISTERS = ["boomer", "gen-x", "millenial", "gen-z"] as const;

export const RegisterSchema = z.enum(REGISTERS);

export type Register = z.infer<typeof RegisterSchema>;

export type ExampleCategory = "phrase" | "keyword" | "tone" | "general";

export type RawCandidate = Readonly<{
  title: string;
  url: string;
  about: string;
  origin: string;
}>;

export type SearchHit = Readonly<{
  title: string;
  url: string;
}>;

export type FetchOutcome =
  | { status: "ok"; text: string; candidates: RawCandidate[] }
  | { status: "no-results"; text: string }
  | { status: "transport-failure"; text: string; error: string };

export type FetchStatus = FetchOutcome["status"];

export type CuratedRecord = {
  name: string;
  about: string;
  origin: string;
  usage: string;
  sources: string[];
};

export type RegisterExample = {
  text: string;
  category: ExampleCategory;
  context?: string;
};

export type RegisterMatch = RegisterExample & {
  distance: number | null;
};

export type PipelineInput = {
  topic: string;
  register: Register;
};

export type FetchedState = PipelineInput & {
  rawData: string;
  fetchStatus: FetchStatus;
  sources: string[];
};

export type CuratedState = FetchedState & {
  curated: CuratedRecord;
};

export type ExplainedState = CuratedState & {
  explanation: string;
};

export type PipelineStage = "fetch" | "curate" | "explain";

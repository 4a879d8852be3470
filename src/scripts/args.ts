import { isAts, type Ats, type PriorityBand, type TaskKind } from "../types";

export function flagValue(args: string[], name: string): string | null {
  const index = args.indexOf(name);
  if (index !== -1) return args[index + 1] ?? null;

  const inline = args.find((a) => a.startsWith(`${name}=`));
  return inline ? inline.slice(name.length + 1) : null;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export function intFlag(args: string[], name: string): number | undefined {
  const value = flagValue(args, name);
  if (value === null) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`${name} expects a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export function atsFlag(args: string[]): Ats | undefined {
  const value = flagValue(args, "--ats");
  if (value === null) return undefined;
  if (!isAts(value)) throw new Error(`Unknown ATS "${value}"`);
  return value;
}

export function kindFlag(args: string[]): TaskKind | undefined {
  const value = flagValue(args, "--kind");
  if (value === null) return undefined;
  if (value !== "fetch" && value !== "extract") {
    throw new Error(`--kind must be fetch or extract, got "${value}"`);
  }
  return value;
}

export function bandFlag(args: string[]): PriorityBand | undefined {
  const value = intFlag(args, "--band");
  if (value === undefined) return undefined;
  if (value !== 0 && value !== 1 && value !== 2) {
    throw new Error(`--band must be 0, 1 or 2, got ${value}`);
  }
  return value;
}

export function termFlag(args: string[]): { kind: "tech_stack" | "skills"; term: string } {
  const tech = flagValue(args, "--tech");
  const skill = flagValue(args, "--skill");
  if ((tech === null) === (skill === null)) {
    throw new Error("Pass exactly one of --tech or --skill");
  }
  return tech !== null ? { kind: "tech_stack", term: tech } : { kind: "skills", term: skill ?? "" };
}

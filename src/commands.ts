export interface ParsedArgs {
  command: string;
  flags: Record<string, string | undefined>;
}

export const parseArgs = (args: string[]): ParsedArgs => {
  const [command, ...rest] = args;
  const flags: Record<string, string | undefined> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const token = rest[index];
    if (!token?.startsWith("--")) {
      continue;
    }
    const value = rest[index + 1];
    if (!value || value.startsWith("--")) {
      flags[token] = undefined;
      continue;
    }
    flags[token] = value;
    index += 1;
  }

  return {
    command: command ?? "",
    flags
  };
};

export const requireFlag = (flags: Record<string, string | undefined>, flag: string): string => {
  const value = flags[flag];
  if (!value) {
    throw new Error(`Missing required ${flag}`);
  }
  return value;
};

// "first; second ;; third" -> ["first", "second", "third"]
export const parseInsights = (value?: string): string[] => {
  if (!value) return [];
  return value
    .split(";")
    .map((insight) => insight.trim())
    .filter((insight) => insight.length > 0);
};

export const parseSatisfaction = (value?: string): number | undefined => {
  if (value === undefined) return undefined;
  const satisfaction = Number(value);
  if (!Number.isInteger(satisfaction) || satisfaction < 1 || satisfaction > 5) {
    throw new Error(`Invalid satisfaction: ${value}`);
  }
  return satisfaction;
};

export const parseLimit = (value?: string): number | undefined => {
  if (value === undefined) return undefined;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Invalid limit: ${value}`);
  }
  return limit;
};

export const Environments = [
  "development",
  "test",
  "staging",
  "production"
] as const;
export type Environment = (typeof Environments)[number];

export const LogLevels = ["error", "info", "data", "trace"] as const;
export type LogLevel = (typeof LogLevels)[number];

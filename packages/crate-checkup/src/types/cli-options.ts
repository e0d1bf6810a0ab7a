export type OutputFormat = "human" | "json";

export interface CheckOptions {
  projectPath?: string;
  format?: string;
  timeout?: string;
  concurrency?: string;
  offline?: boolean;
  verbose?: boolean;
  debugLog?: string;
}

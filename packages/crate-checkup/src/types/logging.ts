export type LogCategory =
  | "context"
  | "config"
  | "executor"
  | "check"
  | "registry"
  | "audit";

export interface DebugLogger {
  log(category: LogCategory, message: string, data?: object): void;
}

import type { Commit, MessageLike } from "../types";
import type { Disposable } from "./generic";

export interface Logger extends Disposable {
  red(): Logger;
  green(): Logger;
  yellow(): Logger;
  blue(): Logger;
  magenta(): Logger;
  gray(): Logger;
  bold(): Logger;
  dimmed(): Logger;
  write(message: string): Logger;
  events(events: ReadonlyArray<MessageLike & Commit>): void;
  trace(message: string, ...params: unknown[]): Logger;
  data(message: string, ...params: unknown[]): Logger;
  info(message: string, ...params: unknown[]): Logger;
  error(error: unknown): Logger;
}

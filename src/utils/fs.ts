import { existsSync, mkdirSync } from "fs";

export function ensureDir(path: string, mode: number = 0o755): void {
  if (!existsSync(path)) {
    mkdirSync(path, { mode, recursive: true });
  }
}

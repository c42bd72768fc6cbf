import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export const EXPORT_PREFIX = "AutoExportTrace_";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "trace-harvester-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeText(filePath: string, text: string): void {
  fs.writeFileSync(filePath, text, "utf8");
}

export function appendText(filePath: string, text: string): void {
  fs.appendFileSync(filePath, text, "utf8");
}

import { existsSync, promises as fs } from "fs";
import path from "path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function readJson<T>(filePath: string): Promise<T> {
  const content = await fs.readFile(filePath, "utf8");
  return JSON.parse(content) as T;
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
}

export async function writeText(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.writeFile(filePath, content, "utf8");
}

/** Nearest ancestor of `startDir` (itself included) that contains `entry`. */
export function findAncestorWith(startDir: string, entry: string): string {
  let current = path.resolve(startDir);
  while (!existsSync(path.join(current, entry))) {
    const parent = path.dirname(current);
    if (parent === current) {
      throw new Error(`No ${entry} found above ${startDir}`);
    }
    current = parent;
  }
  return current;
}

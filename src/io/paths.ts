import path from "path";
import { findAncestorWith } from "../utils/fs";

// Compiled output carries a copy of package.json, so the root is found by its contracts directory.
export function packageRoot(): string {
  return findAncestorWith(__dirname, "contracts");
}

export function contractsSchemasDir(): string {
  return path.join(packageRoot(), "contracts", "schemas");
}

export function defaultEnvPath(): string {
  return path.join(packageRoot(), ".env");
}

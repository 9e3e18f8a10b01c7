import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { isNonEmptyString, isRecord } from "./utils.js";

/**
 * Subset of `package.json` reported as server info.
 */
export interface PackageMeta {
  name: string;
  version: string;
}

/**
 * Load server metadata from `package.json` so the MCP server info and the
 * about tool always reflect the installed build.
 *
 * @throws If `package.json` is missing or malformed.
 */
export function loadPackageMeta(): PackageMeta {
  // dist/meta.js at runtime, so the project root is one level up
  const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
  const packageJsonPath = path.join(projectRoot, "package.json");

  const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
  if (!isRecord(parsed)) {
    throw new Error(`Invalid package.json: expected JSON object at ${packageJsonPath}`);
  }

  const { name, version } = parsed;
  if (!isNonEmptyString(name) || !isNonEmptyString(version)) {
    throw new Error(`Invalid package.json: expected non-empty name and version at ${packageJsonPath}`);
  }

  return { name, version };
}

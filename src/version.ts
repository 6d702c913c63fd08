import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const CORE_PACKAGE_NAME = "voicetally";

// Source and dist layouts sit at different depths below the package root.
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"] as const;

function isPackageManifest(value: unknown): value is { name?: unknown; version?: unknown } {
  return typeof value === "object" && value !== null;
}

function readVersionFromPackageJson(moduleUrl: string): string | null {
  const here = path.dirname(fileURLToPath(moduleUrl));
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const file = path.resolve(here, candidate);
    if (!fs.existsSync(file)) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(file, "utf-8"));
    } catch {
      continue;
    }
    if (!isPackageManifest(parsed) || parsed.name !== CORE_PACKAGE_NAME) continue;
    if (typeof parsed.version === "string" && parsed.version.trim()) {
      return parsed.version.trim();
    }
  }
  return null;
}

export const VERSION = readVersionFromPackageJson(import.meta.url) ?? "0.0.0";

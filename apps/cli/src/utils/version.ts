import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

interface PackageJson {
  version?: string;
}

const FALLBACK_VERSION = "0.0.0";

const isPackageJson = (value: unknown): value is PackageJson =>
  typeof value === "object" &&
  value !== null &&
  (!("version" in value) || typeof value.version === "string");

/**
 * Reads the version from the CLI package.json (two levels above this file).
 */
export const getVersion = (): string => {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(__dirname, "..", "..", "package.json");
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    return isPackageJson(pkg) ? (pkg.version ?? FALLBACK_VERSION) : FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
};

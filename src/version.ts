import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

export const SERVICE_NAME = "page-response-service";

/**
 * Service version, from package.json unless SERVICE_VERSION overrides it.
 *
 * package.json is resolved from this file, one level up under src/ and two
 * levels up under dist/src/.
 */
function readPackageVersion(): string {
  for (const relative of ["../package.json", "../../package.json"]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(new URL(relative, import.meta.url)), "utf-8"));
      const version: unknown = typeof pkg === "object" && pkg !== null ? Reflect.get(pkg, "version") : undefined;
      if (typeof version === "string") {
        return version;
      }
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        throw error;
      }
    }
  }
  return "0.0.0";
}

export const SERVICE_VERSION = process.env.SERVICE_VERSION ?? readPackageVersion();

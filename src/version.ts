import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  // Sources sit one level below package.json; compiled output (dist/src) two.
  for (const candidate of ["../package.json", "../../package.json"]) {
    try {
      const pkg: unknown = require(candidate);
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return null;
}

export const VERSION = process.env.HCLPRINT_VERSION || readVersionFromPackageJson() || "0.0.0";

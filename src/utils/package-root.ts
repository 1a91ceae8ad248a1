import { dirname, isAbsolute, join, resolve } from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/utils → project root
export const PACKAGE_ROOT = join(__dirname, "..", "..");

/**
 * Resolve a configured path against the project root rather than the
 * working directory, so `batchrun update` fills the same bin folder from
 * wherever it is run. Absolute paths are returned unchanged.
 */
export function resolveFromPackageRoot(target: string): string {
  return isAbsolute(target) ? target : resolve(PACKAGE_ROOT, target);
}

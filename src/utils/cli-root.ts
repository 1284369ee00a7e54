import { existsSync } from "node:fs";
import { dirname, resolve as resolveNative } from "node:path";

const PACKAGE_JSON_FILENAME = "package.json" as const;

let cachedCliRoot: string | undefined;

/**
 * Walks up from this module to the nearest directory holding a package.json.
 * Works from both `src/utils` and the compiled `dist/src/utils`.
 */
export function resolveCliAssetRoot(): string {
  if (cachedCliRoot) {
    return cachedCliRoot;
  }

  let current = __dirname;
  while (true) {
    if (existsSync(resolveNative(current, PACKAGE_JSON_FILENAME))) {
      cachedCliRoot = current;
      return cachedCliRoot;
    }

    const parent = dirname(current);
    if (parent === current) {
      throw new Error(
        `Unable to locate the appcast-updater install directory starting from "${__dirname}".`,
      );
    }
    current = parent;
  }
}

export function getCliAssetPath(...segments: string[]): string {
  return resolveNative(resolveCliAssetRoot(), ...segments);
}

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * version.ts: Package version lookup for Reelcast.
 */
import type { Nullable } from "../types/index.js";
import { fileURLToPath } from "url";
import { readFileSync } from "fs";
import { resolve } from "path";

// Cached package version.
let cachedPackageVersion: Nullable<string> = null;

// Locations of package.json relative to this file: src/utils/ when run from source, dist/src/utils/ when run from a build.
const PACKAGE_JSON_CANDIDATES = [ "../../package.json", "../../../package.json" ];

/**
 * Gets the current package version from package.json.
 * @returns The current version string (e.g., "1.0.0"), or "0.0.0" if package.json cannot be read.
 */
export function getPackageVersion(): string {

  if(cachedPackageVersion) {

    return cachedPackageVersion;
  }

  const currentDir = fileURLToPath(new URL(".", import.meta.url));

  for(const candidate of PACKAGE_JSON_CANDIDATES) {

    let packageJson: unknown;

    try {

      packageJson = JSON.parse(readFileSync(resolve(currentDir, candidate), "utf-8"));
    } catch {

      continue;
    }

    if(packageJson && (typeof packageJson === "object") && ("version" in packageJson) && (typeof packageJson.version === "string")) {

      cachedPackageVersion = packageJson.version;

      return cachedPackageVersion;
    }
  }

  return "0.0.0";
}

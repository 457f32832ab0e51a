/**
 * Requirements manifest parsing.
 *
 * The manifest maps a logical package name (what a component declares in
 * `requiredPackages`) to the npm packages an operator has to install for it:
 *
 *   # natural
 *   natural
 *
 *   # wink-nlp
 *   wink-nlp
 *   wink-eng-lite-web-model
 *
 * A `#` line opens a group named by the rest of the line; following
 * non-blank lines are that group's install names. The manifest is only used
 * for remediation messages, never for resolution.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";

export class ManifestReadError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    /** 1-based line number of a malformed line */
    public readonly line?: number
  ) {
    super(message);
    this.name = "ManifestReadError";
  }
}

export type RequirementsManifest = Readonly<Record<string, readonly string[]>>;

const HEADER_PREFIX = "#";

/**
 * Parse manifest text.
 *
 * @param source   - Manifest contents
 * @param filePath - Used in error messages only
 * @throws ManifestReadError for a package line before any header, a header
 *         without a name, or a repeated header
 */
export function parseRequirementsManifest(
  source: string,
  filePath = "(inline)"
): RequirementsManifest {
  const groups = new Map<string, string[]>();
  let current: string[] | null = null;

  const lines = source.split(/\r?\n/);
  for (const [index, rawLine] of lines.entries()) {
    const lineNumber = index + 1;
    const line = rawLine.trim();
    if (line === "") continue;

    if (line.startsWith(HEADER_PREFIX)) {
      const name = line.slice(HEADER_PREFIX.length).trim();
      if (name === "") {
        throw new ManifestReadError(
          filePath,
          `${filePath}:${lineNumber}: requirement header has no name`,
          lineNumber
        );
      }
      if (groups.has(name)) {
        throw new ManifestReadError(
          filePath,
          `${filePath}:${lineNumber}: requirement "${name}" is declared more than once`,
          lineNumber
        );
      }
      current = [];
      groups.set(name, current);
      continue;
    }

    if (current === null) {
      throw new ManifestReadError(
        filePath,
        `${filePath}:${lineNumber}: package "${line}" appears before any "# <requirement>" header`,
        lineNumber
      );
    }
    current.push(line);
  }

  return Object.freeze(
    Object.fromEntries(
      [...groups].map(([name, installNames]) => [name, Object.freeze(installNames)])
    )
  );
}

const manifestCache = new Map<string, RequirementsManifest>();

/**
 * Read and parse a manifest file. Results are cached per resolved path
 * for the lifetime of the process.
 *
 * @throws ManifestReadError if the file is missing, unreadable or malformed
 */
export function readRequirementsManifest(filePath: string): RequirementsManifest {
  const resolved = resolve(filePath);
  const cached = manifestCache.get(resolved);
  if (cached) return cached;

  let source: string;
  try {
    source = readFileSync(resolved, "utf-8");
  } catch (err) {
    throw new ManifestReadError(
      resolved,
      `Failed to read requirements manifest ${resolved}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const manifest = parseRequirementsManifest(source, resolved);
  manifestCache.set(resolved, manifest);
  return manifest;
}

/**
 * Drop cached manifests, e.g. after the file changed on disk.
 */
export function clearManifestCache(): void {
  manifestCache.clear();
}

/**
 * Package availability probes.
 *
 * Checking whether a package is installed is an injected capability, so
 * validation can run against the real environment (NodePackageResolver)
 * or against a fixed list (StaticPackageResolver) in tests and offline
 * tooling.
 */

import { createRequire, isBuiltin } from "node:module";
import { join } from "node:path";

export interface PackageResolver {
  /** True if `name` can be loaded in the current environment. */
  resolves(name: string): boolean;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Resolves names the way `require` would from `basePath`. Node built-ins
 * (with or without the `node:` prefix) always resolve.
 */
export class NodePackageResolver implements PackageResolver {
  private readonly requireFrom: NodeRequire;

  /**
   * @param basePath - File path or file URL to resolve from; defaults to
   *                   a file in the current working directory
   */
  constructor(basePath: string | URL = join(process.cwd(), "package.json")) {
    this.requireFrom = createRequire(basePath);
  }

  resolves(name: string): boolean {
    if (isBuiltin(name)) {
      return true;
    }
    try {
      this.requireFrom.resolve(name);
      return true;
    } catch (err) {
      // ESM-only packages without a "require" export condition are installed
      // but refuse require.resolve
      return errorCode(err) === "ERR_PACKAGE_PATH_NOT_EXPORTED";
    }
  }
}

/**
 * Treats exactly the given names as installed.
 */
export class StaticPackageResolver implements PackageResolver {
  private readonly available: ReadonlySet<string>;

  constructor(available: Iterable<string>) {
    this.available = new Set(available);
  }

  resolves(name: string): boolean {
    return this.available.has(name);
  }
}

/**
 * Memoizes another resolver's answers for the lifetime of the instance.
 */
export class CachingPackageResolver implements PackageResolver {
  private readonly answers = new Map<string, boolean>();

  constructor(private readonly inner: PackageResolver) {}

  resolves(name: string): boolean {
    const cached = this.answers.get(name);
    if (cached !== undefined) return cached;

    const answer = this.inner.resolves(name);
    this.answers.set(name, answer);
    return answer;
  }

  clear(): void {
    this.answers.clear();
  }
}

let defaultResolver: PackageResolver | null = null;

/**
 * Process-wide resolver: a cached NodePackageResolver rooted at the
 * working directory.
 */
export function getDefaultPackageResolver(): PackageResolver {
  defaultResolver ??= new CachingPackageResolver(new NodePackageResolver());
  return defaultResolver;
}

/**
 * Dependency availability checks.
 *
 * Components declare the third-party packages they need. Before anything
 * is instantiated the builder asks a PackageResolver which of them are
 * missing and, if any are, fails with one MissingDependencyError that
 * tells the operator what to install.
 */

import { config } from "../config/index.js";
import { createAppLogger, type Logger } from "../logging/index.js";
import type { ComponentDescriptor } from "../components/schema.js";
import type { ComponentRegistry } from "../components/registry.js";
import {
  ManifestReadError,
  readRequirementsManifest,
  type RequirementsManifest,
} from "./manifest.js";
import { getDefaultPackageResolver, type PackageResolver } from "./resolver.js";

export class MissingDependencyError extends Error {
  constructor(
    /** Unresolvable package names, sorted */
    public readonly missingPackages: readonly string[],
    /** Components that declared them, in pipeline order */
    public readonly componentNames: readonly string[],
    /** Packages to install, from the requirements manifest */
    public readonly installNames: readonly string[]
  ) {
    super(
      `Not all required packages are installed. ` +
        `Failed to find: ${missingPackages.join(", ")} (needed by ${componentNames.join(", ")}). ` +
        `To use this pipeline, install the missing dependencies, e.g. by running:\n` +
        `\t> npm install ${installNames.join(" ")}`
    );
    this.name = "MissingDependencyError";
  }
}

export interface RequirementsCheckOptions {
  resolver?: PackageResolver;
  /** Requirements manifest used to enrich the error; defaults to REQUIREMENTS_FILE */
  manifestPath?: string;
  logger?: Logger;
}

/**
 * Names that fail to resolve. Duplicates are collapsed; a failed
 * resolution is the expected signal, never an exception.
 */
export function findUnavailablePackages(
  names: Iterable<string>,
  resolver: PackageResolver = getDefaultPackageResolver()
): Set<string> {
  const unavailable = new Set<string>();
  for (const name of new Set(names)) {
    if (!resolver.resolves(name)) {
      unavailable.add(name);
    }
  }
  return unavailable;
}

/**
 * Install names for each missing package, in the order of `missing`.
 * Packages the manifest does not list are installed under their own name.
 */
export function installNamesFor(
  missing: readonly string[],
  manifest: RequirementsManifest | null
): string[] {
  const names: string[] = [];
  for (const packageName of missing) {
    const listed =
      manifest && Object.hasOwn(manifest, packageName) ? manifest[packageName] : undefined;
    for (const installName of listed ?? [packageName]) {
      if (!names.includes(installName)) names.push(installName);
    }
  }
  return names;
}

function readManifestForRemediation(
  manifestPath: string,
  logger: Logger
): RequirementsManifest | null {
  try {
    return readRequirementsManifest(manifestPath);
  } catch (err) {
    if (!(err instanceof ManifestReadError)) throw err;
    logger.warn("Requirements manifest unavailable; reporting package names only", {
      manifestPath: err.filePath,
      reason: err.message,
    });
    return null;
  }
}

/**
 * Fail if any descriptor's required packages are unavailable.
 *
 * @throws MissingDependencyError listing every missing package at once
 */
export function assertPackagesAvailable(
  descriptors: ReadonlyArray<Readonly<ComponentDescriptor>>,
  options: RequirementsCheckOptions = {}
): void {
  const resolver = options.resolver ?? getDefaultPackageResolver();
  const missing = new Set<string>();
  const affected: string[] = [];

  for (const descriptor of descriptors) {
    const unavailable = findUnavailablePackages(descriptor.requiredPackages, resolver);
    if (unavailable.size === 0) continue;
    for (const name of unavailable) missing.add(name);
    if (!affected.includes(descriptor.name)) affected.push(descriptor.name);
  }

  if (missing.size === 0) return;

  const logger = options.logger ?? createAppLogger("dependencies");
  const sorted = [...missing].sort();
  const manifest = readManifestForRemediation(
    options.manifestPath ?? config.requirementsFile,
    logger
  );
  throw new MissingDependencyError(sorted, affected, installNamesFor(sorted, manifest));
}

/**
 * Check a whole pipeline before building any of it.
 *
 * @throws UnknownComponentError if a name is not registered
 * @throws MissingDependencyError if any component's packages are missing
 */
export function validateRequirements(
  componentNames: readonly string[],
  registry: ComponentRegistry,
  options: RequirementsCheckOptions = {}
): void {
  const descriptors = componentNames.map((name) => registry.require(name).descriptor);
  assertPackagesAvailable(descriptors, options);
}

/**
 * Dependency checking: package resolvers, availability checks and the
 * requirements manifest.
 */

export {
  NodePackageResolver,
  StaticPackageResolver,
  CachingPackageResolver,
  getDefaultPackageResolver,
  type PackageResolver,
} from "./resolver.js";

export {
  parseRequirementsManifest,
  readRequirementsManifest,
  clearManifestCache,
  ManifestReadError,
  type RequirementsManifest,
} from "./manifest.js";

export {
  findUnavailablePackages,
  installNamesFor,
  assertPackagesAvailable,
  validateRequirements,
  MissingDependencyError,
  type RequirementsCheckOptions,
} from "./checker.js";

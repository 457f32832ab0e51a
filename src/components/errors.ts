/**
 * Registry and lookup errors.
 */

export class UnknownComponentError extends Error {
  constructor(
    public readonly componentName: string,
    public readonly suggestions: readonly string[] = []
  ) {
    const hint = suggestions.length > 0 ? ` Did you mean: ${suggestions.join(", ")}?` : "";
    super(`Unknown component name "${componentName}".${hint}`);
    this.name = "UnknownComponentError";
  }
}

export class UnknownTemplateError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly knownTemplates: readonly string[]
  ) {
    super(
      `Unknown pipeline template "${templateName}". ` +
        `Registered templates: ${knownTemplates.length > 0 ? knownTemplates.join(", ") : "(none)"}`
    );
    this.name = "UnknownTemplateError";
  }
}

export class DuplicateComponentError extends Error {
  constructor(public readonly componentName: string) {
    super(`A component named "${componentName}" is already registered`);
    this.name = "DuplicateComponentError";
  }
}

export class DuplicateTemplateError extends Error {
  constructor(public readonly templateName: string) {
    super(`A pipeline template named "${templateName}" is already registered`);
    this.name = "DuplicateTemplateError";
  }
}

export class RegistrySealedError extends Error {
  constructor(public readonly entryName: string) {
    super(`Cannot register "${entryName}": the component registry is sealed`);
    this.name = "RegistrySealedError";
  }
}

export class RegistryInitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryInitError";
  }
}

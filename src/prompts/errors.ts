export class PromptStoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised for a single malformed asset. The store logs it and keeps loading. */
export class AssetLoadError extends PromptStoreError {
  readonly source: string;

  constructor(source: string, message: string, options?: ErrorOptions) {
    super(`Failed to load prompt asset ${source}: ${message}`, options);
    this.source = source;
  }
}

export class PromptNotFoundError extends PromptStoreError {
  readonly promptName: string;
  readonly version?: string;

  constructor(message: string, promptName: string, version?: string) {
    super(message);
    this.promptName = promptName;
    this.version = version;
  }
}

export class MissingVariableError extends PromptStoreError {
  readonly variables: string[];

  constructor(promptName: string, version: string, variables: string[]) {
    super(`Missing value for ${variables.map((name) => `{${name}}`).join(", ")} in prompt '${promptName}' (${version})`);
    this.variables = variables;
  }
}

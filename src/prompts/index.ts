export {
  PromptStore,
  loadPrompt,
  MANIFEST_FILENAME,
  type PromptStoreOptions,
  type PromptComparison,
  type ChangelogEntry
} from "./prompt-store";
export {
  computeFingerprint,
  listPlaceholders,
  renderTemplate,
  FINGERPRINT_LENGTH,
  type PromptTemplate,
  type TemplateVariables,
  type ModelHintValue
} from "./template";
export { LATEST, parseManifest, parsePromptAsset, type PromptManifest, type ManifestEntry } from "./manifest";
export { promptAttributes, promptTagMetadata, type PromptAttributes, type PromptTagMetadata } from "./telemetry";
export * from "./errors";

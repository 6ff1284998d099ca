export * from "./types/manifest.js";
export type { BuildState, Reservation, ExpectedState } from "./types/build-state.js";
export type { BuildAttempt, PlatformResult, AttemptOverall, BuiltImage } from "./types/attempt.js";
export type { ProvenanceRecord } from "./types/provenance.js";
export type { LibraryConfig } from "./types/config.js";
export type { RunIndex, RunState } from "./types/run.js";
export * from "./core/errors.js";
export { SchemaRegistry, createRegistry } from "./schema/registry.js";
export { ManifestStore, serializeManifest, manifestDigest, MANIFEST_DEFAULTS, type LoadResult } from "./manifest/store.js";
export { GitSourceResolver, type SourceResolver, type ResolvedSource, type FileTree } from "./git/source-resolver.js";
export { ChangeDetector, buildScope, renderDiffMarkdown, type ChangeDecision, type DiffReport } from "./detect/change-detector.js";
export { BuildCoordinator, computeOverall, type LogSink, type BuildContext } from "./build/coordinator.js";
export { DockerCliBuilder, type ImageBuilder, type BuildRequest, type BuildOutput } from "./build/docker-builder.js";
export { DockerTestRunner, type TestRunner, type TestOutcome } from "./build/test-runner.js";
export { splitCommand } from "./build/command.js";
export { ProvenancePublisher, publicationBlockers, type PublishResult } from "./publish/publisher.js";
export { buildProvenance } from "./publish/provenance.js";
export { CosignSigner, type Signer } from "./publish/cosign-signer.js";
export { DockerImageRegistry, type ImageRegistry } from "./publish/registry.js";
export { canonicalReference, stagingReference } from "./publish/references.js";
export {
  FileBuildStateStore,
  compareAndSwap,
  type BuildStateStore,
  type BuildStateRecord,
} from "./state/build-state-store.js";
export { Orchestrator, type ManifestChange, type OutcomeReport, type OrchestratorDeps } from "./core/orchestrator.js";
export { loadConfig, validateConfig } from "./config/validator.js";
export { loadConfigLayers, resolveDirs } from "./config/loader.js";

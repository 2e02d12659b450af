export {
  FailureKind,
  EXIT_CODES,
  EXIT_SUCCESS,
  EXIT_USAGE,
  type FailureKindValue,
  type StageFailure,
} from './errors.js';

export {
  STAGE_NAME_PATTERN,
  normalizeContainerPath,
  parsePortBinding,
  parseArtifactRef,
  formatArtifactRef,
  isWithinPath,
  type StageStatus,
  type PipelineStatus,
  type LaunchVariant,
  type PortBinding,
  type StageInput,
  type LaunchSpec,
  type StageSpec,
  type ArtifactRef,
  type TransferEdge,
  type PipelineDefinition,
  type RuntimeConfig,
  type RawPipelineDocument,
} from './pipeline.js';

export { PIPELINE_JSON_SCHEMA } from './pipeline-schema.js';

export {
  DEFAULT_CONFIG,
  STAGECRAFT_SUBDIRS,
  resolveHome,
  ensureDirectoryStructure,
  parseConfig,
  type ContainerEngine,
  type StagecraftConfig,
  type DirectoryStructure,
  type LaunchSection,
} from './config.js';

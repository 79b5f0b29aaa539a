// Core data model
export type {
  ObjectKind,
  ObjectIdentity,
  Normalization,
  CodeObject,
  CodeObjectInput,
  CodeObjectOptions,
  Codebase,
  ChangedObject,
  ChangeReport,
} from './model';

export {
  OBJECT_KINDS,
  isObjectKind,
  createIdentity,
  identityKey,
  compareIdentities,
  formatIdentity,
  parseIdentity,
  contentHash,
  createCodeObject,
  createCodebase,
} from './model';

// Errors
export {
  VqlManagerError,
  DuplicateIdentityError,
  ScriptFormatError,
  RepositoryError,
  ConfigError,
  UnknownObjectError,
  SourceNotFoundError,
} from './errors';

// Diff algorithm
export { compare, hasChanges } from './diff';

// Dependency resolution
export {
  buildReverseIndex,
  cascade,
  dependentsOf,
  dependenciesOf,
  orderByDependency,
  selectWithDependencies,
} from './dependencies';

// Export scripts
export type { ParsedObject } from './scriptParser';
export {
  parseScript,
  loadScript,
  chapterHeader,
  extractObjectName,
  extractFolder,
  OBJECT_DELIMITER,
  PROPERTIES_PREAMBLE,
} from './scriptParser';
export { serializeScript } from './scriptWriter';

// Repository layout
export type { WriteRepositoryOptions, ReadRepositoryResult } from './repository';
export {
  readRepository,
  writeRepository,
  isRepository,
  codeFileName,
  PART_LOG_FILE_NAME,
} from './repository';

// Folder view
export { groupByFolder, ROOT_FOLDER } from './folderView';

// Report formatting
export type { FormatOptions, ChangeReportJson } from './reportFormatter';
export { formatReport, reportToJson } from './reportFormatter';

// Configuration
export type { ConfigFile, VqlManagerConfig } from './config';
export { loadConfigFile, parseConfig, resolveConfig, CONFIG_FILE_NAME } from './config';

// High-level operations
export { VqlManager } from './vqlManager';

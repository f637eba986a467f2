export {
  type ProjectReference,
  type ProjectKind,
  type ProjectSuffix,
  type BuildTool,
  projectRootDir,
  projectSuffix,
  requiredTool,
  isModernProject,
  isLegacyProject,
  projectMarkerFile,
  describeProject,
} from "./project.js";
export {
  type ToolLocator,
  type PathToolLocatorOptions,
  createPathToolLocator,
  createStaticToolLocator,
} from "./tools.js";
export type {
  UnitKind,
  UnitRef,
  PackageInfo,
  ComponentEntrypoint,
  ComponentInfo,
  UnitInfo,
  UnitIntrospection,
  BuildToolBackend,
} from "./backend.js";
export {
  type StanzaType,
  type CabalStanza,
  type CabalFile,
  parseCabalFile,
  fieldValues,
  packageName,
  listUnits,
  componentsForUnit,
  splitList,
  splitWords,
} from "./cabal-file.js";
export {
  type ManifestBackendOptions,
  ManifestBackend,
  parseStackPackages,
  parseCabalProjectPackages,
} from "./manifest-backend.js";
export { getTargets, partOfComponent, findComponent, type IntrospectUnit } from "./component-match.js";
export { fixImportDirs, importDirsOf } from "./flags.js";
export {
  type ComponentOptions,
  type CradleError,
  type NoneReason,
  type ConfigurationResult,
  type Configuration,
  NONE_ACTION_NAME,
  ACTION_NAME_PREFIX,
  noneConfiguration,
  noComponentError,
  isStackConfiguration,
} from "./configuration.js";
export { type ProjectLocatorOptions, ProjectLocator } from "./locator.js";
export { type ConfigurationResolverOptions, ConfigurationResolver, findPackageFor } from "./resolver.js";
export { type ConfigurationLookup, ConfigurationCache } from "./configuration-cache.js";

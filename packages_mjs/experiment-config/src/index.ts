export * from './domain.js';
export * from './validators.js';

export { getLogger, getLogLevel, setLogLevel, parseLogLevel, type Logger, type LogLevel } from './logger.js';

export {
    flatten,
    unflatten,
    lookupPath,
    PathIndex,
    toFragmentValue,
    isMapping,
    PATH_SEPARATOR
} from './flatten.js';

export { ProvenanceTracker, type NestedProvenance } from './provenance.js';
export { ConfigurationBuilder, type WriteSource } from './builder.js';
export { ResolvedConfiguration, assertProvenanceConsistency } from './configuration.js';

export {
    MergeEngine,
    mergeFragments,
    substituteValue,
    SAFE_PLACEHOLDERS_KEY,
    type MergeResult,
    type ValueSubstitution
} from './merge-engine.js';

export {
    parseFragment,
    loadFragmentFiles,
    loadFragmentDirectory,
    locateKeys,
    DEFAULT_FRAGMENT_PATTERN
} from './fragment-loader.js';

export {
    serializeConfiguration,
    parseConfigurationDocument,
    exportProvenance,
    PROVENANCE_SECTION,
    SAFE_PLACEHOLDERS_SECTION,
    type DocumentFormat,
    type SerializeOptions
} from './document.js';

export { readCoreSettings, type CoreSettings } from './settings.js';

// @plugin-atlas/discovery public API

export { discoverPackage } from './pipeline';
export type { DiscoverOptions, DiscoveryMetrics, DiscoveryResult } from './pipeline';

export { assemblePackageManifest } from './manifest/assembler';
export type { AssembleMetrics, AssembleOptions, AssembleResult } from './manifest/assembler';
export { parseRegistration, resolvePluginKind } from './manifest/registration';
export type { ParsedRegistration } from './manifest/registration';
export {
    toCallableJson,
    toConfigJson,
    toJsonValue,
    toManifestJson,
    toPluginJson,
    toUpgradeStepJson,
} from './manifest/serialize';

export { findEntryFile, parseEntryPoints } from './entry/entry-file';
export type { EntryFile, EntryFileOptions, EntryPoint } from './entry/entry-file';

export {
    TextualCallLocator,
    TreeQueryCallLocator,
    defaultLocatorOptions,
    selectCallLocator,
} from './locators';
export type { CallLocator, CallLocatorOptions } from './locators';

export { buildSymbolTable, parseImportLine, resolveRelativeModule } from './resolvers/import-resolver';
export { keywordMap, parseKeywordArguments } from './parsers/kwargs';
export type { RawKeyValue } from './parsers/kwargs';
export { classifyValue, inferCallableType } from './parsers/value-classifier';
export type { ClassifiedValue } from './parsers/value-classifier';
export { getLoadedParser, initTreeSitterParsers } from './parsers/tree-sitter-loader';

export { extractStepsFromSource, scanDecoratorSteps } from './scanners/decorator-steps';
export {
    SourceFileIndex,
    extractCallableParameters,
    parameterSearchRoots,
    parseParameterList,
    parseSignature,
} from './scanners/parameters';
export type { CallableSignature, ParameterSearchOptions } from './scanners/parameters';

export { ImportEngine, EngineCollaborators, CallerContext } from "./engine";
export { EngineOptions, EngineConfig, DEFAULT_INTO, resolveConfig } from "./config";
export { ModuleCache, ModuleCacheEntry, ModuleLoader } from "./cache";
export { SearchChain } from "./chain";
export { Namespace, ObjectScope, Scope } from "./namespace";
export { PackageRegistry, NodePackageRegistry, StaticRegistry, Lookup } from "./registry";
export { Evaluator, EvaluationHost, ScriptEvaluator } from "./evaluator";
export { FingerprintStrategy, Fingerprinter, mtimeFingerprint, contentFingerprint } from "./fingerprint";
export { Source, SourceKind, PackageSource, FileSource, resolveSource } from "./source";
export { ImportArgument, ImportStatement, NameRequest, PlacementMode, StatementOptions, parseStatement } from "./statement";
export { createLogger, LogLevel } from "./logger";
export * from "./errors";

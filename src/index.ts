export { ScannerEngine, compareFindings, normalizeExtension } from './scanner/engine.js';
export type { EngineOptions, FileScan } from './scanner/engine.js';
export { FsSourceTree, DEFAULT_EXTENSIONS, splitLines } from './scanner/source.js';
export type { SourceTree } from './scanner/source.js';
export { extractContext, renderContext } from './scanner/context.js';
export { BaseRule } from './scanner/rules/base.js';
export type { RuleDefinition } from './scanner/rules/base.js';
export {
  allRules,
  selectRules,
  collectionRules,
  exceptionRules,
  intentRules,
  lifecycleRules,
  networkingRules,
  nullSafetyRules,
  resourceRules,
  sqlRules,
  stateMachineRules,
  threadingRules,
  typeSafetyRules,
} from './scanner/rules/index.js';
export { renderTerminal, reportTerminal } from './reporter/terminal.js';
export { renderJSON, reportJSON, toJSONReport } from './reporter/json.js';
export { renderSARIF, reportSARIF } from './reporter/sarif.js';
export { runScan, createBaseline, renderReport } from './runner.js';
export { loadConfig, parseConfig, loadBaseline, saveBaseline, isInBaseline } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export {
  CrashScanError,
  ConfigurationError,
  FileAccessError,
  RuleEvaluationError,
  DirectoryNotFoundError,
} from './errors.js';
export { Severity, SEVERITY_ORDER } from './types.js';
export type { Finding, Rule, RuleMatch, ScanFailure, ScanResult, ScanOptions, OutputFormat } from './types.js';

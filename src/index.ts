export { checkTree, createEngine } from './engine';
export { parseSource, parseFile, isParseFailure } from './parser';
export { scan, scanFile, checkFile, findPythonFiles } from './scanner';
export { allRules, ruleMap, RuleContext } from './rules';
export { selectRules, isRuleEnabled, DEFAULT_SELECT } from './selection';
export { parseNoqaDirectives, isSuppressed } from './suppression';
export { loadConfig, loadConfigFromString, mergeConfig, createDefaultConfig } from './config';
export { traverse, childNodes } from './traverse';
export { PmcError, MalformedTreeError, ConfigError } from './errors';
export type { Engine } from './engine';
export type { ParseResult, ParseFailure } from './parser';
export type { ScanOptions, ScanResult, FileResult, FileFailure, FailureKind } from './scanner';
export type { Rule, RuleId, Finding, Diagnostic, BindingOrigin } from './rules';
export type { SelectionOptions } from './selection';
export type { NoqaDirective } from './suppression';
export type { PmcConfig } from './config';
export type { Visitor } from './traverse';
export type * from './syntax/types';

export * from './types';
export {
    BoundingBoxSchema,
    ComputedStylesSchema,
    ElementFactsSchema,
    PageFactsSchema,
    SnapshotSchema,
    parseSnapshot,
} from './types/schema';
export type { SnapshotInput, SnapshotParseResult } from './types/schema';

export { ELEMENT_SELECTORS, MAX_COMBINED_SELECTORS, combinedSelector, describeCatalogue, selectorsFor } from './core/catalogue';
export { classify, classifyAll } from './core/classifier';
export { interpretQuery } from './core/query';
export { Detector, MAX_ISSUES, detectIssues, suggestFix } from './core/detector';
export type { DetectorOptions } from './core/detector';
export { Fixer, synthesizeFixes } from './core/fixer';
export { Fingerprinter, fingerprintStack, summarizeStack } from './core/fingerprint';
export { extractElementFactsFromHtml, extractPageFactsFromHtml, mergePageFacts, readPageFacts } from './core/static';
export { Analyzer, DEFAULT_VIEWPORTS, emptyPageFacts, fixSnapshot } from './core/analyzer';
export type { AnalyzeOptions, AnalyzerOptions, ScreenshotRequest, TechStackReport } from './core/analyzer';
export { Scanner } from './core/scanner';
export type { ScannerOptions } from './core/scanner';
export { renderAccessibilityTree } from './core/scanner/a11y';
export type { AccessibilityNode } from './core/scanner/a11y';
export { ConfigManager } from './core/config';
export type { ConfigKey, ResolvedConfig, UserConfig } from './core/config';

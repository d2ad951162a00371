export * from './types';
export { normalize, wordCount, containsTerm, countOccurrences } from './textNormalizer';
export { extractKeywords, isTechnicalTerm, isValidTerm } from './keywordExtractor';
export { classify, isHeader, matchHeader } from './sectionClassifier';
export { GapAnalyzer, isRelevantKeyword } from './gapAnalyzer';
export { allowsInsertion, keywordDensity } from './densityGuard';
export { ContextualEnhancer } from './contextualEnhancer';
export { DocumentRebuilder, dedupeSentences } from './documentRebuilder';
export { ResumeOptimizer, NullTokenPredictor, DEFAULT_OPTIMIZER_OPTIONS } from './resumeOptimizer';
export { DEFAULT_SECTION_RULES } from './sectionRules';
export { InputError, OutputError, EnhancementFailure } from './errors';

import { logger } from '../../utils/logger';
import { ContextualEnhancer } from './contextualEnhancer';
import { DocumentRebuilder } from './documentRebuilder';
import { InputError } from './errors';
import { GapAnalyzer } from './gapAnalyzer';
import { DEFAULT_SECTION_RULES } from './sectionRules';
import { createRunState } from './types';
import type { DocumentContent, OptimizationResult, OptimizerOptions, TokenPredictor } from './types';

export const DEFAULT_OPTIMIZER_OPTIONS: OptimizerOptions = {
    minJobDescriptionLength: 50,
    maxKeywordsTotal: 15,
    densityLimit: 0.03,
    jobDescriptionTopK: 50,
    resumeTopK: 30,
    maxCandidateKeywords: 30,
    sectionRules: DEFAULT_SECTION_RULES
};

export class NullTokenPredictor implements TokenPredictor {
    async predict(): Promise<string[]> {
        return [];
    }
}

/**
 * 简历关键词优化引擎。
 *
 * 每次调用 optimize 都会新建运行状态，因此同一个实例可以被并发请求共享；
 * 预测服务在构造时注入，生命周期由调用方管理。
 */
export class ResumeOptimizer {
    private readonly options: OptimizerOptions;
    private readonly gapAnalyzer: GapAnalyzer;
    private readonly rebuilder: DocumentRebuilder;

    constructor(predictor: TokenPredictor = new NullTokenPredictor(), options: Partial<OptimizerOptions> = {}) {
        this.options = { ...DEFAULT_OPTIMIZER_OPTIONS, ...options };
        this.gapAnalyzer = new GapAnalyzer({
            jobDescriptionTopK: this.options.jobDescriptionTopK,
            resumeTopK: this.options.resumeTopK
        });
        const enhancer = new ContextualEnhancer(predictor, {
            densityLimit: this.options.densityLimit,
            sectionRules: this.options.sectionRules
        });
        this.rebuilder = new DocumentRebuilder(enhancer, {
            maxKeywordsTotal: this.options.maxKeywordsTotal,
            sectionRules: this.options.sectionRules
        });
    }

    async optimize(document: DocumentContent, jobDescription: string): Promise<OptimizationResult> {
        const trimmedDescription = jobDescription.trim();
        if (trimmedDescription.length < this.options.minJobDescriptionLength) {
            throw new InputError(
                `职位描述过短，至少需要${this.options.minJobDescriptionLength}个字符`,
                { length: trimmedDescription.length }
            );
        }

        const resumeText = document.paragraphs.map(paragraph => paragraph.text).join('\n');
        if (!resumeText.trim()) {
            throw new InputError('简历内容为空');
        }

        const runState = createRunState();
        const candidates = this.gapAnalyzer.missingKeywords(
            resumeText,
            trimmedDescription,
            runState.processedKeywords,
            this.options.maxCandidateKeywords
        );

        if (candidates.length === 0) {
            logger.warn('未找到可补充的关键词，返回原始文档', { paragraphs: document.paragraphs.length });
            return {
                document: { paragraphs: document.paragraphs.map(paragraph => ({ ...paragraph })) },
                keywordsAdded: 0,
                insertions: [],
                changeLog: [],
                missingKeywords: []
            };
        }

        logger.debug('缺失的职位关键词', { keywords: candidates.map(keyword => keyword.text) });

        const { document: rebuilt, insertions } = await this.rebuilder.rebuild(document, candidates, runState);

        logger.info('简历关键词优化完成', {
            keywordsAdded: runState.keywordsAddedCount,
            candidates: candidates.length
        });

        return {
            document: rebuilt,
            keywordsAdded: runState.keywordsAddedCount,
            insertions,
            changeLog: insertions.map(insertion => `Added '${insertion.keyword}' to ${insertion.section}.`),
            missingKeywords: candidates.map(keyword => keyword.text)
        };
    }
}

import { extractKeywords } from './keywordExtractor';
import { containsTerm } from './textNormalizer';
import type { Keyword } from './types';

export interface GapAnalyzerOptions {
    jobDescriptionTopK: number;
    resumeTopK: number;
}

const DEFAULT_GAP_OPTIONS: GapAnalyzerOptions = {
    jobDescriptionTopK: 50,
    resumeTopK: 30
};

// 词表兜底：长度超过 3 的词也视为相关，避免纯软技能描述的职位得不到任何关键词
export function isRelevantKeyword(keyword: Keyword): boolean {
    return keyword.isTechnical || keyword.normalized.length > 3;
}

function overlaps(a: string, b: string): boolean {
    return containsTerm(a, b) || containsTerm(b, a);
}

export class GapAnalyzer {
    private readonly options: GapAnalyzerOptions;

    constructor(options: Partial<GapAnalyzerOptions> = {}) {
        this.options = { ...DEFAULT_GAP_OPTIONS, ...options };
    }

    /**
     * 职位描述中有而简历中缺失的关键词，保持职位描述中的频率顺序
     */
    missingKeywords(
        resumeText: string,
        jobDescriptionText: string,
        alreadyProcessed: ReadonlySet<string>,
        maxKeywords: number
    ): Keyword[] {
        const jobKeywords = extractKeywords(jobDescriptionText, this.options.jobDescriptionTopK);
        if (jobKeywords.length === 0) {
            return [];
        }

        const resumeVocabulary = new Set(
            extractKeywords(resumeText, this.options.resumeTopK).map(keyword => keyword.normalized)
        );

        const missing: Keyword[] = [];
        for (const keyword of jobKeywords) {
            if (missing.length >= maxKeywords) {
                break;
            }
            if (keyword.normalized.length <= 2) {
                continue;
            }
            if (resumeVocabulary.has(keyword.normalized) || containsTerm(resumeText, keyword.normalized)) {
                continue;
            }
            if (alreadyProcessed.has(keyword.normalized)) {
                continue;
            }
            if (!isRelevantKeyword(keyword)) {
                continue;
            }
            if (missing.some(selected => overlaps(selected.normalized, keyword.normalized))) {
                continue;
            }
            missing.push(keyword);
        }

        return missing;
    }
}

import { logger } from '../../utils/logger';
import { allowsInsertion, DEFAULT_DENSITY_LIMIT } from './densityGuard';
import { STOP_WORDS } from './keywordExtractor';
import { DEFAULT_SECTION_RULES } from './sectionRules';
import { containsTerm, normalize, wordCount } from './textNormalizer';
import { MASK_PLACEHOLDER, SectionType } from './types';
import type { RunState, SectionRules, TokenPredictor } from './types';

export interface EnhancementResult {
    text: string;
    inserted: boolean;
}

export interface EnhancerOptions {
    densityLimit: number;
    sectionRules: SectionRules;
}

const KEYWORD_SLOT = '{kw}';
const WORDS_PER_TEMPLATE_STEP = 20;
const LIST_DELIMITERS = ['|', ',', ';', '•', '·'] as const;
const SHORT_LIST_WORDS = 6;
const TERMINAL_PUNCTUATION = /[.!?]$/;
const USABLE_PREDICTION = /^[a-z]{3,}$/i;

/**
 * 按段落词数选择模板：段落越长，选用的模板越长
 */
export function selectTemplate(templates: readonly string[], paragraphText: string): string | null {
    if (templates.length === 0) {
        return null;
    }
    const index = Math.min(templates.length - 1, Math.floor(wordCount(paragraphText) / WORDS_PER_TEMPLATE_STEP));
    return templates[index];
}

function detectListDelimiter(text: string): string | null {
    let best: { delimiter: string; count: number } | null = null;
    for (const delimiter of LIST_DELIMITERS) {
        const count = text.split(delimiter).length - 1;
        if (count > 0 && (!best || count > best.count)) {
            best = { delimiter, count };
        }
    }
    if (!best) {
        return null;
    }

    const spacedBefore = text.includes(` ${best.delimiter}`);
    return spacedBefore ? ` ${best.delimiter} ` : `${best.delimiter} `;
}

export function isListLike(text: string): boolean {
    const trimmed = text.trim();
    if (detectListDelimiter(trimmed)) {
        return true;
    }
    return !TERMINAL_PUNCTUATION.test(trimmed) && wordCount(trimmed) <= SHORT_LIST_WORDS;
}

/**
 * 在以分隔符组织的技能列表末尾追加一项，沿用原有分隔符和末尾句号
 */
export function appendToList(text: string, keyword: string): string {
    const trimmed = text.trimEnd();
    const hasPeriod = trimmed.endsWith('.');
    const body = hasPeriod ? trimmed.slice(0, -1).trimEnd() : trimmed;
    const separator = detectListDelimiter(body) || ', ';
    return `${body}${separator}${keyword}${hasPeriod ? '.' : ''}`;
}

export function appendSentence(text: string, sentence: string): string {
    const trimmed = text.trimEnd();
    const lead = TERMINAL_PUNCTUATION.test(trimmed) ? trimmed : `${trimmed}.`;
    return `${lead} ${sentence}`;
}

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export class ContextualEnhancer {
    private readonly options: EnhancerOptions;

    constructor(
        private readonly predictor: TokenPredictor,
        options: Partial<EnhancerOptions> = {}
    ) {
        this.options = {
            densityLimit: options.densityLimit ?? DEFAULT_DENSITY_LIMIT,
            sectionRules: options.sectionRules ?? DEFAULT_SECTION_RULES
        };
    }

    /**
     * 将关键词写入段落。成功时在运行状态中登记该关键词并累加插入计数
     */
    async enhance(
        paragraphText: string,
        keyword: string,
        sectionType: SectionType,
        runState: RunState
    ): Promise<EnhancementResult> {
        const unchanged: EnhancementResult = { text: paragraphText, inserted: false };
        const base = paragraphText.trimEnd();

        if (!base.trim() || !normalize(keyword)) {
            return unchanged;
        }
        if (containsTerm(base, keyword)) {
            return unchanged;
        }
        if (!allowsInsertion(base, keyword, this.options.densityLimit)) {
            return unchanged;
        }

        let text: string;
        if (sectionType === SectionType.SKILLS && isListLike(base)) {
            text = appendToList(base, keyword);
        } else {
            const template = selectTemplate(this.options.sectionRules[sectionType].templates, base);
            if (!template) {
                return unchanged;
            }
            const sentence = await this.composeSentence(base, keyword, template);
            text = appendSentence(base, sentence);
        }

        runState.processedKeywords.add(normalize(keyword).toLowerCase());
        runState.keywordsAddedCount += 1;

        return { text, inserted: true };
    }

    private async composeSentence(paragraphText: string, keyword: string, template: string): Promise<string> {
        const fallback = template.split(KEYWORD_SLOT).join(keyword);

        try {
            const refined = await this.refineLeadWord(paragraphText, keyword, template);
            return refined ?? fallback;
        } catch (error) {
            logger.warn('预测服务不可用，使用模板句式', {
                keyword,
                error: error instanceof Error ? error.message : String(error)
            });
            return fallback;
        }
    }

    /**
     * 用预测服务给出的词替换模板首词，例如 "Utilized" -> "Used"
     */
    private async refineLeadWord(paragraphText: string, keyword: string, template: string): Promise<string | null> {
        const [lead, ...rest] = template.split(' ');
        if (!lead || rest.length === 0) {
            return null;
        }

        const remainder = rest.join(' ').split(KEYWORD_SLOT).join(keyword);
        const context = `${appendSentence(paragraphText, MASK_PLACEHOLDER)} ${remainder}`;
        const candidates = await this.predictor.predict(context);
        const keywordLower = keyword.toLowerCase();

        const choice = candidates
            .map(candidate => candidate.trim())
            .find(candidate =>
                USABLE_PREDICTION.test(candidate) &&
                !STOP_WORDS.has(candidate.toLowerCase()) &&
                candidate.toLowerCase() !== keywordLower
            );

        return choice ? `${capitalize(choice)} ${remainder}` : null;
    }
}

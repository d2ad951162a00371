import type { ContextualEnhancer } from './contextualEnhancer';
import { classify, matchHeader } from './sectionClassifier';
import { DEFAULT_SECTION_RULES } from './sectionRules';
import { containsTerm, normalize } from './textNormalizer';
import { SectionType } from './types';
import type { DocumentContent, Insertion, Keyword, Paragraph, RunState, SectionRules } from './types';

export interface RebuilderOptions {
    maxKeywordsTotal: number;
    sectionRules: SectionRules;
}

export interface RebuildResult {
    document: DocumentContent;
    insertions: Insertion[];
}

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;
// 联系方式行：邮箱或网址
const CONTACT_DETAILS = /[^\s@]+@[^\s@]+\.[a-z]{2,}|https?:\/\/|\bwww\./i;

/**
 * 去掉段落中忽略大小写和标点后重复的句子，保留首次出现的一句
 */
export function dedupeSentences(text: string): string {
    const seen = new Set<string>();
    const kept: string[] = [];

    for (const sentence of text.split(SENTENCE_BOUNDARY)) {
        const key = sentence.toLowerCase().replace(/[^a-z0-9]/g, '');
        if (key && seen.has(key)) {
            continue;
        }
        if (key) {
            seen.add(key);
        }
        kept.push(sentence);
    }

    return kept.join(' ');
}

// 撤销增强器对本次插入的登记
function rollbackInsertion(runState: RunState, keyword: string): void {
    runState.processedKeywords.delete(normalize(keyword).toLowerCase());
    runState.keywordsAddedCount -= 1;
}

function copyParagraph(paragraph: Paragraph, text: string = paragraph.text): Paragraph {
    return { text, formatting: { ...paragraph.formatting } };
}

export class DocumentRebuilder {
    private readonly options: RebuilderOptions;

    constructor(
        private readonly enhancer: ContextualEnhancer,
        options: Partial<RebuilderOptions> = {}
    ) {
        this.options = {
            maxKeywordsTotal: options.maxKeywordsTotal ?? 15,
            sectionRules: options.sectionRules ?? DEFAULT_SECTION_RULES
        };
    }

    /**
     * 单次线性遍历段落序列。段落数量保持不变，标题和空段落原样输出
     */
    async rebuild(document: DocumentContent, candidates: readonly Keyword[], runState: RunState): Promise<RebuildResult> {
        const rules = this.options.sectionRules;
        const paragraphs: Paragraph[] = [];
        const insertions: Insertion[] = [];
        let currentSection: SectionType | null = null;

        for (const [index, paragraph] of document.paragraphs.entries()) {
            if (!paragraph.text.trim()) {
                paragraphs.push(copyParagraph(paragraph));
                continue;
            }

            const header = matchHeader(paragraph.text, rules);
            if (header) {
                currentSection = header;
                runState.sectionKeywordsUsed = 0;
                paragraphs.push(copyParagraph(paragraph));
                continue;
            }

            if (CONTACT_DETAILS.test(paragraph.text)) {
                paragraphs.push(copyParagraph(paragraph));
                continue;
            }

            const section = currentSection ?? classify(paragraph.text, rules);
            // 第一个标题之前无法归类的段落（姓名、抬头）保持原样
            if (currentSection === null && section === SectionType.OTHER) {
                paragraphs.push(copyParagraph(paragraph));
                continue;
            }

            const budget = rules[section].budget;
            let text = paragraph.text;

            for (const keyword of candidates) {
                if (runState.sectionKeywordsUsed >= budget || runState.keywordsAddedCount >= this.options.maxKeywordsTotal) {
                    break;
                }
                if (runState.processedKeywords.has(keyword.normalized) || containsTerm(text, keyword.normalized)) {
                    continue;
                }

                const result = await this.enhancer.enhance(text, keyword.text, section, runState);
                if (!result.inserted) {
                    continue;
                }

                // 去重后关键词不在段落中时，这次插入不计数
                const deduped = dedupeSentences(result.text);
                if (!containsTerm(deduped, keyword.text)) {
                    rollbackInsertion(runState, keyword.text);
                    continue;
                }

                text = deduped;
                runState.sectionKeywordsUsed += 1;
                insertions.push({ keyword: keyword.text, section, paragraphIndex: index });
            }

            paragraphs.push(copyParagraph(paragraph, text));
        }

        return { document: { paragraphs }, insertions };
    }
}

// 简历语义分区
export enum SectionType {
    SUMMARY = 'summary',
    SKILLS = 'skills',
    EXPERIENCE = 'experience',
    PROJECTS = 'projects',
    EDUCATION = 'education',
    AWARDS = 'awards',
    CERTIFICATIONS = 'certifications',
    OTHER = 'other'
}

export type Alignment = 'left' | 'center' | 'right' | 'justify';

export interface RunFormatting {
    bold?: boolean;
    italic?: boolean;
    underline?: boolean;
    font?: string;
    fontSize?: number; // 单位：磅
}

// 段落格式属性，从源文档原样带到输出文档，不做合并
export interface ParagraphFormatting {
    styleName?: string;
    alignment?: Alignment;
    indent?: {
        left?: number;
        right?: number;
        firstLine?: number;
        hanging?: number;
    };
    run?: RunFormatting;
}

export interface Paragraph {
    readonly text: string;
    readonly formatting: ParagraphFormatting;
}

export interface DocumentContent {
    readonly paragraphs: readonly Paragraph[];
}

export interface Keyword {
    text: string;        // 首次出现时的原始大小写
    normalized: string;  // 小写比较形式
    count: number;
    firstIndex: number;
    isTechnical: boolean;
}

/**
 * 单次优化的运行状态，每次调用都必须新建，不能在文档之间共享
 */
export interface RunState {
    processedKeywords: Set<string>;
    keywordsAddedCount: number;
    sectionKeywordsUsed: number;
}

export function createRunState(): RunState {
    return {
        processedKeywords: new Set<string>(),
        keywordsAddedCount: 0,
        sectionKeywordsUsed: 0
    };
}

export const MASK_PLACEHOLDER = '[MASK]';

/**
 * 掩码词预测服务，返回按可能性排序的候选词
 */
export interface TokenPredictor {
    predict(maskedContext: string): Promise<string[]>;
}

export interface SectionRule {
    headers: string[];
    contentHints: string[];
    templates: string[];
    budget: number;
}

export type SectionRules = Record<SectionType, SectionRule>;

export interface OptimizerOptions {
    minJobDescriptionLength: number;
    maxKeywordsTotal: number;
    densityLimit: number;
    jobDescriptionTopK: number;
    resumeTopK: number;
    maxCandidateKeywords: number;
    sectionRules: SectionRules;
}

export interface Insertion {
    keyword: string;
    section: SectionType;
    paragraphIndex: number;
}

export interface OptimizationResult {
    document: DocumentContent;
    keywordsAdded: number;
    insertions: Insertion[];
    changeLog: string[];
    missingKeywords: string[];
}

import { DEFAULT_SECTION_RULES, HINT_ORDER, SECTION_ORDER } from './sectionRules';
import { containsTerm } from './textNormalizer';
import { SectionType } from './types';
import type { SectionRules } from './types';

export const MAX_HEADER_WORDS = 5;

function headerForm(text: string): string {
    return text.trim().toLowerCase().replace(/^[^a-z0-9]+|[^a-z0-9]+$/g, '');
}

function startsWithKeyword(candidate: string, keyword: string): boolean {
    if (candidate === keyword) {
        return true;
    }
    return candidate.startsWith(keyword) && !/[a-z0-9]/.test(candidate.charAt(keyword.length));
}

/**
 * 返回段落作为标题时对应的分区；不是标题时返回 null。
 * 多个关键词命中时取最长的一个（"technical skills" 优先于 "skills"）
 */
export function matchHeader(text: string, rules: SectionRules = DEFAULT_SECTION_RULES): SectionType | null {
    const words = text.trim().split(/\s+/).filter(Boolean);
    if (words.length === 0 || words.length > MAX_HEADER_WORDS) {
        return null;
    }

    const candidate = headerForm(text);
    if (!candidate) {
        return null;
    }

    let best: { section: SectionType; length: number } | null = null;
    for (const section of SECTION_ORDER) {
        for (const keyword of rules[section].headers) {
            if (startsWithKeyword(candidate, keyword) && (!best || keyword.length > best.length)) {
                best = { section, length: keyword.length };
            }
        }
    }

    return best ? best.section : null;
}

export function isHeader(text: string, rules: SectionRules = DEFAULT_SECTION_RULES): boolean {
    return matchHeader(text, rules) !== null;
}

export function classify(text: string, rules: SectionRules = DEFAULT_SECTION_RULES): SectionType {
    const header = matchHeader(text, rules);
    if (header) {
        return header;
    }

    for (const section of SECTION_ORDER) {
        if (rules[section].headers.some(keyword => containsTerm(text, keyword))) {
            return section;
        }
    }

    for (const section of HINT_ORDER) {
        if (rules[section].contentHints.some(hint => containsTerm(text, hint))) {
            return section;
        }
    }

    return SectionType.OTHER;
}

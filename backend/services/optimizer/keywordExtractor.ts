import stopWordList from '../../data/stopWords.json';
import techTermList from '../../data/techTerms.json';
import { normalize } from './textNormalizer';
import type { Keyword } from './types';

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);
export const TECH_TERMS: ReadonlySet<string> = new Set(techTermList);

const MIN_TEXT_LENGTH = 10;
const MAX_NGRAM = 3;

// 短语分隔符：列表符号、括号、换行、制表符，以及后接空白的句号
const SEGMENT_DELIMITERS = /[,;:|/\\()[\]{}!?"•·▪–—\r\n\t]+|\.(?=\s|$)/;
// 网址和邮箱在分段前整体移除
const URL_IN_TEXT = /\b(?:https?:\/\/|www\.)\S+|[\w.+-]+@[\w-]+(?:\.[\w-]+)+/gi;
const URL_PREFIXED = /^(?:(?:https?|www) \S+\.[a-z]{2,}$|www\.)/i;
const BARE_HOST = /^[a-z0-9-]+(?:\.[a-z0-9-]+)*\.(?:com|org|net|io|edu|gov|co)$/i;
const NUMERIC_ONLY = /^[\d\s.+#\-]+$/;
const IDENTIFIER_LIKE = /^[a-z0-9.+#\-]*[a-z0-9][a-z0-9.+#\-]*( [a-z0-9.+#\-]*[a-z0-9][a-z0-9.+#\-]*)*$/i;
const ACRONYM = /^[A-Z]{2,5}$/;
const HAS_DIGIT = /\d/;

function cleanToken(raw: string): string {
    return raw.replace(/^-+/, '').replace(/[.\-]+$/, '');
}

function tokenizeSegments(text: string): string[][] {
    return text
        .replace(URL_IN_TEXT, '\n')
        .split(SEGMENT_DELIMITERS)
        .map(segment => normalize(segment))
        .filter(segment => segment.length > 0)
        .map(segment => segment.split(' ').map(cleanToken).filter(token => token.length > 0));
}

export function isValidTerm(term: string): boolean {
    if (term.length < 2) {
        return false;
    }
    if (NUMERIC_ONLY.test(term)) {
        return false;
    }
    if (URL_PREFIXED.test(term)) {
        return false;
    }
    // socket.io 这类技术名词不算域名
    if (BARE_HOST.test(term) && !TECH_TERMS.has(term.toLowerCase())) {
        return false;
    }
    return IDENTIFIER_LIKE.test(term);
}

/**
 * 是否为技术/技能相关术语：词表命中、含版本号数字、或 2-5 位大写缩写
 */
export function isTechnicalTerm(term: string): boolean {
    return TECH_TERMS.has(term.toLowerCase()) || HAS_DIGIT.test(term) || ACRONYM.test(term);
}

/**
 * 按出现频率提取 1-3 元关键词，频率相同时按首次出现顺序排列
 */
export function extractKeywords(text: string, topK: number): Keyword[] {
    if (text.trim().length < MIN_TEXT_LENGTH || topK <= 0) {
        return [];
    }

    const counts = new Map<string, { text: string; count: number; firstIndex: number }>();
    let order = 0;

    for (const tokens of tokenizeSegments(text)) {
        for (let start = 0; start < tokens.length; start++) {
            for (let size = 1; size <= MAX_NGRAM && start + size <= tokens.length; size++) {
                const gram = tokens.slice(start, start + size);
                if (gram.some(token => STOP_WORDS.has(token.toLowerCase()))) {
                    // 含停用词的更长 n 元组同样无效
                    break;
                }

                const display = gram.join(' ');
                const key = display.toLowerCase();
                const existing = counts.get(key);
                if (existing) {
                    existing.count += 1;
                } else {
                    counts.set(key, { text: display, count: 1, firstIndex: order++ });
                }
            }
        }
    }

    return Array.from(counts.entries())
        .filter(([key]) => isValidTerm(key))
        .sort((a, b) => b[1].count - a[1].count)
        .slice(0, topK)
        .map(([key, entry]) => ({
            text: entry.text,
            normalized: key,
            count: entry.count,
            firstIndex: entry.firstIndex,
            isTechnical: isTechnicalTerm(entry.text)
        }));
}

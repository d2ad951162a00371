// 只保留字母、数字、空白以及技术名词常用的 + # . -
const DISALLOWED_CHARS = /[^A-Za-z0-9\s+#.\-]/g;
const WHITESPACE = /\s+/g;
const HAS_ALNUM = /[A-Za-z0-9]/;

/**
 * 文本规范化：替换非白名单字符、合并空白、去除首尾空白。幂等
 */
export function normalize(text: string): string {
    return text.replace(DISALLOWED_CHARS, ' ').replace(WHITESPACE, ' ').trim();
}

export function wordCount(text: string): number {
    const normalized = normalize(text);
    if (!normalized) {
        return 0;
    }
    return normalized.split(' ').filter(token => HAS_ALNUM.test(token)).length;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// 术语边界：字母、数字、+、# 以外的任意字符
function termPattern(term: string): RegExp | null {
    const needle = normalize(term).toLowerCase();
    if (!needle) {
        return null;
    }
    return new RegExp(`(?<![a-z0-9+#])${escapeRegExp(needle)}(?![a-z0-9+#])`, 'g');
}

export function countOccurrences(text: string, term: string): number {
    const pattern = termPattern(term);
    if (!pattern) {
        return 0;
    }
    const matches = normalize(text).toLowerCase().match(pattern);
    return matches ? matches.length : 0;
}

export function containsTerm(text: string, term: string): boolean {
    return countOccurrences(text, term) > 0;
}

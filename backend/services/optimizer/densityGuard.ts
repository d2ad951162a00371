import { countOccurrences, wordCount } from './textNormalizer';

// 少于该词数的文本块不做密度判断
export const MIN_MEASURABLE_WORDS = 10;
export const DEFAULT_DENSITY_LIMIT = 0.03;

export function keywordDensity(textBlock: string, keyword: string): number {
    const words = wordCount(textBlock);
    if (words === 0) {
        return 0;
    }
    return countOccurrences(textBlock, keyword) / words;
}

/**
 * 插入一次关键词后，其在文本块中的密度是否仍低于上限。
 * 文本块每次插入后都会变化，调用方需要在每次插入前重新判断
 */
export function allowsInsertion(textBlock: string, keyword: string, limit: number = DEFAULT_DENSITY_LIMIT): boolean {
    const words = wordCount(textBlock);
    if (words < MIN_MEASURABLE_WORDS) {
        return true;
    }

    const occurrences = countOccurrences(textBlock, keyword) + 1;
    const total = words + Math.max(wordCount(keyword), 1);
    return occurrences / total < limit;
}

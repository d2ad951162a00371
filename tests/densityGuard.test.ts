import { describe, it, expect } from 'vitest';
import { allowsInsertion, keywordDensity } from '../backend/services/optimizer/densityGuard';

function words(count: number, word = 'delivery'): string {
    return Array.from({ length: count }, () => word).join(' ');
}

describe('keywordDensity', () => {
    it('divides occurrences by word count', () => {
        expect(keywordDensity('docker docker word word', 'docker')).toBe(0.5);
    });

    it('is zero for empty text', () => {
        expect(keywordDensity('', 'docker')).toBe(0);
    });
});

describe('allowsInsertion', () => {
    it('always allows short blocks', () => {
        expect(allowsInsertion('Python Java Git', 'Docker')).toBe(true);
    });

    it('allows an insertion that keeps density under the limit', () => {
        // 1 / (40 + 1)
        expect(allowsInsertion(words(40), 'docker', 0.03)).toBe(true);
    });

    it('blocks an insertion that would reach the limit', () => {
        // 1 / (20 + 1)
        expect(allowsInsertion(words(20), 'docker', 0.03)).toBe(false);
        // (1 + 1) / (40 + 1)
        expect(allowsInsertion(`${words(39)} docker`, 'docker', 0.03)).toBe(false);
    });
});

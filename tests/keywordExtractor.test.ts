import { describe, it, expect } from 'vitest';
import { extractKeywords, isTechnicalTerm, isValidTerm } from '../backend/services/optimizer/keywordExtractor';

describe('extractKeywords', () => {
    it('returns nothing for text shorter than 10 characters', () => {
        expect(extractKeywords('Docker', 10)).toEqual([]);
        expect(extractKeywords('          ', 10)).toEqual([]);
    });

    it('ranks by frequency and keeps first-occurrence order on ties', () => {
        const keywords = extractKeywords('Docker, Kubernetes, Docker and Kubernetes with Terraform', 10);

        expect(keywords.map(keyword => keyword.text)).toEqual(['Docker', 'Kubernetes', 'Terraform']);
        expect(keywords.map(keyword => keyword.count)).toEqual([2, 2, 1]);
        expect(keywords.every(keyword => keyword.isTechnical)).toBe(true);
    });

    it('keeps the first casing as display form and lowercase as comparison form', () => {
        const [keyword] = extractKeywords('Python, python, PYTHON', 5);

        expect(keyword.text).toBe('Python');
        expect(keyword.normalized).toBe('python');
        expect(keyword.count).toBe(3);
    });

    it('builds n-grams up to three tokens within a phrase', () => {
        const keywords = extractKeywords('machine learning pipelines', 10);

        expect(keywords.map(keyword => keyword.normalized)).toEqual([
            'machine',
            'machine learning',
            'machine learning pipelines',
            'learning',
            'learning pipelines',
            'pipelines'
        ]);
    });

    it('respects topK', () => {
        expect(extractKeywords('machine learning pipelines', 3)).toHaveLength(3);
    });

    it('breaks n-grams at stop words and keeps symbol-bearing terms', () => {
        const keywords = extractKeywords('.NET and C# developers', 10);

        expect(keywords.map(keyword => keyword.text)).toEqual(['.NET', 'C#', 'C# developers', 'developers']);
    });

    it('keeps HTTP and HTTPS as keywords', () => {
        const keywords = extractKeywords('HTTP APIs, HTTPS, HTTP caching and HTTP/2 experience', 20);

        expect(keywords.map(keyword => keyword.normalized)).toEqual([
            'http', 'http apis', 'apis', 'https', 'http caching', 'caching'
        ]);
        expect(keywords[0]).toMatchObject({ text: 'HTTP', count: 3, isTechnical: true });
    });

    it('drops links and email addresses before counting', () => {
        const keywords = extractKeywords('Kubernetes. Apply at https://careers.acme.com/jobs or jobs@acme.com', 20);
        const terms = keywords.map(keyword => keyword.normalized);

        expect(terms).toContain('kubernetes');
        expect(terms.filter(term => term.includes('acme') || term.includes('careers'))).toEqual([]);
    });
});

describe('isValidTerm', () => {
    it('rejects short, numeric and url-like terms', () => {
        expect(isValidTerm('a')).toBe(false);
        expect(isValidTerm('2024')).toBe(false);
        expect(isValidTerm('www.example')).toBe(false);
        expect(isValidTerm('acme.com')).toBe(false);
        expect(isValidTerm('https acme.com')).toBe(false);
    });

    it('accepts protocol names and dotted technology names', () => {
        expect(isValidTerm('http')).toBe(true);
        expect(isValidTerm('https')).toBe(true);
        expect(isValidTerm('http caching')).toBe(true);
        expect(isValidTerm('socket.io')).toBe(true);
    });

    it('accepts identifier-like terms', () => {
        expect(isValidTerm('node.js')).toBe(true);
        expect(isValidTerm('ci pipelines')).toBe(true);
    });
});

describe('isTechnicalTerm', () => {
    it('recognises curated terms, versioned names and acronyms', () => {
        expect(isTechnicalTerm('AWS')).toBe(true);
        expect(isTechnicalTerm('ES2022')).toBe(true);
        expect(isTechnicalTerm('SOC')).toBe(true);
    });

    it('rejects plain words', () => {
        expect(isTechnicalTerm('leadership')).toBe(false);
    });
});

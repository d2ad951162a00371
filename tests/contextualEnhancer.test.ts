import { describe, it, expect, vi } from 'vitest';
import {
    appendSentence,
    appendToList,
    ContextualEnhancer,
    isListLike,
    selectTemplate
} from '../backend/services/optimizer/contextualEnhancer';
import { EnhancementFailure } from '../backend/services/optimizer/errors';
import { NullTokenPredictor } from '../backend/services/optimizer/resumeOptimizer';
import { createRunState, SectionType } from '../backend/services/optimizer/types';
import type { TokenPredictor } from '../backend/services/optimizer/types';

function words(count: number): string {
    return Array.from({ length: count }, () => 'delivery').join(' ');
}

describe('selectTemplate', () => {
    const templates = ['short', 'medium', 'long'];

    it('picks longer templates for longer paragraphs', () => {
        expect(selectTemplate(templates, 'two words')).toBe('short');
        expect(selectTemplate(templates, words(25))).toBe('medium');
        expect(selectTemplate(templates, words(45))).toBe('long');
    });

    it('returns null without templates', () => {
        expect(selectTemplate([], 'anything')).toBeNull();
    });
});

describe('list helpers', () => {
    it('detects list-like paragraphs', () => {
        expect(isListLike('Python | Java | Git')).toBe(true);
        expect(isListLike('Python Java')).toBe(true);
        expect(isListLike('Led migration of billing to the new platform.')).toBe(false);
    });

    it('appends with the dominant delimiter and its spacing', () => {
        expect(appendToList('Python | Java | Git', 'Docker')).toBe('Python | Java | Git | Docker');
        expect(appendToList('Python, Java.', 'Go')).toBe('Python, Java, Go.');
        expect(appendToList('Python', 'Go')).toBe('Python, Go');
    });

    it('terminates the paragraph before appending a sentence', () => {
        expect(appendSentence('Led the team', 'Used Docker.')).toBe('Led the team. Used Docker.');
        expect(appendSentence('Shipped it!', 'Used Docker.')).toBe('Shipped it! Used Docker.');
    });
});

describe('ContextualEnhancer.enhance', () => {
    const experience = 'Managed a team of five engineers.';

    it('appends to skills lists and records the keyword in the run state', async () => {
        const enhancer = new ContextualEnhancer(new NullTokenPredictor());
        const runState = createRunState();

        const result = await enhancer.enhance('Python | Java | Git', 'Docker', SectionType.SKILLS, runState);

        expect(result).toEqual({ text: 'Python | Java | Git | Docker', inserted: true });
        expect(runState.processedKeywords.has('docker')).toBe(true);
        expect(runState.keywordsAddedCount).toBe(1);
    });

    it('uses the section template when no prediction is available', async () => {
        const enhancer = new ContextualEnhancer(new NullTokenPredictor());

        const result = await enhancer.enhance(experience, 'Docker', SectionType.EXPERIENCE, createRunState());

        expect(result.text).toBe('Managed a team of five engineers. Utilized Docker for development.');
    });

    it('replaces the lead word with the first usable prediction', async () => {
        const predict = vi.fn(async (_context: string) => ['the', 'docker', 'used']);
        const enhancer = new ContextualEnhancer({ predict });

        const result = await enhancer.enhance(experience, 'Docker', SectionType.EXPERIENCE, createRunState());

        expect(predict).toHaveBeenCalledWith('Managed a team of five engineers. [MASK] Docker for development.');
        expect(result.text).toBe('Managed a team of five engineers. Used Docker for development.');
    });

    it('falls back to the template when prediction fails', async () => {
        const failing: TokenPredictor = {
            predict: () => Promise.reject(new EnhancementFailure('timeout'))
        };
        const enhancer = new ContextualEnhancer(failing);
        const runState = createRunState();

        const result = await enhancer.enhance(experience, 'Docker', SectionType.EXPERIENCE, runState);

        expect(result.text).toBe('Managed a team of five engineers. Utilized Docker for development.');
        expect(runState.keywordsAddedCount).toBe(1);
    });

    it('leaves the paragraph alone when the keyword is already present', async () => {
        const enhancer = new ContextualEnhancer(new NullTokenPredictor());
        const runState = createRunState();

        const result = await enhancer.enhance('Python | Docker', 'docker', SectionType.SKILLS, runState);

        expect(result).toEqual({ text: 'Python | Docker', inserted: false });
        expect(runState.keywordsAddedCount).toBe(0);
    });

    it('does not insert into sections without templates', async () => {
        const enhancer = new ContextualEnhancer(new NullTokenPredictor());

        const result = await enhancer.enhance('BSc Computer Science', 'Docker', SectionType.EDUCATION, createRunState());

        expect(result.inserted).toBe(false);
    });

    it('respects the density limit', async () => {
        const enhancer = new ContextualEnhancer(new NullTokenPredictor(), { densityLimit: 0.03 });

        const result = await enhancer.enhance(`${words(20)}.`, 'Docker', SectionType.EXPERIENCE, createRunState());

        expect(result.inserted).toBe(false);
    });
});

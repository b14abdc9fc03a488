import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { parseGenerationForm, parseLogChannel, validatePresentationPlan } from './validation';

describe('parseGenerationForm', () => {
    it('applies defaults for a topic-only submission', () => {
        expect(parseGenerationForm({ topic: '  Mars colonization  ' })).toEqual({
            topic: 'Mars colonization',
            slideCount: 3,
            enableVideo: false,
        });
    });

    it('reads every field of a full submission', () => {
        const request = parseGenerationForm(
            { topic: 'Oceans', slide_count: '5', enable_video: 'true', url_link: 'https://example.com/reef' },
            { path: '/tmp/doc_1.pdf', originalName: 'reef.pdf' }
        );
        expect(request).toEqual({
            topic: 'Oceans',
            slideCount: 5,
            enableVideo: true,
            urlLink: 'https://example.com/reef',
            pdf: { path: '/tmp/doc_1.pdf', originalName: 'reef.pdf' },
        });
    });

    it('treats an empty url and slide count as absent', () => {
        const request = parseGenerationForm({ topic: 'Oceans', slide_count: '', url_link: '   ', enable_video: 'false' });
        expect(request).toEqual({ topic: 'Oceans', slideCount: 3, enableVideo: false });
    });

    it.each([
        [{}],
        [{ topic: '' }],
        [{ topic: '   ' }],
        [undefined],
    ])('rejects a missing topic (%j)', (fields) => {
        expect(() => parseGenerationForm(fields)).toThrow(new ValidationError('Enter a topic'));
    });

    it('only enables video for the literal "true"', () => {
        expect(parseGenerationForm({ topic: 'x', enable_video: 'on' }).enableVideo).toBe(false);
        expect(parseGenerationForm({ topic: 'x', enable_video: 'true' }).enableVideo).toBe(true);
    });

    it.each(['0', '11', '-2'])('rejects slide_count %s', (value) => {
        expect(() => parseGenerationForm({ topic: 'x', slide_count: value })).toThrow('Slide count must be between 1 and 10');
    });

    it.each(['2.5', 'three'])('rejects non-integer slide_count %s', (value) => {
        expect(() => parseGenerationForm({ topic: 'x', slide_count: value })).toThrow('Slide count must be a whole number');
    });

    it('rejects a non-http url', () => {
        try {
            parseGenerationForm({ topic: 'x', url_link: 'ftp://example.com/file' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({ message: 'Context URL must be a valid http(s) address', field: 'url_link' });
        }
    });
});

describe('parseLogChannel', () => {
    it('accepts simple ids', () => {
        expect(parseLogChannel('3f2c9a4e-1b7d-4c55-9e0a-2d6f8b1c7e90')).toBe('3f2c9a4e-1b7d-4c55-9e0a-2d6f8b1c7e90');
    });

    it.each([undefined, '', 'has space', 'x'.repeat(65), 42])('falls back to broadcast for %j', (value) => {
        expect(parseLogChannel(value)).toBeUndefined();
    });
});

describe('validatePresentationPlan', () => {
    const slide = (n: number) => ({ title: `T${n}`, content: `C${n}`, visualPrompt: `V${n}`, videoPrompt: `M${n}` });

    it('accepts a well-formed plan', () => {
        const result = validatePresentationPlan({ title: 'Deck', slides: [slide(1), slide(2)] }, 2);
        expect(result).toEqual({ ok: true, plan: { title: 'Deck', slides: [slide(1), slide(2)] } });
    });

    it('drops slides beyond the requested count', () => {
        const result = validatePresentationPlan({ title: 'Deck', slides: [slide(1), slide(2), slide(3)] }, 2);
        expect(result.ok && result.plan.slides.map(s => s.title)).toEqual(['T1', 'T2']);
    });

    it('defaults a missing video prompt to an empty string', () => {
        const result = validatePresentationPlan({ title: 'Deck', slides: [{ title: 'T', content: 'C', visualPrompt: 'V' }] }, 1);
        expect(result.ok && result.plan.slides[0]?.videoPrompt).toBe('');
    });

    it('rejects an outline without slides', () => {
        const result = validatePresentationPlan({ title: 'Deck', slides: [] }, 3);
        expect(result.ok).toBe(false);
    });

    it('reports the path of a bad field', () => {
        const result = validatePresentationPlan({ title: 'Deck', slides: [{ title: 'T', content: 'C' }] }, 1);
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.errors[0]).toMatch(/^slides\.0\.visualPrompt: /);
        }
    });
});
